/**
 * Request State
 *
 * Everything one request owns: the memoized role, the payload cache, the
 * normalized query, the resolved record and, for an internal fetch made
 * to expand an `include`, the passthrough from the enclosing request.
 * Nothing here outlives the request or is shared with another one,
 * except that an internal fetch shares its enclosing request's role.
 */

import {
  requestDocumentSchema,
  type Action,
  type CallerRole,
  type PrimaryData,
  type QueryParams,
  type RelationshipType,
  type RequestHeaders,
} from "@resourceful/contracts";
import type { Config, RoleRequest } from "../registry/config.js";
import { can } from "../dispatch/authorize.js";
import { BadRequestError } from "../errors/index.js";

/**
 * Carried by an internal fetch performed on behalf of an enclosing
 * request. Never read from the client.
 */
export interface Passthru {
  /** Resource of the enclosing client request */
  readonly parent: string;

  /** Action of the enclosing client request */
  readonly parentAction: Action;

  /** Record already resolved by the enclosing request, injected for the id segment */
  readonly resource?: unknown;
}

/** Resolves the caller's role at most once */
export class RoleMemo {
  private resolved = false;
  private value: CallerRole = null;

  constructor(
    private readonly config: Config,
    private readonly request: RoleRequest
  ) {}

  get(): CallerRole {
    if (!this.resolved) {
      this.value = this.config.role(this.request);
      this.resolved = true;
    }
    return this.value;
  }
}

export interface RequestStateInit {
  config: Config;
  path: string;
  headers: RequestHeaders;
  locals: Readonly<Record<string, unknown>>;
  params: QueryParams;
  body: string | undefined;
  role: RoleMemo;
  passthru?: Passthru;
}

export class RequestState {
  readonly config: Config;
  readonly path: string;
  readonly headers: RequestHeaders;
  readonly locals: Readonly<Record<string, unknown>>;
  readonly params: QueryParams;
  readonly passthru: Passthru | undefined;

  /** The record the path's id segment resolved to */
  resource: unknown;

  private readonly body: string | undefined;
  private readonly role: RoleMemo;
  private readonly payloads = new Map<string, PrimaryData>();

  constructor(init: RequestStateInit) {
    this.config = init.config;
    this.path = init.path;
    this.headers = init.headers;
    this.locals = init.locals;
    this.params = init.params;
    this.body = init.body;
    this.role = init.role;
    this.passthru = init.passthru;
  }

  callerRole(): CallerRole {
    return this.role.get();
  }

  can(resourceName: string, action: Action, relType?: RelationshipType, rel?: string): boolean {
    return can(
      this.config.resourceRoles,
      () => this.role.get(),
      resourceName,
      action,
      relType,
      rel
    );
  }

  sideloaded(): boolean {
    return this.passthru !== undefined;
  }

  /**
   * True only for an internal fetch whose enclosing resource is listed for
   * this action in the sideload table AND whose caller may perform the
   * enclosing action on it.
   */
  sideload(resourceName: string, action: Action): boolean {
    const passthru = this.passthru;
    if (!passthru) return false;
    return (
      this.config.resourceSideload.allows(resourceName, action, passthru.parent) &&
      this.can(passthru.parent, passthru.parentAction)
    );
  }

  /**
   * State for an internal fetch made on behalf of this request. It shares
   * the caller's role but nothing else.
   */
  derive(path: string, passthru: Passthru): RequestState {
    return new RequestState({
      config: this.config,
      path,
      headers: this.headers,
      locals: this.locals,
      params: { fields: {}, include: [], filter: {}, page: {}, sort: "" },
      body: undefined,
      role: this.role,
      passthru,
    });
  }

  /** Parses the request document's primary data, once per path */
  data(): PrimaryData {
    const cached = this.payloads.get(this.path);
    if (cached !== undefined) return cached;

    const data = parsePayload(this.body);
    this.payloads.set(this.path, data);
    return data;
  }
}

function parsePayload(body: string | undefined): PrimaryData {
  if (body === undefined || body.trim() === "") {
    throw new BadRequestError("Malformed JSON:API request payload");
  }

  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch {
    throw new BadRequestError("Malformed JSON:API request payload");
  }

  const parsed = requestDocumentSchema.safeParse(json);
  if (!parsed.success) {
    throw new BadRequestError("Malformed JSON:API request payload");
  }
  return parsed.data.data;
}
