/**
 * JsonApi — the request lifecycle
 *
 * Resources are declared on a JsonApi; requests are handed to handle().
 * Every request goes through the same pipeline:
 *
 *   1. Negotiation   — 406 / 415, query groups normalized
 *   2. Lookup        — /{resource}/{id}/... resolves the record or 404s
 *   3. Routing       — first route whose guards all match; `include` is
 *                      checked against the declared relationships here
 *   4. Handler       — runs the route
 *   5. Serializing   — 200/201 become success documents (with includes)
 *   6. Errors        — every failure becomes one error document
 *
 * Steps 4 and 5 of a mutating route run inside the transaction hook, so a
 * failed include expansion rolls the write back.
 *
 * The engine knows nothing about the HTTP server in front of it; see
 * adapters/rest for the Fastify binding.
 */

import {
  MIME_TYPE,
  type Action,
  type DocumentData,
  type ErrorInstance,
  type RequestHeaders,
  type ResourceBody,
  type ResourceDeclaration,
  type ResourceHost,
  type ResourceIdentifier,
  type ResourceObject,
} from "@resourceful/contracts";
import { ZodError } from "zod";
import { Config, type ConfigOptions } from "../registry/config.js";
import {
  BadRequestError,
  ConfigurationError,
  HaltSignal,
  HttpError,
  NotFoundError,
  UnprocessableEntityError,
  errorForStatus,
} from "../errors/index.js";
import { captureException } from "../observability/index.js";
import { logRequest } from "../logging/index.js";
import { ResourceBuilderImpl } from "../resource/builder.js";
import { canonicalizeResourceName, dasherize } from "../resource/naming.js";
import type { ResourceDefinition } from "../resource/definition.js";
import { defaultEncoder, toResourceObject } from "../serializer/index.js";
import { buildRoutes } from "../dispatch/routes.js";
import { selectRoute, type Outcome, type Route } from "../dispatch/router.js";
import { parseIncludes, resolveRecord, type IncludeTree } from "../dispatch/lookup.js";
import {
  assertAcceptable,
  assertSupportedBody,
  normalizeQuery,
  type RawQuery,
} from "./negotiation.js";
import { RequestScope } from "./request-scope.js";
import { RequestState, RoleMemo } from "./request-state.js";

/** A request as the host framework hands it over */
export interface JsonApiRequest {
  method: string;

  /** Path below the mount point, without the query string (e.g., "/posts/42") */
  path: string;

  query?: RawQuery;
  headers?: RequestHeaders;

  /** Raw request body; absent or empty when the request has none */
  body?: string;

  /** Values the host attached to the request, visible to the role resolver and handlers */
  locals?: Readonly<Record<string, unknown>>;

  /** Mount point, prefixed to every link ("" by default) */
  basePath?: string;
}

export interface JsonApiResponse {
  status: number;
  headers: Record<string, string>;
  body?: string;
}

interface DeclaredResource {
  readonly definition: ResourceDefinition<unknown>;
  readonly routes: readonly Route[];
}

type Dispatched =
  | { readonly kind: "options"; readonly allow: readonly string[] }
  | { readonly kind: "outcome"; readonly outcome: Outcome; readonly action: Action };

/** A record alongside the resource object it was encoded to */
interface Entry {
  readonly record: unknown;
  readonly object: ResourceObject;
}

interface Origin {
  readonly parent: string;
  readonly parentAction: Action;
}

const UNEXPECTED_DETAIL = "An unexpected error occurred";

function splitPath(path: string): string[] {
  try {
    return path.split("/").filter(Boolean).map(decodeURIComponent);
  } catch {
    throw new BadRequestError("Malformed request path");
  }
}

function unknownInclude(rel: string, type: string): BadRequestError {
  return new BadRequestError(`Unknown relationship '${rel}' on '${type}' in include`, {
    source: { parameter: "include" },
  });
}

function identifier(object: ResourceObject): ResourceIdentifier {
  return { type: object.type, id: object.id };
}

function setLinkage(
  object: ResourceObject,
  rel: string,
  data: ResourceIdentifier | ResourceIdentifier[] | null
): void {
  const relationships = object.relationships ?? {};
  relationships[rel] = { ...relationships[rel], data };
  object.relationships = relationships;
}

export class JsonApi implements ResourceHost {
  private readonly resources = new Map<string, DeclaredResource>();

  constructor(readonly config: Config = new Config()) {}

  // ---------------------------------------------------------------------------
  // Declaration
  // ---------------------------------------------------------------------------

  /** Declares a resource and returns its canonical name */
  resource<TRecord>(rawName: string, body: ResourceBody<TRecord>): string {
    if (typeof body !== "function") {
      throw new ConfigurationError(`Resource "${rawName}" needs a declaration body`);
    }

    const name = canonicalizeResourceName(rawName);
    if (this.resources.has(name)) {
      throw new ConfigurationError(`Resource "${name}" is already declared`);
    }

    this.config.resourceRoles.entry(name);
    this.config.resourceSideload.entry(name);

    const builder = new ResourceBuilderImpl<TRecord>(name, this.config);
    body(builder);

    const definition: ResourceDefinition<unknown> = builder.build();
    this.resources.set(name, { definition, routes: buildRoutes(definition) });
    return name;
  }

  /** Registers declarations exported by a domain package */
  declare(...declarations: ResourceDeclaration[]): string[] {
    return declarations.map((declaration) => declaration.register(this));
  }

  configure(setup: (config: Config) => void): this {
    setup(this.config);
    return this;
  }

  /** Freezes the configuration. Later declarations and config writes throw. */
  freeze(): this {
    this.config.freeze();
    return this;
  }

  resourceNames(): string[] {
    return Array.from(this.resources.keys());
  }

  // ---------------------------------------------------------------------------
  // Requests
  // ---------------------------------------------------------------------------

  async handle(request: JsonApiRequest): Promise<JsonApiResponse> {
    const started = Date.now();
    const response = await this.process(request);
    logRequest(
      this.config.logger,
      request.method,
      request.path,
      response.status,
      Date.now() - started
    );
    return response;
  }

  /** Renders any thrown value as the error response the lifecycle would send */
  renderError(error: unknown, request: Pick<JsonApiRequest, "method" | "path">): JsonApiResponse {
    const headers = { "content-type": MIME_TYPE };
    if (error instanceof HaltSignal) {
      return { status: error.status, headers, body: error.body };
    }

    const errors = this.normalizeError(error, request);
    const document = this.config.serializer.serializeErrors(errors, this.config.errorLogger);
    return {
      status: errors[0]?.status ?? 500,
      headers,
      body: JSON.stringify(document),
    };
  }

  private async process(request: JsonApiRequest): Promise<JsonApiResponse> {
    const headers = request.headers ?? {};
    const locals = request.locals ?? {};

    try {
      assertAcceptable(headers);
      assertSupportedBody(headers, request.body);

      const state = new RequestState({
        config: this.config,
        path: request.path,
        headers,
        locals,
        params: normalizeQuery(request.query ?? {}),
        body: request.body,
        role: new RoleMemo(this.config, {
          method: request.method,
          path: request.path,
          headers,
          locals,
        }),
      });

      const basePath = request.basePath ?? "";
      return await this.dispatch(
        state,
        request.method.toUpperCase(),
        splitPath(request.path),
        (dispatched) => this.respond(dispatched, state, basePath)
      );
    } catch (error) {
      return this.renderError(error, request);
    }
  }

  /**
   * Lookup, routing and the handler itself. `finish` sees what the route
   * produced and runs in the same transaction as the handler.
   */
  private async dispatch<T>(
    state: RequestState,
    method: string,
    segments: readonly string[],
    finish: (dispatched: Dispatched) => Promise<T>
  ): Promise<T> {
    const [name = "", ...rest] = segments;
    const declared = this.resources.get(name);
    if (!declared) {
      throw new NotFoundError(`No resource is served at /${name}`);
    }

    const { definition, routes } = declared;
    const id = rest[0];
    if (id !== undefined) {
      state.resource = await resolveRecord(definition, id, state.passthru);
    }

    const route = selectRoute(routes, method, rest, { state, resource: definition });
    if (route.kind === "options") {
      return finish({ kind: "options", allow: route.allow });
    }

    if (!state.passthru && state.params.include.length > 0) {
      const primary = route.relationship
        ? definition.relationships.get(route.relationship.name)?.resource ?? definition.name
        : definition.name;
      this.assertIncludable(parseIncludes(state.params.include), primary);
    }

    const ctx = new RequestScope(
      state,
      {
        resourceName: definition.name,
        action: route.action,
        relationship: route.relationship,
        id,
      },
      this.config.logger
    );
    const run = async () =>
      finish({
        kind: "outcome",
        outcome: await route.respond(ctx, state.resource),
        action: route.action,
      });
    return route.mutating ? this.config.transaction(run) : run();
  }

  private async respond(
    dispatched: Dispatched,
    state: RequestState,
    basePath: string
  ): Promise<JsonApiResponse> {
    const headers: Record<string, string> = { "content-type": MIME_TYPE };

    if (dispatched.kind === "options") {
      headers.allow = dispatched.allow.join(", ");
      return { status: 204, headers };
    }

    const { outcome, action } = dispatched;
    if (outcome.kind === "empty") {
      return { status: 204, headers };
    }

    const records = outcome.kind === "many" ? outcome.records : [outcome.record];
    const entries = records
      .filter((record) => record !== null)
      .map((record): Entry => ({ record, object: this.encode(outcome.type, record, basePath) }));

    let data: DocumentData;
    if (outcome.linkage) {
      const identifiers = entries.map((entry) => identifier(entry.object));
      data = outcome.kind === "many" ? identifiers : identifiers[0] ?? null;
    } else {
      const objects = entries.map((entry) => entry.object);
      data = outcome.kind === "many" ? objects : objects[0] ?? null;
    }

    const included: ResourceObject[] = [];
    if (!outcome.linkage && state.params.include.length > 0) {
      const origin: Origin = { parent: this.resourceOf(state.path), parentAction: action };
      const seen = new Set(entries.map((entry) => `${entry.object.type}:${entry.object.id}`));
      await this.expandIncludes(
        parseIncludes(state.params.include),
        outcome.type,
        entries,
        { state, origin, basePath, seen, included }
      );
    }

    const status = outcome.kind === "one" ? outcome.status : 200;
    const location = status === 201 ? entries[0]?.object.links?.self : undefined;
    if (location) headers.location = location;

    const document = this.config.serializer.serializeSuccess({
      data,
      included,
      self: `${basePath}${state.path}`,
      params: state.params,
    });
    return { status, headers, body: JSON.stringify(document) };
  }

  // ---------------------------------------------------------------------------
  // Includes
  // ---------------------------------------------------------------------------

  /** Throws 400 for a relationship path that is not declared, before any handler runs */
  private assertIncludable(tree: IncludeTree, type: string): void {
    const definition = this.resources.get(type)?.definition;
    for (const [rel, subtree] of tree) {
      const relationship = definition?.relationships.get(rel);
      if (!relationship) throw unknownInclude(rel, type);
      if (subtree.size > 0) this.assertIncludable(subtree, relationship.resource);
    }
  }

  /**
   * For each requested relationship, fetches the related records of every
   * entry through an internal GET of /{type}/{id}/{rel}, carrying the
   * entry's record so the lookup is not repeated. Failures of those
   * fetches fail the request.
   */
  private async expandIncludes(
    tree: IncludeTree,
    type: string,
    entries: readonly Entry[],
    expansion: {
      state: RequestState;
      origin: Origin;
      basePath: string;
      seen: Set<string>;
      included: ResourceObject[];
    }
  ): Promise<void> {
    const definition = this.resources.get(type)?.definition;

    for (const [rel, subtree] of tree) {
      const relationship = definition?.relationships.get(rel);
      if (!relationship) throw unknownInclude(rel, type);

      const children: Entry[] = [];
      for (const entry of entries) {
        const related = await this.fetchRelated(expansion.state, type, entry, rel, expansion.origin);
        const objects = related.map((record): Entry => ({
          record,
          object: this.encode(relationship.resource, record, expansion.basePath),
        }));

        const linkage = objects.map((child) => identifier(child.object));
        setLinkage(
          entry.object,
          rel,
          relationship.type === "hasOne" ? linkage[0] ?? null : linkage
        );

        for (const child of objects) {
          const key = `${child.object.type}:${child.object.id}`;
          if (expansion.seen.has(key)) continue;
          expansion.seen.add(key);
          expansion.included.push(child.object);
          children.push(child);
        }
      }

      if (subtree.size > 0) {
        await this.expandIncludes(subtree, relationship.resource, children, expansion);
      }
    }
  }

  private async fetchRelated(
    state: RequestState,
    type: string,
    entry: Entry,
    rel: string,
    origin: Origin
  ): Promise<readonly unknown[]> {
    const segments = [type, entry.object.id, rel];
    const child = state.derive(`/${segments.join("/")}`, { ...origin, resource: entry.record });
    const dispatched = await this.dispatch(child, "GET", segments, async (result) => result);

    if (dispatched.kind !== "outcome") return [];
    const { outcome } = dispatched;
    if (outcome.kind === "many") return outcome.records;
    if (outcome.kind === "one" && outcome.record !== null) return [outcome.record];
    return [];
  }

  // ---------------------------------------------------------------------------
  // Encoding & errors
  // ---------------------------------------------------------------------------

  private encode(type: string, record: unknown, basePath: string): ResourceObject {
    const definition = this.resources.get(type)?.definition;
    const encoded = definition ? definition.encoder.encode(record) : defaultEncoder(record);
    return toResourceObject(type, encoded, {
      basePath,
      relationships: definition ? Array.from(definition.relationships.keys()) : [],
    });
  }

  private resourceOf(path: string): string {
    return splitPath(path)[0] ?? "";
  }

  private normalizeError(
    error: unknown,
    request: Pick<JsonApiRequest, "method" | "path">
  ): ErrorInstance[] {
    if (error instanceof HttpError) return [error];

    const mapped = this.config.statusFor(error);
    if (mapped !== undefined) {
      const message = error instanceof Error ? error.message : undefined;
      return [errorForStatus(mapped, message) ?? new HttpError(mapped, message)];
    }

    if (error instanceof ZodError) {
      return error.issues.map(
        (issue) =>
          new UnprocessableEntityError(issue.message, {
            source: {
              pointer: ["/data/attributes", ...issue.path.map((part) => dasherize(String(part)))].join("/"),
            },
          })
      );
    }

    const fault = error instanceof Error ? error : new Error(String(error));
    captureException(fault, { method: request.method, path: request.path });
    this.config.logger.error("Request failed", {
      event: "request.failed",
      method: request.method,
      path: request.path,
      error: fault.message,
    });
    return [new HttpError(500, UNEXPECTED_DETAIL)];
  }
}

/** Creates an engine with a fresh configuration */
export function createJsonApi(options: ConfigOptions = {}): JsonApi {
  return new JsonApi(new Config(options));
}
