/**
 * Request Scope
 *
 * The HandlerContext a handler receives: the request state, seen from the
 * resource and action the request was dispatched to.
 */

import type {
  Action,
  CallerRole,
  HandlerContext,
  Logger,
  PrimaryData,
  QueryParams,
  RelationshipRef,
  RelationshipType,
  RequestHeaders,
  Role,
} from "@resourceful/contracts";
import { Roles } from "../registry/role-table.js";
import {
  BadRequestError,
  ConflictError,
  HaltSignal,
  errorForStatus,
} from "../errors/index.js";
import { camelizeKeys } from "../resource/naming.js";
import type { RequestState } from "./request-state.js";

export interface DispatchTarget {
  resourceName: string;
  action: Action;
  relationship?: RelationshipRef;
  id?: string;
}

export class RequestScope implements HandlerContext {
  readonly resourceName: string;
  readonly action: Action;
  readonly relationship: RelationshipRef | undefined;
  readonly id: string | undefined;

  constructor(
    private readonly state: RequestState,
    target: DispatchTarget,
    readonly logger: Logger
  ) {
    this.resourceName = target.resourceName;
    this.action = target.action;
    this.relationship = target.relationship;
    this.id = target.id;
  }

  get params(): QueryParams {
    return this.state.params;
  }

  get headers(): RequestHeaders {
    return this.state.headers;
  }

  get locals(): Readonly<Record<string, unknown>> {
    return this.state.locals;
  }

  role(): CallerRole {
    return this.state.callerRole();
  }

  hasRole(...roles: Role[]): boolean {
    return new Roles(roles).matches(this.state.callerRole());
  }

  can(action: Action, relType?: RelationshipType, rel?: string): boolean {
    return this.state.can(this.resourceName, action, relType, rel);
  }

  sideloaded(): boolean {
    return this.state.sideloaded();
  }

  sideload(action: Action): boolean {
    return this.state.sideload(this.resourceName, action);
  }

  data(): PrimaryData {
    return this.state.data();
  }

  attributes(): Record<string, unknown> {
    const data = this.data();
    if (data === null || Array.isArray(data)) return {};
    return camelizeKeys(data.attributes ?? {});
  }

  sanityCheck(id?: string): void {
    const data = this.data();
    if (data === null || Array.isArray(data)) {
      throw new BadRequestError("Expected a resource object as primary data");
    }
    if (data.type !== this.resourceName) {
      throw new ConflictError("Resource type in payload does not match endpoint");
    }
    if (id !== undefined && data.id !== id) {
      throw new ConflictError("Resource ID in payload does not match endpoint");
    }
  }

  halt(status: number, message?: string): never {
    throw errorForStatus(status, message) ?? new HaltSignal(status, message);
  }

  transaction<T>(work: () => Promise<T>): Promise<T> {
    return this.state.config.transaction(work);
  }
}
