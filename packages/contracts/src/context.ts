/**
 * Handler Context
 *
 * Provided by the platform to every handler invocation.
 * Carries the normalized query, the caller's role, the parsed payload and
 * the capability checks bound to the resource being served.
 *
 * The domain NEVER constructs this — the platform does.
 */

import type { Action } from "./action.js";
import type { PrimaryData } from "./document.js";
import type { CallerRole, Role } from "./permission.js";
import type { RelationshipRef, RelationshipType } from "./relationship.js";

/**
 * Structured logger provided to handlers.
 * Handlers should use this instead of console.log.
 */
export interface Logger {
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  debug(message: string, data?: Record<string, unknown>): void;
}

/** Incoming header values as Node delivers them */
export type RequestHeaders = Readonly<
  Record<string, string | string[] | undefined>
>;

/**
 * The standard query parameter groups, always present.
 * Missing groups are normalized to empty values before any handler runs.
 */
export interface QueryParams {
  /** Sparse fieldsets: fields[posts]=title,body → { posts: ["title", "body"] } */
  fields: Record<string, string[]>;

  /** include=author,comments.author → ["author", "comments.author"] */
  include: string[];

  /** filter[author]=9 → { author: "9" } */
  filter: Record<string, string>;

  /** page[number]=2 → { number: "2" } */
  page: Record<string, string>;

  /** Raw sort expression (e.g., "-created-at,title"); "" when absent */
  sort: string;
}

export interface HandlerContext {
  /** Canonical name of the resource serving this request */
  readonly resourceName: string;

  /** The action being dispatched */
  readonly action: Action;

  /** The relationship addressed by the request, if any */
  readonly relationship: RelationshipRef | undefined;

  /** The id path segment, if the request addresses a member */
  readonly id: string | undefined;

  /** Normalized query parameter groups */
  readonly params: QueryParams;

  readonly headers: RequestHeaders;

  /** Values the host framework attached to the request (e.g., an authenticated user) */
  readonly locals: Readonly<Record<string, unknown>>;

  readonly logger: Logger;

  /** The caller's role, resolved once per request */
  role(): CallerRole;

  /** True when the caller holds any of the given roles */
  hasRole(...roles: Role[]): boolean;

  /** Role-table check for this resource (optionally for one relationship) */
  can(action: Action, relType?: RelationshipType, rel?: string): boolean;

  /** True when this request is an internal fetch made on behalf of a parent */
  sideloaded(): boolean;

  /** True when this sideloaded request may perform the given action */
  sideload(action: Action): boolean;

  /** The request document's primary data (parsed once per request path) */
  data(): PrimaryData;

  /** Payload attributes with dasherized keys converted to camelCase */
  attributes(): Record<string, unknown>;

  /** Throws a 409 unless the payload's type (and id, when given) match the endpoint */
  sanityCheck(id?: string): void;

  /** Abort the request with the given status */
  halt(status: number, message?: string): never;

  /** Run a unit of work inside the configured transaction hook */
  transaction<T>(work: () => Promise<T>): Promise<T>;
}
