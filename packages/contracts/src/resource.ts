/**
 * Resource Declarations
 *
 * A resource is declared with a name and a body. The body receives a
 * ResourceBuilder and registers a finder, per-action handlers and
 * relationships. The platform canonicalizes the name ("Post" → "posts"),
 * wires the endpoints and guards every one of them with the role table.
 *
 * @example
 * export const PostResource = defineResource<Post>("Post", (posts) => {
 *   posts.find((id) => store.posts.get(id));
 *   posts.index(() => store.posts.all());
 *   posts.show((_ctx, post) => post);
 *   posts.destroy((_ctx, post) => store.posts.remove(post.id), { roles: ["admin"] });
 *   posts.hasOne("author", (author) => {
 *     author.pluck((_ctx, post) => store.people.get(post.authorId));
 *   }, { resource: "people" });
 * });
 */

import type { HandlerContext } from "./context.js";
import type { ResourceIdentifier } from "./document.js";
import type { Role } from "./permission.js";

export type Awaitable<T> = T | Promise<T>;

// ---------------------------------------------------------------------------
// Handler signatures
// ---------------------------------------------------------------------------

/** Looks a record up by its id path segment; absent means 404 */
export type Finder<TRecord> = (
  id: string
) => Awaitable<TRecord | null | undefined>;

/** Turns a record into the id/attributes pair of a resource object */
export type Encoder<TRecord> = (record: TRecord) => EncodedRecord;

export interface EncodedRecord {
  id: string | number;
  attributes?: Record<string, unknown>;
}

export type IndexHandler<TRecord> = (
  ctx: HandlerContext
) => Awaitable<readonly TRecord[]>;

/** Receives camelCased attributes and the client-generated id, if any */
export type CreateHandler<TRecord> = (
  ctx: HandlerContext,
  attributes: Record<string, unknown>,
  id: string | undefined
) => Awaitable<TRecord>;

export type ShowHandler<TRecord> = (
  ctx: HandlerContext,
  record: TRecord
) => Awaitable<TRecord | null | undefined>;

/** Returning a record answers 200 with it; returning nothing answers 204 */
export type UpdateHandler<TRecord> = (
  ctx: HandlerContext,
  record: TRecord,
  attributes: Record<string, unknown>
) => Awaitable<TRecord | void>;

export type MemberHandler<TRecord> = (
  ctx: HandlerContext,
  record: TRecord
) => Awaitable<void>;

/** Reads a to-one relationship: the related record, or null when empty */
export type PluckHandler<TRecord> = (
  ctx: HandlerContext,
  record: TRecord
) => Awaitable<unknown>;

/** Reads a to-many relationship */
export type FetchHandler<TRecord> = (
  ctx: HandlerContext,
  record: TRecord
) => Awaitable<readonly unknown[]>;

export type GraftHandler<TRecord> = (
  ctx: HandlerContext,
  record: TRecord,
  linkage: ResourceIdentifier
) => Awaitable<void>;

export type LinkageHandler<TRecord> = (
  ctx: HandlerContext,
  record: TRecord,
  linkage: readonly ResourceIdentifier[]
) => Awaitable<void>;

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface ActionOptions {
  /** Roles allowed to perform the action (omit for unrestricted) */
  roles?: readonly Role[];

  /** Parent resources allowed to sideload this action on the caller's behalf */
  sideloadOn?: readonly string[];
}

export interface IndexOptions extends ActionOptions {
  /**
   * Only route to this handler when every listed key is present in the
   * request's filter group. Filtered handlers are tried before the plain one.
   */
  filters?: readonly string[];
}

export interface RelationshipOptions {
  /** Raw name of the related resource (defaults to the relationship name) */
  resource?: string;
}

// ---------------------------------------------------------------------------
// Builders
// ---------------------------------------------------------------------------

export interface HasOneBuilder<TRecord> {
  pluck(handler: PluckHandler<TRecord>, options?: ActionOptions): void;
  prune(handler: MemberHandler<TRecord>, options?: ActionOptions): void;
  graft(handler: GraftHandler<TRecord>, options?: ActionOptions): void;
}

export interface HasManyBuilder<TRecord> {
  fetch(handler: FetchHandler<TRecord>, options?: ActionOptions): void;
  clear(handler: MemberHandler<TRecord>, options?: ActionOptions): void;
  replace(handler: LinkageHandler<TRecord>, options?: ActionOptions): void;
  merge(handler: LinkageHandler<TRecord>, options?: ActionOptions): void;
  subtract(handler: LinkageHandler<TRecord>, options?: ActionOptions): void;
}

export interface ResourceBuilder<TRecord> {
  /** Canonical resource name */
  readonly name: string;

  find(finder: Finder<TRecord>): void;
  encode(encoder: Encoder<TRecord>): void;

  index(handler: IndexHandler<TRecord>, options?: IndexOptions): void;
  show(handler: ShowHandler<TRecord>, options?: ActionOptions): void;
  create(handler: CreateHandler<TRecord>, options?: ActionOptions): void;
  update(handler: UpdateHandler<TRecord>, options?: ActionOptions): void;
  destroy(handler: MemberHandler<TRecord>, options?: ActionOptions): void;

  hasOne(
    name: string,
    body: (relationship: HasOneBuilder<TRecord>) => void,
    options?: RelationshipOptions
  ): void;

  hasMany(
    name: string,
    body: (relationship: HasManyBuilder<TRecord>) => void,
    options?: RelationshipOptions
  ): void;
}

export type ResourceBody<TRecord> = (resource: ResourceBuilder<TRecord>) => void;

/** Anything resources can be declared on (the platform's JsonApi) */
export interface ResourceHost {
  resource<TRecord>(rawName: string, body: ResourceBody<TRecord>): string;
}

/** A declaration the domain exports and the API registers at startup */
export interface ResourceDeclaration {
  /** Raw, human-supplied name */
  readonly name: string;

  /** Declares the resource on the host and returns its canonical name */
  register(host: ResourceHost): string;
}

/**
 * Helper function to declare a resource with type checking.
 * Use this in domain resource files for autocomplete on the record type.
 */
export function defineResource<TRecord>(
  name: string,
  body: ResourceBody<TRecord>
): ResourceDeclaration {
  return {
    name,
    register: (host) => host.resource<TRecord>(name, body),
  };
}
