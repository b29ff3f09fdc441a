/**
 * Resource Definitions
 *
 * What a declaration body leaves behind: the finder, the encoder, and
 * every handler the resource answers to, bound to a uniform calling
 * convention. The route chain is built from this.
 *
 * The record type only matters while a resource is being declared. The
 * engine stores every definition as ResourceDefinition<unknown>; the
 * method signatures below keep that widening assignable.
 */

import type {
  Action,
  Awaitable,
  EncodedRecord,
  HandlerContext,
  RelationshipType,
} from "@resourceful/contracts";

export interface RecordFinder<TRecord> {
  find(id: string): Awaitable<TRecord | null | undefined>;
}

export interface RecordEncoder<TRecord> {
  encode(record: TRecord): EncodedRecord;
}

/** A handler that runs without a resolved record (index, create) */
export interface CollectionBinding {
  invoke(ctx: HandlerContext): Promise<unknown>;
}

/** A handler that runs against the record the path's id resolved to */
export interface MemberBinding<TRecord> {
  invoke(ctx: HandlerContext, record: TRecord): Promise<unknown>;
}

export interface IndexVariant {
  /** Filter keys that must all be present; empty for the plain index */
  readonly filters: readonly string[];
  readonly binding: CollectionBinding;
}

export interface RelationshipDefinition<TRecord> {
  readonly type: RelationshipType;

  /** Dasherized relationship name, as it appears in paths */
  readonly name: string;

  /** Canonical name of the related resource */
  readonly resource: string;

  readonly handlers: ReadonlyMap<Action, MemberBinding<TRecord>>;
}

export interface ResourceDefinition<TRecord> {
  readonly name: string;
  readonly finder: RecordFinder<TRecord> | undefined;
  readonly encoder: RecordEncoder<TRecord>;

  /** Filtered variants in declaration order; the plain index, if any, is separate */
  readonly filteredIndexes: readonly IndexVariant[];
  readonly index: CollectionBinding | undefined;
  readonly create: CollectionBinding | undefined;

  /** show, update, destroy */
  readonly member: ReadonlyMap<Action, MemberBinding<TRecord>>;

  readonly relationships: ReadonlyMap<string, RelationshipDefinition<TRecord>>;

  /** Every resource-level action with a registered handler */
  readonly actions: ReadonlySet<Action>;
}
