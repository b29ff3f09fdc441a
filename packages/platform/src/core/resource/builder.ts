/**
 * Resource Builder
 *
 * The object a declaration body receives. Each call records a handler
 * under its action and writes the handler's `roles` and `sideloadOn`
 * options into the configuration's tables. Handlers are wrapped so the
 * engine can call every action the same way: the wrapper pulls the
 * attributes, client id or linkage out of the request payload.
 */

import { z } from "zod";
import {
  resourceIdentifierSchema,
  type Action,
  type ActionOptions,
  type CreateHandler,
  type Encoder,
  type FetchHandler,
  type Finder,
  type GraftHandler,
  type HandlerContext,
  type HasManyBuilder,
  type HasOneBuilder,
  type IndexHandler,
  type IndexOptions,
  type LinkageHandler,
  type MemberHandler,
  type PluckHandler,
  type RelationshipOptions,
  type RelationshipRef,
  type RelationshipType,
  type ResourceBuilder,
  type ResourceIdentifier,
  type ShowHandler,
  type UpdateHandler,
} from "@resourceful/contracts";
import type { Config } from "../registry/config.js";
import { BadRequestError, ConfigurationError, ConflictError } from "../errors/index.js";
import { defaultEncoder } from "../serializer/encode.js";
import { canonicalizeResourceName, dasherize } from "./naming.js";
import type {
  CollectionBinding,
  IndexVariant,
  MemberBinding,
  RecordEncoder,
  RecordFinder,
  RelationshipDefinition,
  ResourceDefinition,
} from "./definition.js";

const linkageListSchema = z.array(resourceIdentifierSchema);

/** The id a client generated for a new resource, if it sent one */
function clientId(ctx: HandlerContext): string | undefined {
  const data = ctx.data();
  return data !== null && !Array.isArray(data) ? data.id : undefined;
}

function assertLinkageType(linkage: ResourceIdentifier, relatedType: string): void {
  if (linkage.type !== relatedType) {
    throw new ConflictError("Resource type in linkage does not match relationship");
  }
}

/** The payload of a to-one relationship update, as a resource identifier */
export function readLinkage(ctx: HandlerContext, relatedType: string): ResourceIdentifier {
  const parsed = resourceIdentifierSchema.safeParse(ctx.data());
  if (!parsed.success) {
    throw new BadRequestError("Expected a resource identifier as primary data");
  }
  assertLinkageType(parsed.data, relatedType);
  return parsed.data;
}

/** The payload of a to-many relationship update, as resource identifiers */
export function readLinkageList(
  ctx: HandlerContext,
  relatedType: string
): ResourceIdentifier[] {
  const parsed = linkageListSchema.safeParse(ctx.data());
  if (!parsed.success) {
    throw new BadRequestError("Expected an array of resource identifiers as primary data");
  }
  for (const linkage of parsed.data) assertLinkageType(linkage, relatedType);
  return parsed.data;
}

class RelationshipBuilder<TRecord> {
  readonly handlers = new Map<Action, MemberBinding<TRecord>>();

  constructor(
    private readonly owner: ResourceBuilderImpl<TRecord>,
    readonly ref: RelationshipRef,
    readonly resource: string
  ) {}

  add(action: Action, binding: MemberBinding<TRecord>, options: ActionOptions = {}): void {
    this.handlers.set(action, binding);
    this.owner.permit(action, options, this.ref);
  }

  build(): RelationshipDefinition<TRecord> {
    return {
      type: this.ref.type,
      name: this.ref.name,
      resource: this.resource,
      handlers: this.handlers,
    };
  }
}

class HasOneBuilderImpl<TRecord> implements HasOneBuilder<TRecord> {
  constructor(private readonly relationship: RelationshipBuilder<TRecord>) {}

  pluck(handler: PluckHandler<TRecord>, options?: ActionOptions): void {
    this.relationship.add("pluck", { invoke: async (ctx, record) => handler(ctx, record) }, options);
  }

  prune(handler: MemberHandler<TRecord>, options?: ActionOptions): void {
    this.relationship.add("prune", { invoke: async (ctx, record) => handler(ctx, record) }, options);
  }

  graft(handler: GraftHandler<TRecord>, options?: ActionOptions): void {
    const related = this.relationship.resource;
    this.relationship.add(
      "graft",
      { invoke: async (ctx, record) => handler(ctx, record, readLinkage(ctx, related)) },
      options
    );
  }
}

class HasManyBuilderImpl<TRecord> implements HasManyBuilder<TRecord> {
  constructor(private readonly relationship: RelationshipBuilder<TRecord>) {}

  fetch(handler: FetchHandler<TRecord>, options?: ActionOptions): void {
    this.relationship.add("fetch", { invoke: async (ctx, record) => handler(ctx, record) }, options);
  }

  clear(handler: MemberHandler<TRecord>, options?: ActionOptions): void {
    this.relationship.add("clear", { invoke: async (ctx, record) => handler(ctx, record) }, options);
  }

  replace(handler: LinkageHandler<TRecord>, options?: ActionOptions): void {
    this.addLinkage("replace", handler, options);
  }

  merge(handler: LinkageHandler<TRecord>, options?: ActionOptions): void {
    this.addLinkage("merge", handler, options);
  }

  subtract(handler: LinkageHandler<TRecord>, options?: ActionOptions): void {
    this.addLinkage("subtract", handler, options);
  }

  private addLinkage(
    action: Action,
    handler: LinkageHandler<TRecord>,
    options: ActionOptions | undefined
  ): void {
    const related = this.relationship.resource;
    this.relationship.add(
      action,
      { invoke: async (ctx, record) => handler(ctx, record, readLinkageList(ctx, related)) },
      options
    );
  }
}

export class ResourceBuilderImpl<TRecord> implements ResourceBuilder<TRecord> {
  private finder: RecordFinder<TRecord> | undefined;
  private encoder: RecordEncoder<TRecord> = { encode: defaultEncoder };
  private readonly filteredIndexes: IndexVariant[] = [];
  private plainIndex: CollectionBinding | undefined;
  private createBinding: CollectionBinding | undefined;
  private readonly member = new Map<Action, MemberBinding<TRecord>>();
  private readonly relationships = new Map<string, RelationshipBuilder<TRecord>>();
  private readonly actions = new Set<Action>();

  constructor(
    readonly name: string,
    private readonly config: Config
  ) {}

  find(finder: Finder<TRecord>): void {
    this.finder = { find: finder };
  }

  encode(encoder: Encoder<TRecord>): void {
    this.encoder = { encode: encoder };
  }

  index(handler: IndexHandler<TRecord>, options: IndexOptions = {}): void {
    const binding: CollectionBinding = { invoke: async (ctx) => handler(ctx) };
    const filters = options.filters ?? [];
    if (filters.length > 0) {
      this.filteredIndexes.push({ filters, binding });
    } else {
      this.plainIndex = binding;
    }
    this.actions.add("index");
    this.permit("index", options);
  }

  show(handler: ShowHandler<TRecord>, options?: ActionOptions): void {
    this.addMember("show", { invoke: async (ctx, record) => handler(ctx, record) }, options);
  }

  create(handler: CreateHandler<TRecord>, options: ActionOptions = {}): void {
    this.createBinding = {
      invoke: async (ctx) => {
        ctx.sanityCheck();
        return handler(ctx, ctx.attributes(), clientId(ctx));
      },
    };
    this.actions.add("create");
    this.permit("create", options);
  }

  update(handler: UpdateHandler<TRecord>, options?: ActionOptions): void {
    this.addMember(
      "update",
      {
        invoke: async (ctx, record) => {
          ctx.sanityCheck(ctx.id);
          return handler(ctx, record, ctx.attributes());
        },
      },
      options
    );
  }

  destroy(handler: MemberHandler<TRecord>, options?: ActionOptions): void {
    this.addMember("destroy", { invoke: async (ctx, record) => handler(ctx, record) }, options);
  }

  hasOne(
    name: string,
    body: (relationship: HasOneBuilder<TRecord>) => void,
    options?: RelationshipOptions
  ): void {
    body(new HasOneBuilderImpl(this.relationship("hasOne", name, options)));
  }

  hasMany(
    name: string,
    body: (relationship: HasManyBuilder<TRecord>) => void,
    options?: RelationshipOptions
  ): void {
    body(new HasManyBuilderImpl(this.relationship("hasMany", name, options)));
  }

  /** Writes an action's options into the role and sideload tables */
  permit(action: Action, options: ActionOptions, relationship?: RelationshipRef): void {
    if (options.roles) {
      this.config.resourceRoles.permit(this.name, action, options.roles, relationship);
    }
    if (options.sideloadOn) {
      this.config.resourceSideload.permit(
        this.name,
        action,
        options.sideloadOn.map(canonicalizeResourceName)
      );
    }
  }

  build(): ResourceDefinition<TRecord> {
    return {
      name: this.name,
      finder: this.finder,
      encoder: this.encoder,
      filteredIndexes: this.filteredIndexes,
      index: this.plainIndex,
      create: this.createBinding,
      member: this.member,
      relationships: new Map(
        Array.from(
          this.relationships,
          ([name, builder]): [string, RelationshipDefinition<TRecord>] => [name, builder.build()]
        )
      ),
      actions: this.actions,
    };
  }

  private addMember(
    action: Action,
    binding: MemberBinding<TRecord>,
    options: ActionOptions = {}
  ): void {
    this.member.set(action, binding);
    this.actions.add(action);
    this.permit(action, options);
  }

  private relationship(
    type: RelationshipType,
    rawName: string,
    options: RelationshipOptions = {}
  ): RelationshipBuilder<TRecord> {
    const name = dasherize(rawName);
    if (!name) {
      throw new ConfigurationError(`Invalid relationship name on "${this.name}": "${rawName}"`);
    }

    const existing = this.relationships.get(name);
    if (existing) {
      if (existing.ref.type !== type) {
        throw new ConfigurationError(
          `Relationship "${name}" on "${this.name}" is already declared as ${existing.ref.type}`
        );
      }
      return existing;
    }

    const created = new RelationshipBuilder(
      this,
      { type, name },
      canonicalizeResourceName(options.resource ?? rawName)
    );
    this.relationships.set(name, created);
    return created;
  }
}
