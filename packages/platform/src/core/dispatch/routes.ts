/**
 * Route Chain
 *
 * The standard routes of a resource, in the order they are tried:
 *
 *   OPTIONS  /posts
 *   GET      /posts                            index (filtered variants first)
 *   POST     /posts                            create
 *   OPTIONS  /posts/:id
 *   GET      /posts/:id                        show
 *   PATCH    /posts/:id                        update
 *   DELETE   /posts/:id                        destroy
 *
 * and per relationship, to-one:
 *
 *   GET      /posts/:id/author                 pluck
 *   GET      /posts/:id/relationships/author   pluck (linkage)
 *   PATCH    /posts/:id/relationships/author   prune when data is null, graft otherwise
 *
 * to-many:
 *
 *   GET      /posts/:id/comments                 fetch
 *   GET      /posts/:id/relationships/comments   fetch (linkage)
 *   PATCH    /posts/:id/relationships/comments   clear when data is [], replace otherwise
 *   POST     /posts/:id/relationships/comments   merge
 *   DELETE   /posts/:id/relationships/comments   subtract
 */

import {
  MUTATING_ACTIONS,
  type Action,
  type HandlerContext,
  type PrimaryData,
  type RelationshipRef,
} from "@resourceful/contracts";
import { MethodNotAllowedError, NotFoundError } from "../errors/index.js";
import type {
  CollectionBinding,
  MemberBinding,
  RelationshipDefinition,
  ResourceDefinition,
} from "../resource/definition.js";
import { actions, handles, nullif, pfilters, type Condition } from "./guards.js";
import {
  ID_SEGMENT,
  type ActionRoute,
  type HttpMethod,
  type Outcome,
  type Route,
  type RoutePattern,
} from "./router.js";

type Resource = ResourceDefinition<unknown>;

const EMPTY: Outcome = { kind: "empty" };

const isNull = (data: PrimaryData): boolean => data === null;
const isEmptyList = (data: PrimaryData): boolean => Array.isArray(data) && data.length === 0;

function one(type: string, record: unknown, status: 200 | 201 = 200, linkage = false): Outcome {
  return { kind: "one", status, type, record: record ?? null, linkage };
}

function many(type: string, result: unknown, linkage = false): Outcome {
  if (!Array.isArray(result)) {
    throw new TypeError(`Handler for "${type}" must return an array`);
  }
  return { kind: "many", type, records: result, linkage };
}

function notAvailable(resource: Resource, action: Action): MethodNotAllowedError {
  return new MethodNotAllowedError(`Action '${action}' is not available on '${resource.name}'`);
}

function collectionRoute(
  method: HttpMethod,
  action: Action,
  conditions: readonly Condition[],
  respond: (ctx: HandlerContext) => Promise<Outcome>
): ActionRoute {
  return {
    kind: "action",
    method,
    pattern: [],
    action,
    conditions,
    mutating: MUTATING_ACTIONS.has(action),
    respond: (ctx) => respond(ctx),
  };
}

function memberRoute(
  method: HttpMethod,
  pattern: RoutePattern,
  action: Action,
  conditions: readonly Condition[],
  respond: (ctx: HandlerContext, record: unknown) => Promise<Outcome>,
  relationship?: RelationshipRef
): ActionRoute {
  return {
    kind: "action",
    method,
    pattern,
    action,
    relationship,
    conditions,
    mutating: MUTATING_ACTIONS.has(action),
    respond,
  };
}

function optionsRoute(pattern: RoutePattern, allow: ReadonlyArray<[HttpMethod, boolean]>): Route {
  return {
    kind: "options",
    method: "OPTIONS",
    pattern,
    allow: ["OPTIONS", ...allow.filter(([, enabled]) => enabled).map(([method]) => method)],
  };
}

function invokeMember(
  binding: MemberBinding<unknown> | undefined,
  resource: Resource,
  action: Action,
  ctx: HandlerContext,
  record: unknown
): Promise<unknown> {
  if (!binding) throw notAvailable(resource, action);
  return binding.invoke(ctx, record);
}

function invokeCollection(
  binding: CollectionBinding | undefined,
  resource: Resource,
  action: Action,
  ctx: HandlerContext
): Promise<unknown> {
  if (!binding) throw notAvailable(resource, action);
  return binding.invoke(ctx);
}

function collectionRoutes(resource: Resource): Route[] {
  const routes: Route[] = [
    optionsRoute([], [
      ["GET", resource.actions.has("index")],
      ["POST", resource.actions.has("create")],
    ]),
  ];

  for (const variant of resource.filteredIndexes) {
    routes.push(
      collectionRoute("GET", "index", [pfilters(...variant.filters), actions("index")], async (ctx) =>
        many(resource.name, await variant.binding.invoke(ctx))
      )
    );
  }

  routes.push(
    collectionRoute("GET", "index", [actions("index")], async (ctx) =>
      many(resource.name, await invokeCollection(resource.index, resource, "index", ctx))
    ),
    collectionRoute("POST", "create", [actions("create")], async (ctx) =>
      one(resource.name, await invokeCollection(resource.create, resource, "create", ctx), 201)
    )
  );

  return routes;
}

function memberRoutes(resource: Resource): Route[] {
  const pattern = [ID_SEGMENT];
  const member = (action: Action) => resource.member.get(action);

  return [
    optionsRoute(pattern, [
      ["GET", resource.actions.has("show")],
      ["PATCH", resource.actions.has("update")],
      ["DELETE", resource.actions.has("destroy")],
    ]),
    memberRoute("GET", pattern, "show", [actions("show")], async (ctx, record) => {
      const shown = await invokeMember(member("show"), resource, "show", ctx, record);
      if (shown === null || shown === undefined) {
        throw new NotFoundError(`Resource '${ctx.id}' not found`);
      }
      return one(resource.name, shown);
    }),
    memberRoute("PATCH", pattern, "update", [actions("update")], async (ctx, record) => {
      const updated = await invokeMember(member("update"), resource, "update", ctx, record);
      return updated === undefined ? EMPTY : one(resource.name, updated);
    }),
    memberRoute("DELETE", pattern, "destroy", [actions("destroy")], async (ctx, record) => {
      await invokeMember(member("destroy"), resource, "destroy", ctx, record);
      return EMPTY;
    }),
  ];
}

function relationshipRoutes(
  resource: Resource,
  relationship: RelationshipDefinition<unknown>
): Route[] {
  const ref: RelationshipRef = { type: relationship.type, name: relationship.name };
  const related = [ID_SEGMENT, relationship.name];
  const linkage = [ID_SEGMENT, "relationships", relationship.name];
  const has = (action: Action) => handles(resource, action, ref);
  const run = (action: Action, ctx: HandlerContext, record: unknown) =>
    invokeMember(relationship.handlers.get(action), resource, action, ctx, record);

  const route = (
    method: HttpMethod,
    pattern: RoutePattern,
    action: Action,
    conditions: readonly Condition[],
    respond: (ctx: HandlerContext, record: unknown) => Promise<Outcome>
  ) => memberRoute(method, pattern, action, conditions, respond, ref);

  const mutate = (method: HttpMethod, action: Action, conditions: readonly Condition[]) =>
    route(method, linkage, action, [...conditions, actions(action)], async (ctx, record) => {
      await run(action, ctx, record);
      return EMPTY;
    });

  if (relationship.type === "hasOne") {
    return [
      optionsRoute(related, [["GET", has("pluck")]]),
      optionsRoute(linkage, [
        ["GET", has("pluck")],
        ["PATCH", has("prune") || has("graft")],
      ]),
      route("GET", related, "pluck", [actions("pluck")], async (ctx, record) =>
        one(relationship.resource, await run("pluck", ctx, record))
      ),
      route("GET", linkage, "pluck", [actions("pluck")], async (ctx, record) =>
        one(relationship.resource, await run("pluck", ctx, record), 200, true)
      ),
      mutate("PATCH", "prune", [nullif(isNull)]),
      mutate("PATCH", "graft", [nullif((data) => !isNull(data))]),
    ];
  }

  return [
    optionsRoute(related, [["GET", has("fetch")]]),
    optionsRoute(linkage, [
      ["GET", has("fetch")],
      ["PATCH", has("clear") || has("replace")],
      ["POST", has("merge")],
      ["DELETE", has("subtract")],
    ]),
    route("GET", related, "fetch", [actions("fetch")], async (ctx, record) =>
      many(relationship.resource, await run("fetch", ctx, record))
    ),
    route("GET", linkage, "fetch", [actions("fetch")], async (ctx, record) =>
      many(relationship.resource, await run("fetch", ctx, record), true)
    ),
    mutate("PATCH", "clear", [nullif(isEmptyList)]),
    mutate("PATCH", "replace", [nullif((data) => !isEmptyList(data))]),
    mutate("POST", "merge", []),
    mutate("DELETE", "subtract", []),
  ];
}

/** Builds the ordered route chain for a declared resource */
export function buildRoutes(resource: Resource): Route[] {
  return [
    ...collectionRoutes(resource),
    ...memberRoutes(resource),
    ...Array.from(resource.relationships.values()).flatMap((relationship) =>
      relationshipRoutes(resource, relationship)
    ),
  ];
}
