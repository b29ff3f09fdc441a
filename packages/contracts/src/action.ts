/**
 * Actions
 *
 * An Action names a handler responsibility, independent of the HTTP verb
 * that triggers it. Resource-level actions act on a collection or a member;
 * relationship actions act on a single to-one or to-many relationship of a
 * member.
 *
 *   Resource:  index, show, create, update, destroy
 *   To-one:    pluck (read), prune (clear), graft (set)
 *   To-many:   fetch (read), clear, replace, merge (add), subtract (remove)
 */

export const RESOURCE_ACTIONS = [
  "index",
  "show",
  "create",
  "update",
  "destroy",
] as const;

export const HAS_ONE_ACTIONS = ["pluck", "prune", "graft"] as const;

export const HAS_MANY_ACTIONS = [
  "fetch",
  "clear",
  "replace",
  "merge",
  "subtract",
] as const;

export type ResourceAction = (typeof RESOURCE_ACTIONS)[number];
export type HasOneAction = (typeof HAS_ONE_ACTIONS)[number];
export type HasManyAction = (typeof HAS_MANY_ACTIONS)[number];

/** Any action the engine can guard and dispatch */
export type Action = ResourceAction | HasOneAction | HasManyAction;

/** Actions that change state. The engine runs these inside the transaction hook. */
export const MUTATING_ACTIONS: ReadonlySet<Action> = new Set<Action>([
  "create",
  "update",
  "destroy",
  "prune",
  "graft",
  "clear",
  "replace",
  "merge",
  "subtract",
]);

const ALL_ACTIONS: ReadonlySet<string> = new Set<string>([
  ...RESOURCE_ACTIONS,
  ...HAS_ONE_ACTIONS,
  ...HAS_MANY_ACTIONS,
]);

/** Narrows an arbitrary string to a known Action. */
export function isAction(value: string): value is Action {
  return ALL_ACTIONS.has(value);
}
