/**
 * Guard Conditions
 *
 * Predicates attached to routes. A guard that fails never throws: it
 * reports "not matched", optionally with the error that should surface if
 * no later route matches either.
 *
 *   actions("destroy")          role check (or permitted sideload), then handler check
 *   pfilters("author")          every key present in the filter group
 *   nullif((data) => !data)     predicate over the parsed payload
 */

import type { Action, PrimaryData, RelationshipRef } from "@resourceful/contracts";
import {
  ForbiddenError,
  HttpError,
  MethodNotAllowedError,
} from "../errors/index.js";
import type { ResourceDefinition } from "../resource/definition.js";
import type { RequestState } from "../lifecycle/request-state.js";

export type GuardOutcome =
  | { readonly matched: true }
  | { readonly matched: false; readonly error?: HttpError };

/** What a guard sees when a route is being considered */
export interface GuardInput {
  readonly state: RequestState;
  readonly resource: ResourceDefinition<unknown>;
  readonly relationship: RelationshipRef | undefined;
}

export type Condition = (input: GuardInput) => GuardOutcome;

export const MATCHED: GuardOutcome = { matched: true };
export const SKIPPED: GuardOutcome = { matched: false };

/** Whether a handler is registered for the action (on the relationship, if any) */
export function handles(
  resource: ResourceDefinition<unknown>,
  action: Action,
  relationship?: RelationshipRef
): boolean {
  if (!relationship) return resource.actions.has(action);
  return resource.relationships.get(relationship.name)?.handlers.has(action) ?? false;
}

/**
 * Authorization comes first: an unauthorized caller gets 403 even when
 * no handler exists. An authorized one gets 405 when none does.
 */
export function actions(...names: Action[]): Condition {
  return ({ state, resource, relationship }) => {
    for (const name of names) {
      const authorized =
        state.can(resource.name, name, relationship?.type, relationship?.name) ||
        state.sideload(resource.name, name);

      if (!authorized) {
        return {
          matched: false,
          error: new ForbiddenError(`Not permitted to ${name} ${describe(resource, relationship)}`),
        };
      }

      if (!handles(resource, name, relationship)) {
        return {
          matched: false,
          error: new MethodNotAllowedError(
            `Action '${name}' is not available on ${describe(resource, relationship)}`
          ),
        };
      }
    }
    return MATCHED;
  };
}

export function pfilters(...keys: string[]): Condition {
  return ({ state }) =>
    keys.every((key) => Object.hasOwn(state.params.filter, key)) ? MATCHED : SKIPPED;
}

/** A payload that cannot be parsed fails the guard with its 400 */
export function nullif(predicate: (data: PrimaryData) => boolean): Condition {
  return ({ state }) => {
    try {
      return predicate(state.data()) ? MATCHED : SKIPPED;
    } catch (error) {
      if (error instanceof HttpError) return { matched: false, error };
      throw error;
    }
  };
}

/** Runs conditions in order and stops at the first that does not match */
export function evaluate(conditions: readonly Condition[], input: GuardInput): GuardOutcome {
  for (const condition of conditions) {
    const outcome = condition(input);
    if (!outcome.matched) return outcome;
  }
  return MATCHED;
}

function describe(
  resource: ResourceDefinition<unknown>,
  relationship: RelationshipRef | undefined
): string {
  return relationship ? `'${resource.name}' relationship '${relationship.name}'` : `'${resource.name}'`;
}
