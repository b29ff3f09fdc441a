/**
 * Router
 *
 * Each resource owns an ordered chain of routes. For a request, the chain
 * is walked front to back and the first route whose method, path and
 * every guard match is selected.
 *
 * When nothing is selected:
 *   - the error of the last guard that failed with one surfaces
 *   - otherwise 405 if some route matched the path under another method
 *   - otherwise 404
 */

import type {
  Action,
  HandlerContext,
  RelationshipRef,
} from "@resourceful/contracts";
import { MethodNotAllowedError, NotFoundError, type HttpError } from "../errors/index.js";
import { evaluate, type Condition, type GuardInput } from "./guards.js";

export type HttpMethod = "GET" | "POST" | "PATCH" | "DELETE" | "OPTIONS";

/** Path segments after /{resource}; ":id" matches any single segment */
export type RoutePattern = readonly string[];

export const ID_SEGMENT = ":id";

/** What a handler produced, before encoding */
export type Outcome =
  | {
      readonly kind: "one";
      readonly status: 200 | 201;
      /** Resource the record belongs to */
      readonly type: string;
      readonly record: unknown;
      /** Serve identifiers instead of resource objects */
      readonly linkage: boolean;
    }
  | {
      readonly kind: "many";
      readonly type: string;
      readonly records: readonly unknown[];
      readonly linkage: boolean;
    }
  | { readonly kind: "empty" };

export interface ActionRoute {
  readonly kind: "action";
  readonly method: HttpMethod;
  readonly pattern: RoutePattern;
  readonly action: Action;
  readonly relationship?: RelationshipRef;
  readonly conditions: readonly Condition[];

  /** Runs inside the configured transaction hook */
  readonly mutating: boolean;

  respond(ctx: HandlerContext, record: unknown): Promise<Outcome>;
}

export interface OptionsRoute {
  readonly kind: "options";
  readonly method: "OPTIONS";
  readonly pattern: RoutePattern;

  /** Methods with a registered handler on this path */
  readonly allow: readonly string[];
}

export type Route = ActionRoute | OptionsRoute;

export function matchesPath(pattern: RoutePattern, segments: readonly string[]): boolean {
  return (
    pattern.length === segments.length &&
    pattern.every((part, i) => part === ID_SEGMENT || part === segments[i])
  );
}

export function selectRoute(
  routes: readonly Route[],
  method: string,
  segments: readonly string[],
  input: Omit<GuardInput, "relationship">
): Route {
  let pathMatched = false;
  let lastError: HttpError | undefined;

  for (const route of routes) {
    if (!matchesPath(route.pattern, segments)) continue;
    pathMatched = true;
    if (route.method !== method) continue;
    if (route.kind === "options") return route;

    const outcome = evaluate(route.conditions, { ...input, relationship: route.relationship });
    if (outcome.matched) return route;
    if (outcome.error) lastError = outcome.error;
  }

  if (lastError) throw lastError;

  const path = ["", input.resource.name, ...segments].join("/");
  if (pathMatched) {
    throw new MethodNotAllowedError(`${method} is not allowed on ${path}`);
  }
  throw new NotFoundError(`No route matches ${method} ${path}`);
}
