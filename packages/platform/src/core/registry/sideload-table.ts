/**
 * Sideload Table
 *
 * Per-resource record of which parent resources may perform an action on
 * a caller's behalf while building a larger response:
 *
 *   posts → { pluck: {posts}, fetch: {posts} }
 *
 * reads "a request for posts may sideload posts' pluck and fetch actions".
 * Permission from this table is never enough on its own — the caller must
 * also be allowed to perform the parent action (see dispatch/lookup.ts).
 */

import type { Action } from "@resourceful/contracts";
import { ConfigFrozenError } from "../errors/index.js";

/** Child action → parent resource names allowed to sideload it */
export type ResourceSideload = ReadonlyMap<Action, ReadonlySet<string>>;

const EMPTY: ResourceSideload = new Map();

export class SideloadTable {
  private readonly entries = new Map<string, Map<Action, Set<string>>>();
  private frozen = false;

  get isFrozen(): boolean {
    return this.frozen;
  }

  /** Returns the entry for a resource, creating it on first reference */
  entry(resourceName: string): ResourceSideload {
    return this.mutableEntry(resourceName);
  }

  /** Read-only lookup. Never creates an entry. */
  lookup(resourceName: string): ResourceSideload {
    return this.entries.get(resourceName) ?? EMPTY;
  }

  has(resourceName: string): boolean {
    return this.entries.has(resourceName);
  }

  /** Allows the given parents to sideload a child action. Additive. */
  permit(resourceName: string, child: Action, parents: Iterable<string>): void {
    if (this.frozen) {
      throw new ConfigFrozenError(`set sideload parents for "${resourceName}#${child}"`);
    }

    const entry = this.mutableEntry(resourceName);
    const allowed = entry.get(child) ?? new Set<string>();
    for (const parent of parents) allowed.add(parent);
    entry.set(child, allowed);
  }

  allows(resourceName: string, child: Action, parent: string): boolean {
    return this.lookup(resourceName).get(child)?.has(parent) ?? false;
  }

  freeze(): void {
    this.frozen = true;
  }

  private mutableEntry(resourceName: string): Map<Action, Set<string>> {
    const existing = this.entries.get(resourceName);
    if (existing) return existing;

    if (this.frozen) {
      throw new ConfigFrozenError(`add resource "${resourceName}" to the sideload table`);
    }

    const created = new Map<Action, Set<string>>();
    this.entries.set(resourceName, created);
    return created;
  }
}
