/**
 * Role Table
 *
 * Per-resource record of which roles may perform which action:
 *
 *   posts → resource: { destroy: {admin} }
 *           hasOne:   { author: { graft: {admin, editor} } }
 *           hasMany:  { comments: { merge: {*} } }
 *
 * A missing or empty role set means "everyone". Entries are created
 * lazily the first time a resource is referenced during declaration and
 * can only be written until the owning Config is frozen.
 */

import {
  ANY_ROLE,
  type Action,
  type CallerRole,
  type RelationshipType,
  type Role,
} from "@resourceful/contracts";
import { ConfigFrozenError } from "../errors/index.js";

/**
 * An immutable set of roles with the matching rule the engine uses.
 */
export class Roles {
  private readonly members: ReadonlySet<Role>;

  constructor(roles: Iterable<Role> = []) {
    this.members = new Set(roles);
  }

  static of(...roles: Role[]): Roles {
    return new Roles(roles);
  }

  get size(): number {
    return this.members.size;
  }

  has(role: Role): boolean {
    return this.members.has(role);
  }

  toArray(): Role[] {
    return Array.from(this.members);
  }

  /**
   * True when the caller's role (or any of their roles) is in the set.
   * The wildcard admits any caller holding at least one role.
   */
  matches(callerRole: CallerRole): boolean {
    if (callerRole === null) return false;
    const held = typeof callerRole === "string" ? [callerRole] : callerRole;
    if (held.length === 0) return false;
    if (this.members.has(ANY_ROLE)) return true;
    return held.some((role) => this.members.has(role));
  }
}

/** Action → allowed roles */
export type ActionRoles = ReadonlyMap<Action, Roles>;

/** Everything the role table knows about one resource */
export interface ResourceRoles {
  readonly resource: ActionRoles;
  readonly hasOne: ReadonlyMap<string, ActionRoles>;
  readonly hasMany: ReadonlyMap<string, ActionRoles>;
}

interface MutableResourceRoles {
  resource: Map<Action, Roles>;
  hasOne: Map<string, Map<Action, Roles>>;
  hasMany: Map<string, Map<Action, Roles>>;
}

/** Returned by lookup() for resources the table has never seen */
const UNRESTRICTED: ResourceRoles = {
  resource: new Map(),
  hasOne: new Map(),
  hasMany: new Map(),
};

export class RoleTable {
  private readonly entries = new Map<string, MutableResourceRoles>();
  private frozen = false;

  get isFrozen(): boolean {
    return this.frozen;
  }

  /**
   * Returns the entry for a resource, creating the default (unrestricted)
   * entry on first reference. After freeze, creating one throws.
   */
  entry(resourceName: string): ResourceRoles {
    return this.mutableEntry(resourceName);
  }

  /** Read-only lookup. Never creates an entry. */
  lookup(resourceName: string): ResourceRoles {
    return this.entries.get(resourceName) ?? UNRESTRICTED;
  }

  has(resourceName: string): boolean {
    return this.entries.has(resourceName);
  }

  /**
   * Restricts an action to the given roles, at resource level or on one
   * relationship. Replaces any roles previously declared for it.
   */
  permit(
    resourceName: string,
    action: Action,
    roles: Iterable<Role>,
    relationship?: { type: RelationshipType; name: string }
  ): void {
    if (this.frozen) {
      throw new ConfigFrozenError(`set roles for "${resourceName}#${action}"`);
    }

    const entry = this.mutableEntry(resourceName);
    if (!relationship) {
      entry.resource.set(action, new Roles(roles));
      return;
    }

    const byName = entry[relationship.type];
    const actions = byName.get(relationship.name) ?? new Map<Action, Roles>();
    actions.set(action, new Roles(roles));
    byName.set(relationship.name, actions);
  }

  /**
   * Resolves the role set governing an action. With a relationship, the
   * relationship's own entry wins; a missing one falls back to the
   * resource-level entry for the same action.
   */
  rolesFor(
    resourceName: string,
    action: Action,
    relType?: RelationshipType,
    rel?: string
  ): Roles | undefined {
    const entry = this.lookup(resourceName);
    if (relType && rel) {
      const nested = entry[relType].get(rel)?.get(action);
      if (nested) return nested;
    }
    return entry.resource.get(action);
  }

  freeze(): void {
    this.frozen = true;
  }

  private mutableEntry(resourceName: string): MutableResourceRoles {
    const existing = this.entries.get(resourceName);
    if (existing) return existing;

    if (this.frozen) {
      throw new ConfigFrozenError(`add resource "${resourceName}" to the role table`);
    }

    const created: MutableResourceRoles = {
      resource: new Map(),
      hasOne: new Map(),
      hasMany: new Map(),
    };
    this.entries.set(resourceName, created);
    return created;
  }
}
