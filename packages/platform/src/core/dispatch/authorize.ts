/**
 * Authorization Check
 *
 * can(resource, action[, relType, rel]) against the role table. No I/O and
 * no throwing: callers decide what a false result means. The caller's role
 * is only resolved when the action is actually restricted.
 */

import type { Action, CallerRole, RelationshipType } from "@resourceful/contracts";
import type { RoleTable } from "../registry/role-table.js";

export function can(
  roles: RoleTable,
  callerRole: () => CallerRole,
  resourceName: string,
  action: Action,
  relType?: RelationshipType,
  rel?: string
): boolean {
  const allowed = roles.rolesFor(resourceName, action, relType, rel);
  if (!allowed || allowed.size === 0) return true;
  return allowed.matches(callerRole());
}
