/**
 * Role Definitions
 *
 * A role is an opaque string classifying the caller. The application
 * computes it once per request (see Config.role); the engine compares it
 * against the role sets declared for each action.
 *
 * An empty or missing role set means the action is unrestricted.
 */

/** A single role name (e.g., "admin", "editor") */
export type Role = string;

/**
 * What the role resolver returns for a request.
 * A caller may hold several roles; null means "no role" (anonymous).
 */
export type CallerRole = Role | readonly Role[] | null;

/**
 * Wildcard role. A role set containing it admits any caller that has
 * at least one role, but never an anonymous (null) caller.
 */
export const ANY_ROLE: Role = "*";
