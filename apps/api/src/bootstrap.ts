/**
 * Bootstrap
 *
 * Wires the platform engine with the domain layer.
 * This is the SINGLE place where platform meets domain.
 *
 * Sequence:
 *   1. Initialize observability
 *   2. Load config
 *   3. Create the engine with the role resolver
 *   4. Register domain resources
 *   5. Tighten roles the domain leaves open
 *   6. Freeze the configuration
 */

import {
  createJsonApi,
  initObservability,
  loadConfig,
  type AppConfig,
  type JsonApi,
  type RoleResolver,
} from "@resourceful/platform";
import { BlogStore, blogResources, seedBlogStore } from "@resourceful/domain";
import type { CallerRole } from "@resourceful/contracts";

/**
 * Development role resolver: the caller's roles come from the x-role
 * header ("admin" or "editor,admin"). Production deployments replace this
 * with one backed by real authentication.
 */
export const headerRole: RoleResolver = ({ headers }): CallerRole => {
  const raw = headers["x-role"];
  const value = Array.isArray(raw) ? raw.join(",") : raw;
  if (!value) return null;

  const roles = value
    .split(",")
    .map((role) => role.trim())
    .filter(Boolean);
  return roles.length === 1 ? roles[0] ?? null : roles;
};

export interface Application {
  config: AppConfig;
  api: JsonApi;
  store: BlogStore;
}

/**
 * Initializes the entire application.
 * Call once at server startup.
 */
export function bootstrap(options: { store?: BlogStore } = {}): Application {
  // 0. Initialize observability FIRST — captures errors from all subsequent steps
  initObservability();

  // 1. Load configuration from environment
  const config = loadConfig();

  // 2. Create the engine
  const api = createJsonApi({ role: headerRole });

  // 3. Register domain resources
  const store = options.store ?? seedBlogStore(new BlogStore());
  api.declare(...blogResources(store));

  // 4. Deleting posts is an admin-only operation
  api.configure((engine) => {
    engine.resourceRoles.permit("posts", "destroy", ["admin"]);
  });

  // 5. No declarations or config writes after this point
  api.freeze();

  return { config, api, store };
}
