/**
 * Naming
 *
 * Resource names are canonicalized once, at declaration time:
 *   "Post"      → "posts"
 *   "BlogPost"  → "blog-posts"
 *   "people"    → "people"
 *
 * Every internal lookup (role table, sideload table, routes) uses the
 * canonical form only.
 */

import pluralize from "pluralize";
import { ConfigurationError } from "../errors/index.js";

/** "coAuthor" → "co-author", "created_at" → "created-at" */
export function dasherize(name: string): string {
  return name
    .trim()
    .replace(/([a-z0-9])([A-Z])/g, "$1-$2")
    .replace(/([A-Z]+)([A-Z][a-z])/g, "$1-$2")
    .replace(/[\s_]+/g, "-")
    .replace(/-{2,}/g, "-")
    .replace(/^-|-$/g, "")
    .toLowerCase();
}

/** "created-at" → "createdAt" */
export function camelize(name: string): string {
  return name.replace(/[-_]+([a-z0-9])/g, (_match, char: string) =>
    char.toUpperCase()
  );
}

/**
 * Dasherizes the name and pluralizes its last word.
 * Canonicalizing an already canonical name returns it unchanged.
 */
export function canonicalizeResourceName(raw: string): string {
  const words = dasherize(raw).split("-").filter(Boolean);
  const last = words.pop();
  if (last === undefined) {
    throw new ConfigurationError(`Invalid resource name: "${raw}"`);
  }
  return [...words, pluralize.plural(last)].join("-");
}

export function dasherizeKeys(
  record: Record<string, unknown>
): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(record).map(([key, value]) => [dasherize(key), value])
  );
}

export function camelizeKeys(
  record: Record<string, unknown>
): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(record).map(([key, value]) => [camelize(key), value])
  );
}
