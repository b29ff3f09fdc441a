/**
 * Sorting
 *
 * Applies a sort expression ("-created-at,title") to a list of records.
 * Each resource names the fields it can be sorted by; anything else is a
 * 400 for the client.
 */

import type { HandlerContext } from "@resourceful/contracts";

export type SortAccessors<T> = Readonly<Record<string, (record: T) => string>>;

export function sortRecords<T>(
  ctx: HandlerContext,
  records: readonly T[],
  accessors: SortAccessors<T>
): T[] {
  const keys = ctx.params.sort
    .split(",")
    .map((key) => key.trim())
    .filter(Boolean)
    .map((key) => {
      const descending = key.startsWith("-");
      const field = descending ? key.slice(1) : key;
      const accessor = accessors[field];
      if (!accessor) {
        return ctx.halt(400, `Unsupported sort field '${field}'`);
      }
      return { accessor, direction: descending ? -1 : 1 };
    });

  return [...records].sort((a, b) => {
    for (const { accessor, direction } of keys) {
      const order = accessor(a).localeCompare(accessor(b));
      if (order !== 0) return order * direction;
    }
    return 0;
  });
}
