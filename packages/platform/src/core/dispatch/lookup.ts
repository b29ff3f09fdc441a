/**
 * Resource Lookup
 *
 * Runs before any route under /{resource}/{id}. A record injected by the
 * enclosing request of an internal fetch is used as-is; otherwise the
 * resource's finder is asked. Neither yielding a record is a 404.
 */

import type { ResourceDefinition } from "../resource/definition.js";
import type { Passthru } from "../lifecycle/request-state.js";
import { BadRequestError, NotFoundError } from "../errors/index.js";

export async function resolveRecord(
  resource: ResourceDefinition<unknown>,
  id: string,
  passthru?: Passthru
): Promise<unknown> {
  const injected = passthru?.resource;
  if (injected !== undefined && injected !== null) return injected;

  const found = resource.finder ? await resource.finder.find(id) : undefined;
  if (found === undefined || found === null) {
    throw new NotFoundError(`Resource '${id}' not found`);
  }
  return found;
}

/**
 * Relationship paths requested through `include`, as a tree:
 *   ["author", "comments.author"] → { author: {}, comments: { author: {} } }
 */
export type IncludeTree = ReadonlyMap<string, IncludeTree>;

export function parseIncludes(paths: readonly string[]): IncludeTree {
  const build = (paths: readonly string[][]): IncludeTree => {
    const tree = new Map<string, string[][]>();
    for (const [head, ...rest] of paths) {
      if (!head) {
        throw new BadRequestError("Empty relationship path in include", {
          source: { parameter: "include" },
        });
      }
      const children = tree.get(head) ?? [];
      if (rest.length > 0) children.push(rest);
      tree.set(head, children);
    }
    return new Map(
      Array.from(tree, ([name, children]): [string, IncludeTree] => [name, build(children)])
    );
  };

  return build(paths.map((path) => path.split(".")));
}
