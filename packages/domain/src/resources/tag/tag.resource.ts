/**
 * Tag Resource
 */

import { defineResource } from "@resourceful/contracts";
import { z } from "zod";
import type { BlogStore, Tag } from "../../store/blog-store.js";

const createTagSchema = z.object({
  name: z.string().min(1).max(50),
});

export function defineTagResource(store: BlogStore) {
  return defineResource<Tag>("Tag", (tags) => {
    tags.find((id) => store.tags.get(id));
    tags.index(() => store.tags.all());
    tags.show((_ctx, tag) => tag);
    tags.create(
      (_ctx, attributes, id) =>
        store.tags.save({ id: id ?? store.tags.nextId(), ...createTagSchema.parse(attributes) }),
      { roles: ["admin"] }
    );
  });
}
