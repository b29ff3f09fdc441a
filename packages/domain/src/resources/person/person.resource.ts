/**
 * Person Resource
 *
 * Authors of posts and comments. Anyone may read people; only admins
 * manage them.
 */

import { defineResource } from "@resourceful/contracts";
import { z } from "zod";
import type { BlogStore, Person } from "../../store/blog-store.js";
import { sortRecords } from "../sorting.js";

const createPersonSchema = z.object({
  name: z.string().min(1),
  email: z.string().email(),
});

const updatePersonSchema = createPersonSchema.partial();

export function definePersonResource(store: BlogStore) {
  return defineResource<Person>("Person", (people) => {
    people.find((id) => store.people.get(id));

    people.index((ctx) =>
      sortRecords(ctx, store.people.all(), { name: (person) => person.name })
    );

    people.show((_ctx, person) => person);

    people.create(
      (ctx, attributes, id) => {
        if (id !== undefined && store.people.has(id)) {
          return ctx.halt(409, `Person '${id}' already exists`);
        }
        const input = createPersonSchema.parse(attributes);
        return store.people.save({ id: id ?? store.people.nextId(), ...input });
      },
      { roles: ["admin"] }
    );

    people.update(
      (_ctx, person, attributes) =>
        store.people.save({ ...person, ...updatePersonSchema.parse(attributes) }),
      { roles: ["admin"] }
    );

    people.destroy((_ctx, person) => store.removePerson(person.id), { roles: ["admin"] });

    people.hasMany("posts", (posts) => {
      posts.fetch((_ctx, person) => store.posts.where((post) => post.authorId === person.id));
    });
  });
}
