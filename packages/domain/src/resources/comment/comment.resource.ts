/**
 * Comment Resource
 *
 * Comments belong to a post and an author. Any signed-in caller may
 * comment; only admins delete.
 */

import { ANY_ROLE, defineResource } from "@resourceful/contracts";
import { z } from "zod";
import type { BlogStore, Comment } from "../../store/blog-store.js";

const createCommentSchema = z.object({
  body: z.string().min(1).max(2000),
  postId: z.string().min(1),
  authorId: z.string().min(1),
});

export function defineCommentResource(store: BlogStore) {
  return defineResource<Comment>("Comment", (comments) => {
    comments.find((id) => store.comments.get(id));

    comments.encode((comment) => ({ id: comment.id, attributes: { body: comment.body } }));

    comments.index(
      (ctx) => store.comments.where((comment) => comment.postId === ctx.params.filter.post),
      { filters: ["post"] }
    );

    comments.index(() => store.comments.all());

    comments.show((_ctx, comment) => comment);

    comments.create(
      (ctx, attributes) => {
        const input = createCommentSchema.parse(attributes);
        if (!store.posts.has(input.postId)) {
          return ctx.halt(422, `Post '${input.postId}' does not exist`);
        }
        if (!store.people.has(input.authorId)) {
          return ctx.halt(422, `Person '${input.authorId}' does not exist`);
        }
        return store.comments.save({ id: store.comments.nextId(), ...input });
      },
      { roles: [ANY_ROLE] }
    );

    comments.destroy(
      (_ctx, comment) => {
        store.comments.remove(comment.id);
      },
      { roles: ["admin"] }
    );

    comments.hasOne(
      "post",
      (post) => {
        post.pluck((_ctx, comment) => store.posts.get(comment.postId));
      }
    );

    comments.hasOne(
      "author",
      (author) => {
        author.pluck((_ctx, comment) => store.people.get(comment.authorId), {
          roles: ["admin", "editor"],
          sideloadOn: ["comments", "posts"],
        });
      },
      { resource: "people" }
    );
  });
}
