/**
 * Post Resource
 *
 * Blog posts with a to-one author and to-many comments and tags.
 *
 *   GET /posts?filter[author]=1        posts by one author
 *   GET /posts?sort=-created-at        newest first
 *   GET /posts/1?include=author        the author is sideloaded even for
 *                                      callers who may not read it directly
 */

import { defineResource, type HandlerContext } from "@resourceful/contracts";
import { z } from "zod";
import type { BlogStore, Post } from "../../store/blog-store.js";
import { sortRecords } from "../sorting.js";

const EDITORS = ["admin", "editor"];

const createPostSchema = z.object({
  title: z.string().min(1).max(200),
  body: z.string(),
});

const updatePostSchema = createPostSchema.partial();

export function definePostResource(store: BlogStore) {
  const byPostFields = {
    title: (post: Post) => post.title,
    "created-at": (post: Post) => post.createdAt,
  };

  return defineResource<Post>("Post", (posts) => {
    posts.find((id) => store.posts.get(id));

    posts.encode((post) => ({
      id: post.id,
      attributes: { title: post.title, body: post.body, createdAt: post.createdAt },
    }));

    posts.index(
      (ctx) =>
        sortRecords(
          ctx,
          store.posts.where((post) => post.authorId === ctx.params.filter.author),
          byPostFields
        ),
      { filters: ["author"] }
    );

    posts.index((ctx) => sortRecords(ctx, store.posts.all(), byPostFields));

    posts.show((_ctx, post) => post);

    posts.create(
      (ctx, attributes, id) => {
        if (id !== undefined && store.posts.has(id)) {
          return ctx.halt(409, `Post '${id}' already exists`);
        }
        const input = createPostSchema.parse(attributes);
        return store.posts.save({
          id: id ?? store.posts.nextId(),
          ...input,
          createdAt: new Date().toISOString(),
          authorId: null,
          tagIds: [],
        });
      },
      { roles: EDITORS }
    );

    posts.update(
      (_ctx, post, attributes) =>
        store.posts.save({ ...post, ...updatePostSchema.parse(attributes) }),
      { roles: EDITORS }
    );

    posts.destroy((_ctx, post) => store.removePost(post.id));

    posts.hasOne(
      "author",
      (author) => {
        author.pluck(
          (_ctx, post) => (post.authorId ? store.people.get(post.authorId) : null),
          { roles: EDITORS, sideloadOn: ["posts"] }
        );
        author.prune(
          (_ctx, post) => {
            store.posts.save({ ...post, authorId: null });
          },
          { roles: EDITORS }
        );
        author.graft(
          (ctx, post, linkage) => {
            if (!store.people.has(linkage.id)) {
              return ctx.halt(404, `Person '${linkage.id}' not found`);
            }
            store.posts.save({ ...post, authorId: linkage.id });
          },
          { roles: EDITORS }
        );
      },
      { resource: "people" }
    );

    posts.hasMany("comments", (comments) => {
      comments.fetch((_ctx, post) => store.comments.where((comment) => comment.postId === post.id));
    });

    posts.hasMany("tags", (tags) => {
      const resolve = (ctx: HandlerContext, ids: string[]): string[] => {
        const missing = ids.find((id) => !store.tags.has(id));
        if (missing !== undefined) ctx.halt(404, `Tag '${missing}' not found`);
        return ids;
      };

      tags.fetch((_ctx, post) =>
        post.tagIds.flatMap((id) => store.tags.get(id) ?? [])
      );
      tags.clear(
        (_ctx, post) => {
          store.posts.save({ ...post, tagIds: [] });
        },
        { roles: EDITORS }
      );
      tags.replace(
        (ctx, post, linkage) => {
          const tagIds = resolve(ctx, linkage.map((tag) => tag.id));
          store.posts.save({ ...post, tagIds: Array.from(new Set(tagIds)) });
        },
        { roles: EDITORS }
      );
      tags.merge(
        (ctx, post, linkage) => {
          const added = resolve(ctx, linkage.map((tag) => tag.id));
          store.posts.save({ ...post, tagIds: Array.from(new Set([...post.tagIds, ...added])) });
        },
        { roles: EDITORS }
      );
      tags.subtract(
        (_ctx, post, linkage) => {
          const removed = new Set(linkage.map((tag) => tag.id));
          store.posts.save({ ...post, tagIds: post.tagIds.filter((id) => !removed.has(id)) });
        },
        { roles: EDITORS }
      );
    });
  });
}
