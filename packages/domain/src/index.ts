/**
 * @resourceful/domain
 *
 * The sample blog domain: people, posts, comments and tags over an
 * in-memory store. The API server registers these declarations with the
 * platform at startup.
 */

import type { ResourceDeclaration } from "@resourceful/contracts";
import { BlogStore } from "./store/blog-store.js";
import { definePersonResource } from "./resources/person/person.resource.js";
import { definePostResource } from "./resources/post/post.resource.js";
import { defineCommentResource } from "./resources/comment/comment.resource.js";
import { defineTagResource } from "./resources/tag/tag.resource.js";

export {
  BlogStore,
  Collection,
  type Person,
  type Post,
  type Comment,
  type Tag,
} from "./store/blog-store.js";
export { seedBlogStore } from "./store/seed.js";
export { sortRecords, type SortAccessors } from "./resources/sorting.js";
export {
  definePersonResource,
  definePostResource,
  defineCommentResource,
  defineTagResource,
};

/**
 * All resource declarations of the blog, bound to one store.
 */
export function blogResources(store: BlogStore): ResourceDeclaration[] {
  return [
    definePersonResource(store),
    definePostResource(store),
    defineCommentResource(store),
    defineTagResource(store),
  ];
}
