/**
 * Sample data for local development and tests.
 */

import type { BlogStore } from "./blog-store.js";

export function seedBlogStore(store: BlogStore): BlogStore {
  const ada = store.people.save({ id: store.people.nextId(), name: "Ada Writer", email: "ada@example.com" });
  const ben = store.people.save({ id: store.people.nextId(), name: "Ben Reader", email: "ben@example.com" });

  const typescript = store.tags.save({ id: store.tags.nextId(), name: "typescript" });
  const http = store.tags.save({ id: store.tags.nextId(), name: "http" });
  store.tags.save({ id: store.tags.nextId(), name: "design" });

  const hello = store.posts.save({
    id: store.posts.nextId(),
    title: "Hello World",
    body: "First post",
    createdAt: "2026-01-05T09:00:00.000Z",
    authorId: ada.id,
    tagIds: [typescript.id, http.id],
  });
  const guards = store.posts.save({
    id: store.posts.nextId(),
    title: "Guards and Routes",
    body: "How dispatch works",
    createdAt: "2026-02-10T09:00:00.000Z",
    authorId: ada.id,
    tagIds: [http.id],
  });
  store.posts.save({
    id: store.posts.nextId(),
    title: "Unattributed",
    body: "No author yet",
    createdAt: "2026-03-01T09:00:00.000Z",
    authorId: null,
    tagIds: [],
  });

  store.comments.save({ id: store.comments.nextId(), body: "Nice read", postId: hello.id, authorId: ben.id });
  store.comments.save({ id: store.comments.nextId(), body: "Thanks!", postId: hello.id, authorId: ada.id });
  store.comments.save({ id: store.comments.nextId(), body: "More please", postId: guards.id, authorId: ben.id });

  return store;
}
