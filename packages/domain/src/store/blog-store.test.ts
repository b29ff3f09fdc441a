/**
 * Blog Store — Test Suite
 */

import { describe, it, expect } from "vitest";
import { BlogStore, Collection } from "./blog-store.js";
import { seedBlogStore } from "./seed.js";

describe("Collection", () => {
  it("hands out sequential ids, skipping taken ones", () => {
    const tags = new Collection<{ id: string; name: string }>();
    tags.save({ id: tags.nextId(), name: "a" });
    tags.save({ id: "2", name: "client-generated" });

    expect(tags.nextId()).toBe("3");
  });

  it("keeps insertion order and filters with where()", () => {
    const tags = new Collection<{ id: string; name: string }>();
    tags.save({ id: "b", name: "second" });
    tags.save({ id: "a", name: "first" });

    expect(tags.all().map((tag) => tag.id)).toEqual(["b", "a"]);
    expect(tags.where((tag) => tag.name === "first")).toEqual([{ id: "a", name: "first" }]);
  });

  it("removes records", () => {
    const tags = new Collection<{ id: string }>();
    tags.save({ id: "1" });

    expect(tags.remove("1")).toBe(true);
    expect(tags.remove("1")).toBe(false);
    expect(tags.has("1")).toBe(false);
  });
});

describe("BlogStore", () => {
  it("seeds people, tags, posts and comments", () => {
    const store = seedBlogStore(new BlogStore());

    expect(store.people.all().map((person) => person.name)).toEqual(["Ada Writer", "Ben Reader"]);
    expect(store.tags.all().map((tag) => tag.name)).toEqual(["typescript", "http", "design"]);
    expect(store.posts.all().map((post) => post.title)).toEqual([
      "Hello World",
      "Guards and Routes",
      "Unattributed",
    ]);
    expect(store.comments.all()).toHaveLength(3);
  });

  it("removes a post together with its comments", () => {
    const store = seedBlogStore(new BlogStore());
    store.removePost("1");

    expect(store.posts.has("1")).toBe(false);
    expect(store.comments.all().map((comment) => comment.id)).toEqual(["3"]);
  });

  it("removes a person, their comments, and their authorship", () => {
    const store = seedBlogStore(new BlogStore());
    store.removePerson("1");

    expect(store.people.has("1")).toBe(false);
    expect(store.comments.all().map((comment) => comment.id)).toEqual(["1", "3"]);
    expect(store.posts.all().map((post) => post.authorId)).toEqual([null, null, null]);
  });
});
