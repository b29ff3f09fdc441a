/**
 * API Integration Tests
 *
 * Drives the blog API through Fastify's inject(): the full stack from
 * HTTP down to the in-memory store, without a listening server.
 *
 *   - Collection reads: sorting, filters, sparse fieldsets
 *   - Member reads, creates, updates and deletes with role checks
 *   - Content negotiation (406 / 415 / malformed payloads)
 *   - Relationship routes for to-one and to-many relationships
 *   - Included resources, including sideloads past a role restriction
 *   - OPTIONS and CORS preflights
 */

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { FastifyInstance, LightMyRequestResponse } from "fastify";
import { bootstrap } from "./bootstrap.js";
import { buildServer } from "./server.js";

const MEDIA_TYPE = "application/vnd.api+json";

type Method = "GET" | "POST" | "PATCH" | "DELETE" | "OPTIONS";

interface SendOptions {
  role?: string;
  /** Serialized as JSON unless already a string */
  body?: unknown;
  headers?: Record<string, string>;
}

interface ListDocument {
  data: Array<{ type: string; id: string }>;
}

let app: FastifyInstance;

beforeEach(async () => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  app = await buildServer(bootstrap());
});

afterEach(async () => {
  await app.close();
  vi.restoreAllMocks();
});

function send(method: Method, url: string, options: SendOptions = {}) {
  const headers: Record<string, string> = { accept: MEDIA_TYPE };
  if (options.role) headers["x-role"] = options.role;
  if (options.body !== undefined) headers["content-type"] = MEDIA_TYPE;

  return app.inject({
    method,
    url,
    headers: { ...headers, ...options.headers },
    payload:
      options.body === undefined
        ? undefined
        : typeof options.body === "string"
          ? options.body
          : JSON.stringify(options.body),
  });
}

function ids(response: LightMyRequestResponse): string[] {
  return response.json<ListDocument>().data.map((entry) => entry.id);
}

function firstError(response: LightMyRequestResponse) {
  return response.json().errors[0];
}

// ---------------------------------------------------------------------------
// Health
// ---------------------------------------------------------------------------

describe("GET /health", () => {
  it("answers without content negotiation", async () => {
    const response = await app.inject({ method: "GET", url: "/health" });
    expect(response.statusCode).toBe(200);
    expect(response.json().status).toBe("ok");
  });
});

describe("unknown routes", () => {
  it("answers with a JSON:API error document", async () => {
    const response = await send("GET", "/bogus");
    expect(response.statusCode).toBe(404);
    expect(response.headers["content-type"]).toMatch(/^application\/vnd\.api\+json/);
    expect(firstError(response)).toEqual({
      status: "404",
      title: "Not Found",
      detail: "No route matches GET /bogus",
    });
  });
});

// ---------------------------------------------------------------------------
// Collections
// ---------------------------------------------------------------------------

describe("collection reads", () => {
  it("lists posts as a JSON:API document", async () => {
    const response = await send("GET", "/posts");

    expect(response.statusCode).toBe(200);
    expect(response.headers["content-type"]).toMatch(/^application\/vnd\.api\+json/);
    expect(ids(response)).toEqual(["1", "2", "3"]);

    const document = response.json();
    expect(document.jsonapi).toEqual({ version: "1.0" });
    expect(document.links).toEqual({ self: "/posts" });
    expect(document.data[0]).toEqual({
      type: "posts",
      id: "1",
      links: { self: "/posts/1" },
      attributes: {
        title: "Hello World",
        body: "First post",
        "created-at": "2026-01-05T09:00:00.000Z",
      },
      relationships: {
        author: {
          links: { self: "/posts/1/relationships/author", related: "/posts/1/author" },
        },
        comments: {
          links: { self: "/posts/1/relationships/comments", related: "/posts/1/comments" },
        },
        tags: {
          links: { self: "/posts/1/relationships/tags", related: "/posts/1/tags" },
        },
      },
    });
  });

  it("sorts by a dasherized attribute, descending", async () => {
    const response = await send("GET", "/posts?sort=-created-at");
    expect(ids(response)).toEqual(["3", "2", "1"]);
  });

  it("sorts by title", async () => {
    const response = await send("GET", "/posts?sort=title");
    expect(ids(response)).toEqual(["2", "1", "3"]);
  });

  it("rejects an unsupported sort field", async () => {
    const response = await send("GET", "/posts?sort=bogus");
    expect(response.statusCode).toBe(400);
    expect(firstError(response)).toEqual({
      status: "400",
      title: "Bad Request",
      detail: "Unsupported sort field 'bogus'",
    });
  });

  it("routes to the filtered index when the filter is present", async () => {
    expect(ids(await send("GET", "/posts?filter[author]=1"))).toEqual(["1", "2"]);
    expect(ids(await send("GET", "/comments?filter[post]=1"))).toEqual(["1", "2"]);
  });

  it("falls back to the plain index for other filters", async () => {
    expect(ids(await send("GET", "/comments?filter[author]=2"))).toEqual(["1", "2", "3"]);
  });

  it("applies sparse fieldsets", async () => {
    const response = await send("GET", "/posts/1?fields[posts]=title");
    expect(response.json().data).toEqual({
      type: "posts",
      id: "1",
      links: { self: "/posts/1" },
      attributes: { title: "Hello World" },
      relationships: {},
    });
  });
});

// ---------------------------------------------------------------------------
// Members
// ---------------------------------------------------------------------------

describe("member reads", () => {
  it("encodes every field but the id when no encoder is declared", async () => {
    const response = await send("GET", "/people/2");
    expect(response.statusCode).toBe(200);
    expect(response.json().data.attributes).toEqual({
      name: "Ben Reader",
      email: "ben@example.com",
    });
  });

  it("answers 404 for an unknown id", async () => {
    const response = await send("GET", "/posts/99");
    expect(response.statusCode).toBe(404);
    expect(firstError(response).detail).toBe("Resource '99' not found");
  });
});

describe("create", () => {
  const newPost = { data: { type: "posts", attributes: { title: "Drafting", body: "Notes" } } };

  it("creates a post for an editor", async () => {
    const response = await send("POST", "/posts", { role: "editor", body: newPost });

    expect(response.statusCode).toBe(201);
    expect(response.headers.location).toBe("/posts/4");
    const { data } = response.json();
    expect(data.id).toBe("4");
    expect(data.attributes.title).toBe("Drafting");
    expect(data.attributes.body).toBe("Notes");
  });

  it("forbids an anonymous caller", async () => {
    const response = await send("POST", "/posts", { body: newPost });
    expect(response.statusCode).toBe(403);
    expect(firstError(response)).toEqual({
      status: "403",
      title: "Forbidden",
      detail: "Not permitted to create 'posts'",
    });
  });

  it("maps validation failures to 422 with a pointer", async () => {
    const response = await send("POST", "/posts", {
      role: "editor",
      body: { data: { type: "posts", attributes: { title: "", body: "Notes" } } },
    });
    expect(response.statusCode).toBe(422);
    expect(firstError(response).source).toEqual({ pointer: "/data/attributes/title" });
  });

  it("rejects a payload of another type", async () => {
    const response = await send("POST", "/posts", {
      role: "editor",
      body: { data: { type: "people", attributes: { title: "Drafting", body: "Notes" } } },
    });
    expect(response.statusCode).toBe(409);
    expect(firstError(response).detail).toBe("Resource type in payload does not match endpoint");
  });

  it("accepts a client-generated id", async () => {
    const response = await send("POST", "/people", {
      role: "admin",
      body: { data: { type: "people", id: "7", attributes: { name: "Cy", email: "cy@example.com" } } },
    });
    expect(response.statusCode).toBe(201);
    expect(response.headers.location).toBe("/people/7");
  });

  it("answers 409 for a client-generated id that is taken", async () => {
    const response = await send("POST", "/people", {
      role: "admin",
      body: { data: { type: "people", id: "1", attributes: { name: "Cy", email: "cy@example.com" } } },
    });
    expect(response.statusCode).toBe(409);
    expect(firstError(response).detail).toBe("Person '1' already exists");
  });

  it("lets any caller with a role comment, with camelized attributes", async () => {
    const response = await send("POST", "/comments", {
      role: "reader",
      body: { data: { type: "comments", attributes: { body: "Agreed", "post-id": "2", "author-id": "1" } } },
    });
    expect(response.statusCode).toBe(201);
    expect(response.json().data).toMatchObject({ id: "4", attributes: { body: "Agreed" } });

    expect(ids(await send("GET", "/comments?filter[post]=2"))).toEqual(["3", "4"]);
  });

  it("forbids commenting without a role", async () => {
    const response = await send("POST", "/comments", {
      body: { data: { type: "comments", attributes: { body: "Agreed", "post-id": "2", "author-id": "1" } } },
    });
    expect(response.statusCode).toBe(403);
  });

  it("halts with 422 when a comment references a missing post", async () => {
    const response = await send("POST", "/comments", {
      role: "reader",
      body: { data: { type: "comments", attributes: { body: "Agreed", "post-id": "99", "author-id": "1" } } },
    });
    expect(response.statusCode).toBe(422);
    expect(firstError(response).detail).toBe("Post '99' does not exist");
  });
});

describe("update", () => {
  it("merges the given attributes into the record", async () => {
    const response = await send("PATCH", "/posts/2", {
      role: "editor",
      body: { data: { type: "posts", id: "2", attributes: { title: "Routes and Guards" } } },
    });

    expect(response.statusCode).toBe(200);
    expect(response.json().data.attributes).toMatchObject({
      title: "Routes and Guards",
      body: "How dispatch works",
    });
  });

  it("rejects a payload id that differs from the path", async () => {
    const response = await send("PATCH", "/posts/2", {
      role: "editor",
      body: { data: { type: "posts", id: "3", attributes: { title: "Routes and Guards" } } },
    });
    expect(response.statusCode).toBe(409);
    expect(firstError(response).detail).toBe("Resource ID in payload does not match endpoint");
  });

  it("answers 405 for a resource without an update handler", async () => {
    const response = await send("PATCH", "/tags/1", {
      role: "admin",
      body: { data: { type: "tags", id: "1", attributes: { name: "ts" } } },
    });
    expect(response.statusCode).toBe(405);
    expect(firstError(response).detail).toBe("Action 'update' is not available on 'tags'");
  });
});

describe("destroy", () => {
  it("is restricted to admins for posts", async () => {
    const response = await send("DELETE", "/posts/1", { role: "editor" });
    expect(response.statusCode).toBe(403);
    expect(firstError(response).detail).toBe("Not permitted to destroy 'posts'");
  });

  it("deletes a post and its comments", async () => {
    const response = await send("DELETE", "/posts/1", { role: "admin" });
    expect(response.statusCode).toBe(204);
    expect(response.body).toBe("");

    expect((await send("GET", "/posts/1")).statusCode).toBe(404);
    expect(ids(await send("GET", "/comments?filter[post]=1"))).toEqual([]);
  });
});

// ---------------------------------------------------------------------------
// Negotiation
// ---------------------------------------------------------------------------

describe("content negotiation", () => {
  it("answers 406 without the JSON:API media type in Accept", async () => {
    const response = await send("GET", "/posts", { headers: { accept: "application/json" } });
    expect(response.statusCode).toBe(406);
    expect(firstError(response).detail).toBe("Accept must prefer application/vnd.api+json");
  });

  it("answers 406 for a media type with parameters", async () => {
    const response = await send("GET", "/posts", {
      headers: { accept: "application/vnd.api+json; ext=bulk" },
    });
    expect(response.statusCode).toBe(406);
  });

  it("answers 415 for a body of another media type", async () => {
    const response = await send("POST", "/tags", {
      role: "admin",
      body: { data: { type: "tags", attributes: { name: "node" } } },
      headers: { "content-type": "application/json" },
    });
    expect(response.statusCode).toBe(415);
    expect(firstError(response).detail).toBe("Content-Type must be application/vnd.api+json");
  });

  it("accepts a charset parameter on the body", async () => {
    const response = await send("POST", "/tags", {
      role: "admin",
      body: { data: { type: "tags", attributes: { name: "node" } } },
      headers: { "content-type": "application/vnd.api+json; charset=utf-8" },
    });
    expect(response.statusCode).toBe(201);
    expect(response.json().data.attributes).toEqual({ name: "node" });
  });

  it("answers 400 for a payload that is not a JSON:API document", async () => {
    const response = await send("POST", "/tags", { role: "admin", body: "{" });
    expect(response.statusCode).toBe(400);
    expect(firstError(response).detail).toBe("Malformed JSON:API request payload");
  });
});

// ---------------------------------------------------------------------------
// Relationships
// ---------------------------------------------------------------------------

describe("to-many relationships", () => {
  const tagLinkage = async () => (await send("GET", "/posts/1/relationships/tags")).json().data;

  it("returns linkage from the relationship route", async () => {
    const response = await send("GET", "/posts/1/relationships/tags");
    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      jsonapi: { version: "1.0" },
      data: [
        { type: "tags", id: "1" },
        { type: "tags", id: "2" },
      ],
      links: { self: "/posts/1/relationships/tags" },
    });
  });

  it("returns resource objects from the related route", async () => {
    const response = await send("GET", "/posts/1/tags");
    expect(response.json().data.map((tag: { attributes: { name: string } }) => tag.attributes.name)).toEqual([
      "typescript",
      "http",
    ]);
  });

  it("clears with an empty list", async () => {
    const response = await send("PATCH", "/posts/1/relationships/tags", { role: "editor", body: { data: [] } });
    expect(response.statusCode).toBe(204);
    expect(await tagLinkage()).toEqual([]);
  });

  it("replaces with a non-empty list", async () => {
    await send("PATCH", "/posts/1/relationships/tags", {
      role: "editor",
      body: { data: [{ type: "tags", id: "3" }] },
    });
    expect(await tagLinkage()).toEqual([{ type: "tags", id: "3" }]);
  });

  it("merges and subtracts", async () => {
    const merged = await send("POST", "/posts/1/relationships/tags", {
      role: "editor",
      body: { data: [{ type: "tags", id: "3" }] },
    });
    expect(merged.statusCode).toBe(204);
    expect(await tagLinkage()).toEqual([
      { type: "tags", id: "1" },
      { type: "tags", id: "2" },
      { type: "tags", id: "3" },
    ]);

    const subtracted = await send("DELETE", "/posts/1/relationships/tags", {
      role: "editor",
      body: { data: [{ type: "tags", id: "1" }] },
    });
    expect(subtracted.statusCode).toBe(204);
    expect(await tagLinkage()).toEqual([
      { type: "tags", id: "2" },
      { type: "tags", id: "3" },
    ]);
  });

  it("answers 404 for an unknown tag", async () => {
    const response = await send("POST", "/posts/1/relationships/tags", {
      role: "editor",
      body: { data: [{ type: "tags", id: "9" }] },
    });
    expect(response.statusCode).toBe(404);
    expect(firstError(response).detail).toBe("Tag '9' not found");
  });

  it("answers 409 for linkage of another type", async () => {
    const response = await send("POST", "/posts/1/relationships/tags", {
      role: "editor",
      body: { data: [{ type: "people", id: "1" }] },
    });
    expect(response.statusCode).toBe(409);
    expect(firstError(response).detail).toBe("Resource type in linkage does not match relationship");
  });

  it("answers 405 for an action the relationship does not declare", async () => {
    const response = await send("POST", "/posts/1/relationships/comments", {
      role: "editor",
      body: { data: [{ type: "comments", id: "3" }] },
    });
    expect(response.statusCode).toBe(405);
    expect(firstError(response).detail).toBe(
      "Action 'merge' is not available on 'posts' relationship 'comments'"
    );
  });
});

describe("to-one relationships", () => {
  const authorLinkage = async () =>
    (await send("GET", "/posts/1/relationships/author", { role: "editor" })).json().data;

  it("prunes with null data", async () => {
    const response = await send("PATCH", "/posts/1/relationships/author", {
      role: "editor",
      body: { data: null },
    });
    expect(response.statusCode).toBe(204);
    expect(await authorLinkage()).toBeNull();
  });

  it("grafts with a resource identifier", async () => {
    const response = await send("PATCH", "/posts/1/relationships/author", {
      role: "editor",
      body: { data: { type: "people", id: "2" } },
    });
    expect(response.statusCode).toBe(204);
    expect(await authorLinkage()).toEqual({ type: "people", id: "2" });
  });

  it("answers 404 when grafting an unknown person", async () => {
    const response = await send("PATCH", "/posts/1/relationships/author", {
      role: "editor",
      body: { data: { type: "people", id: "9" } },
    });
    expect(response.statusCode).toBe(404);
    expect(firstError(response).detail).toBe("Person '9' not found");
  });

  it("surfaces the role check of the matching route", async () => {
    const response = await send("PATCH", "/posts/1/relationships/author", {
      body: { data: { type: "people", id: "2" } },
    });
    expect(response.statusCode).toBe(403);
    expect(firstError(response).detail).toBe("Not permitted to graft 'posts' relationship 'author'");
  });

  it("answers 400 for a malformed relationship payload", async () => {
    const response = await send("PATCH", "/posts/1/relationships/author", { role: "editor", body: "{" });
    expect(response.statusCode).toBe(400);
    expect(firstError(response).detail).toBe("Malformed JSON:API request payload");
  });
});

// ---------------------------------------------------------------------------
// Includes
// ---------------------------------------------------------------------------

describe("included resources", () => {
  it("forbids reading a restricted relationship directly", async () => {
    const response = await send("GET", "/posts/1/author");
    expect(response.statusCode).toBe(403);
    expect(firstError(response).detail).toBe("Not permitted to pluck 'posts' relationship 'author'");
  });

  it("lets an editor read it directly", async () => {
    const response = await send("GET", "/posts/1/author", { role: "editor" });
    expect(response.statusCode).toBe(200);
    expect(response.json().data).toMatchObject({ type: "people", id: "1" });
  });

  it("sideloads the author for an anonymous caller", async () => {
    const response = await send("GET", "/posts/1?include=author");
    expect(response.statusCode).toBe(200);

    const document = response.json();
    expect(document.data.relationships.author.data).toEqual({ type: "people", id: "1" });
    expect(document.included).toEqual([
      {
        type: "people",
        id: "1",
        links: { self: "/people/1" },
        attributes: { name: "Ada Writer", email: "ada@example.com" },
        relationships: {
          posts: {
            links: { self: "/people/1/relationships/posts", related: "/people/1/posts" },
          },
        },
      },
    ]);
  });

  it("sets null linkage and omits included for a missing to-one", async () => {
    const document = (await send("GET", "/posts/3?include=author")).json();
    expect(document.data.relationships.author.data).toBeNull();
    expect(document.included).toBeUndefined();
  });

  it("includes each related resource once across a collection", async () => {
    const document = (await send("GET", "/posts?include=author")).json();
    expect(document.included.map((entry: { id: string }) => entry.id)).toEqual(["1"]);
    expect(document.data[1].relationships.author.data).toEqual({ type: "people", id: "1" });
    expect(document.data[2].relationships.author.data).toBeNull();
  });

  it("follows nested include paths", async () => {
    const document = (await send("GET", "/posts/1?include=comments.author")).json();
    expect(
      document.included.map((entry: { type: string; id: string }) => `${entry.type}:${entry.id}`)
    ).toEqual(["comments:1", "comments:2", "people:2", "people:1"]);
    expect(document.data.relationships.comments.data).toEqual([
      { type: "comments", id: "1" },
      { type: "comments", id: "2" },
    ]);
  });

  it("answers 400 for an unknown relationship", async () => {
    const response = await send("GET", "/posts/1?include=reviewers");
    expect(response.statusCode).toBe(400);
    expect(firstError(response)).toEqual({
      status: "400",
      title: "Bad Request",
      detail: "Unknown relationship 'reviewers' on 'posts' in include",
      source: { parameter: "include" },
    });
  });
});

// ---------------------------------------------------------------------------
// OPTIONS
// ---------------------------------------------------------------------------

describe("OPTIONS", () => {
  it("lists the methods available on a collection", async () => {
    const response = await send("OPTIONS", "/posts");
    expect(response.statusCode).toBe(204);
    expect(response.headers.allow).toBe("OPTIONS, GET, POST");
  });

  it("lists the methods available on a relationship", async () => {
    const response = await send("OPTIONS", "/posts/1/relationships/comments");
    expect(response.headers.allow).toBe("OPTIONS, GET");
  });

  it("leaves CORS preflights to the CORS plugin", async () => {
    const response = await app.inject({
      method: "OPTIONS",
      url: "/posts",
      headers: {
        origin: "http://localhost:3000",
        "access-control-request-method": "POST",
      },
    });
    expect(response.statusCode).toBe(204);
    expect(response.headers["access-control-allow-origin"]).toBe("http://localhost:3000");
    expect(response.headers.allow).toBeUndefined();
  });
});
