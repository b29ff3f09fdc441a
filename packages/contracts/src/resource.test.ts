/**
 * Resource Declaration — Test Suite
 *
 * defineResource defers all work to the host: nothing is declared until
 * register() is called, and the canonical name comes back from the host.
 */

import { describe, it, expect, vi } from "vitest";
import { defineResource, type ResourceBody, type ResourceHost } from "./resource.js";
import { isAction, MUTATING_ACTIONS } from "./action.js";

describe("defineResource", () => {
  it("keeps the raw name and does not touch the host until registered", () => {
    const body = vi.fn();
    const declaration = defineResource("BlogPost", body);

    expect(declaration.name).toBe("BlogPost");
    expect(body).not.toHaveBeenCalled();
  });

  it("registers the body on the host and returns the host's canonical name", () => {
    const body: ResourceBody<{ id: string }> = vi.fn();
    const host: ResourceHost = {
      resource: vi.fn(() => "blog-posts"),
    };

    const name = defineResource("BlogPost", body).register(host);

    expect(name).toBe("blog-posts");
    expect(host.resource).toHaveBeenCalledWith("BlogPost", body);
  });
});

describe("isAction", () => {
  it("recognizes resource and relationship actions", () => {
    expect(isAction("index")).toBe(true);
    expect(isAction("pluck")).toBe(true);
    expect(isAction("subtract")).toBe(true);
  });

  it("rejects unknown names", () => {
    expect(isAction("respond_to")).toBe(false);
    expect(isAction("")).toBe(false);
  });
});

describe("MUTATING_ACTIONS", () => {
  it("excludes the read actions", () => {
    expect(MUTATING_ACTIONS.has("index")).toBe(false);
    expect(MUTATING_ACTIONS.has("show")).toBe(false);
    expect(MUTATING_ACTIONS.has("pluck")).toBe(false);
    expect(MUTATING_ACTIONS.has("fetch")).toBe(false);
    expect(MUTATING_ACTIONS.has("graft")).toBe(true);
  });
});
