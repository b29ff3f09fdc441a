/**
 * Request State — Test Suite
 *
 * Sideload permission needs both the sideload table entry for the
 * enclosing resource and the caller's access to the enclosing action.
 */

import { describe, it, expect } from "vitest";
import type { CallerRole } from "@resourceful/contracts";
import { Config } from "../registry/config.js";
import { RequestState, RoleMemo, type Passthru } from "./request-state.js";

function stateFor(config: Config, passthru?: Passthru): RequestState {
  const request = { method: "GET", path: "/comments/1/author", headers: {}, locals: {} };
  return new RequestState({
    config,
    path: request.path,
    headers: request.headers,
    locals: request.locals,
    params: { fields: {}, include: [], filter: {}, page: {}, sort: "" },
    body: undefined,
    role: new RoleMemo(config, request),
    passthru,
  });
}

function configFor(role: CallerRole, { listed = true, restrictParent = false } = {}): Config {
  const config = new Config({ role: () => role });
  config.resourceRoles.permit("comments", "pluck", ["admin"]);
  if (listed) config.resourceSideload.permit("comments", "pluck", ["posts"]);
  if (restrictParent) config.resourceRoles.permit("posts", "show", ["admin"]);
  return config;
}

const fromPosts: Passthru = { parent: "posts", parentAction: "show" };

describe("RequestState.sideload()", () => {
  it("grants a listed parent the caller may access", () => {
    const state = stateFor(configFor("editor"), fromPosts);
    expect(state.sideload("comments", "pluck")).toBe(true);
  });

  it("denies when the parent is not listed", () => {
    const state = stateFor(configFor("editor", { listed: false }), fromPosts);
    expect(state.sideload("comments", "pluck")).toBe(false);
  });

  it("denies when the caller may not perform the parent action", () => {
    const state = stateFor(configFor("editor", { restrictParent: true }), fromPosts);
    expect(state.sideload("comments", "pluck")).toBe(false);
  });

  it("grants once the caller holds the parent's role", () => {
    const state = stateFor(configFor("admin", { restrictParent: true }), fromPosts);
    expect(state.sideload("comments", "pluck")).toBe(true);
  });

  it("denies outside an internal fetch", () => {
    const state = stateFor(configFor("editor"));
    expect(state.sideloaded()).toBe(false);
    expect(state.sideload("comments", "pluck")).toBe(false);
  });
});
