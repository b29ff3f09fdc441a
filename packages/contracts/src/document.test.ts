/**
 * Request Document Schemas — Test Suite
 *
 * Validates that the Zod schemas accept the payload shapes the platform
 * routes on (resource, to-one linkage, to-many linkage, null) and reject
 * documents without a usable primary data member.
 */

import { describe, it, expect } from "vitest";
import {
  requestDocumentSchema,
  resourceIdentifierSchema,
  primaryDataSchema,
} from "./document.js";

describe("requestDocumentSchema", () => {
  it("accepts a resource payload with attributes", () => {
    const result = requestDocumentSchema.safeParse({
      data: { type: "posts", attributes: { title: "Hello" } },
    });
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.data).toEqual({
        type: "posts",
        attributes: { title: "Hello" },
      });
    }
  });

  it("accepts null primary data (emptied to-one relationship)", () => {
    const result = requestDocumentSchema.safeParse({ data: null });
    expect(result.success).toBe(true);
  });

  it("accepts an array of identifiers (to-many linkage)", () => {
    const result = requestDocumentSchema.safeParse({
      data: [
        { type: "comments", id: "1" },
        { type: "comments", id: "2" },
      ],
    });
    expect(result.success).toBe(true);
  });

  it("rejects a document without data", () => {
    expect(requestDocumentSchema.safeParse({ meta: {} }).success).toBe(false);
  });

  it("rejects a resource payload without a type", () => {
    const result = requestDocumentSchema.safeParse({
      data: { id: "1", attributes: {} },
    });
    expect(result.success).toBe(false);
  });

  it("rejects a numeric id", () => {
    const result = requestDocumentSchema.safeParse({
      data: { type: "posts", id: 7 },
    });
    expect(result.success).toBe(false);
  });

  it("rejects a to-many linkage containing a non-identifier", () => {
    const result = primaryDataSchema.safeParse([{ type: "comments" }]);
    expect(result.success).toBe(false);
  });
});

describe("resourceIdentifierSchema", () => {
  it("requires both type and id", () => {
    expect(resourceIdentifierSchema.safeParse({ type: "people", id: "9" }).success).toBe(true);
    expect(resourceIdentifierSchema.safeParse({ type: "people" }).success).toBe(false);
    expect(resourceIdentifierSchema.safeParse({ type: "", id: "9" }).success).toBe(false);
  });
});
