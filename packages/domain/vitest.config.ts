/**
 * Vitest Configuration — @resourceful/domain
 *
 * Tests for the blog store and resource declarations.
 */

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts"],
  },
});
