/**
 * Vitest Configuration — @resourceful/platform
 *
 * Unit tests for the engine. Lifecycle tests drive JsonApi.handle()
 * directly; adapter tests use Fastify's inject().
 */

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts"],
  },
});
