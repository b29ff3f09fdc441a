import { describe, it, expect, afterEach, vi } from "vitest";
import { loadConfig } from "./index.js";

const VARIABLES = [
  "API_PORT",
  "API_HOST",
  "API_PREFIX",
  "CORS_ORIGIN",
  "RATE_LIMIT_MAX",
  "RATE_LIMIT_WINDOW_MS",
];

function clearEnvironment() {
  for (const name of VARIABLES) vi.stubEnv(name, "");
}

afterEach(() => {
  vi.unstubAllEnvs();
});

describe("loadConfig()", () => {
  it("falls back to defaults", () => {
    clearEnvironment();

    expect(loadConfig()).toEqual({
      api: { port: 4000, host: "0.0.0.0", prefix: "" },
      cors: { origin: true },
      rateLimit: { max: 100, windowMs: 60_000 },
    });
  });

  it("reads every variable", () => {
    clearEnvironment();
    vi.stubEnv("API_PORT", "8080");
    vi.stubEnv("API_HOST", "127.0.0.1");
    vi.stubEnv("API_PREFIX", "/api");
    vi.stubEnv("CORS_ORIGIN", "http://localhost:3000, https://example.com");
    vi.stubEnv("RATE_LIMIT_MAX", "20");
    vi.stubEnv("RATE_LIMIT_WINDOW_MS", "1000");

    expect(loadConfig()).toEqual({
      api: { port: 8080, host: "127.0.0.1", prefix: "/api" },
      cors: { origin: ["http://localhost:3000", "https://example.com"] },
      rateLimit: { max: 20, windowMs: 1000 },
    });
  });

  it("normalizes the prefix", () => {
    clearEnvironment();
    vi.stubEnv("API_PREFIX", "v1/");
    expect(loadConfig().api.prefix).toBe("/v1");
  });

  it("fails fast on invalid numbers", () => {
    clearEnvironment();
    vi.stubEnv("API_PORT", "eighty");
    expect(() => loadConfig()).toThrow(
      'API_PORT must be a positive integer, got "eighty". See .env.example.'
    );
  });
});
