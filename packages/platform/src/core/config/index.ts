/**
 * Application Configuration
 *
 * Loads configuration from environment variables with sensible defaults.
 * All config is validated at startup — fail fast if misconfigured.
 */

export interface AppConfig {
  api: {
    port: number;
    host: string;
    /** Mount point for the resource routes ("" serves them at the root) */
    prefix: string;
  };
  cors: {
    /** Allowed origins; true reflects the request origin */
    origin: string[] | true;
  };
  rateLimit: {
    max: number;
    windowMs: number;
  };
}

/**
 * Parses a positive integer variable, throwing on anything else.
 */
function readPositiveInt(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw === "") return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(
      `${name} must be a positive integer, got "${raw}". See .env.example.`
    );
  }
  return value;
}

function readPrefix(): string {
  const raw = (process.env.API_PREFIX ?? "").trim().replace(/\/+$/, "");
  if (raw === "") return "";
  return raw.startsWith("/") ? raw : `/${raw}`;
}

/**
 * Loads configuration from process.env.
 * Throws immediately if a variable is set to an invalid value.
 */
export function loadConfig(): AppConfig {
  const corsOrigin = process.env.CORS_ORIGIN;

  return {
    api: {
      port: readPositiveInt("API_PORT", 4000),
      host: process.env.API_HOST || "0.0.0.0",
      prefix: readPrefix(),
    },
    cors: {
      origin: corsOrigin
        ? corsOrigin.split(",").map((origin) => origin.trim()).filter(Boolean)
        : true,
    },
    rateLimit: {
      max: readPositiveInt("RATE_LIMIT_MAX", 100),
      windowMs: readPositiveInt("RATE_LIMIT_WINDOW_MS", 60_000),
    },
  };
}
