/**
 * HTTP Server
 *
 * Builds the Fastify instance: security headers, rate limiting, CORS, a
 * health check, and the resource routes. Does not listen — index.ts does,
 * and tests use inject().
 */

import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import helmet from "@fastify/helmet";
import rateLimit from "@fastify/rate-limit";
import { registerJsonApiRoutes } from "@resourceful/platform";
import type { Application } from "./bootstrap.js";

export async function buildServer({ config, api }: Application): Promise<FastifyInstance> {
  const app = Fastify({
    logger: false, // We use our own structured logging
    // Trust proxy headers when behind a reverse proxy (e.g., Nginx, Cloudflare).
    // Required for rate limiting to use the real client IP, not the proxy's.
    trustProxy: process.env.NODE_ENV === "production",
  });

  // Security headers via Helmet (XSS, clickjacking, MIME sniffing, etc.)
  await app.register(helmet, {
    contentSecurityPolicy: process.env.NODE_ENV === "production",
  });

  // Rate limiting — protects against brute force and API abuse.
  await app.register(rateLimit, {
    max: config.rateLimit.max,
    timeWindow: config.rateLimit.windowMs,
  });

  // CORS — only the configured origins in production, any origin otherwise.
  await app.register(cors, {
    origin: config.cors.origin,
    credentials: true,
    methods: ["GET", "POST", "PATCH", "DELETE", "OPTIONS"],
    // Preflights fall through to the resource routes, which end them there
    preflightContinue: true,
  });

  app.get(`${config.api.prefix}/health`, async () => ({
    status: "ok",
    timestamp: new Date().toISOString(),
  }));

  await registerJsonApiRoutes(app, api, { prefix: config.api.prefix });

  return app;
}
