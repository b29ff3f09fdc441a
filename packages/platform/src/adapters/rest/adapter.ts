/**
 * REST Adapter
 *
 * Mounts a JsonApi on a Fastify instance. Two catch-all routes per
 * declared resource forward every request to the engine:
 *
 *   ALL {prefix}/posts
 *   ALL {prefix}/posts/*
 *
 * Fastify's own body parsing is switched off inside the plugin so that the
 * engine sees the raw body and can answer 415 itself. Whatever the engine
 * returns is written out verbatim.
 *
 * Unmatched routes and errors raised by Fastify or its plugins (an
 * oversized body, a rate limit) are answered with error documents too.
 */

import type { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { z } from "zod";
import { BadRequestError, HttpError, NotFoundError, errorForStatus } from "../../core/errors/index.js";
import type { JsonApi, JsonApiResponse } from "../../core/lifecycle/api.js";

export interface JsonApiRouteOptions {
  /** Mount point (e.g., "/api"); resources are served at the root by default */
  prefix?: string;

  /** Values to expose to the role resolver and handlers (e.g., an authenticated user) */
  locals?: (request: FastifyRequest) => Record<string, unknown>;
}

/** Query values as Node's query-string parser delivers them */
const querySchema = z.record(z.union([z.string(), z.array(z.string())]));

function send(reply: FastifyReply, response: JsonApiResponse): FastifyReply {
  return reply.status(response.status).headers(response.headers).send(response.body);
}

function pathOf(request: FastifyRequest): string {
  return request.url.split("?")[0] ?? "";
}

/** Fastify's own client and server errors keep their status; anything else is unexpected */
function fromFastify(error: FastifyError): unknown {
  const status = error.statusCode;
  if (status === undefined || status < 400 || status > 599) return error;
  return errorForStatus(status, error.message) ?? new HttpError(status, error.message);
}

/**
 * Registers the resource routes of a JsonApi.
 */
export async function registerJsonApiRoutes(
  app: FastifyInstance,
  api: JsonApi,
  options: JsonApiRouteOptions = {}
): Promise<void> {
  const prefix = options.prefix ?? "";

  const handler = async (request: FastifyRequest, reply: FastifyReply) => {
    // A CORS preflight is answered with the headers the CORS plugin set;
    // only plain OPTIONS requests reach the engine.
    if (request.method === "OPTIONS" && request.headers["access-control-request-method"]) {
      return reply.status(204).send();
    }

    const path = pathOf(request).slice(prefix.length);

    const query = querySchema.safeParse(request.query ?? {});
    if (!query.success) {
      return send(
        reply,
        api.renderError(new BadRequestError("Malformed query string"), {
          method: request.method,
          path,
        })
      );
    }

    const response = await api.handle({
      method: request.method,
      path,
      query: query.data,
      headers: request.headers,
      body: typeof request.body === "string" ? request.body : undefined,
      locals: options.locals?.(request) ?? {},
      basePath: prefix,
    });
    return send(reply, response);
  };

  app.setNotFoundHandler(async (request, reply) => {
    const path = pathOf(request);
    return send(
      reply,
      api.renderError(new NotFoundError(`No route matches ${request.method} ${path}`), {
        method: request.method,
        path,
      })
    );
  });

  app.setErrorHandler(async (error: FastifyError, request, reply) => {
    return send(
      reply,
      api.renderError(fromFastify(error), { method: request.method, path: pathOf(request) })
    );
  });

  await app.register(
    async (scope) => {
      scope.removeAllContentTypeParsers();
      scope.addContentTypeParser("*", { parseAs: "string" }, (_request, body, done) => {
        done(null, body);
      });

      for (const name of api.resourceNames()) {
        scope.all(`/${name}`, handler);
        scope.all(`/${name}/*`, handler);
      }
    },
    { prefix }
  );
}
