import Fastify, { type FastifyServerOptions } from "fastify";
import { snapshotRoutes, assetRoutes, windowsUpdateRoutes, type ListRoutesOptions } from "./routes/index.js";

export interface BuildServerOptions {
  logger?: FastifyServerOptions["logger"];
  bodyLimit?: number;
  maxPageSize?: number;
}

/**
 * Create the HTTP API. The database must already be initialized.
 */
export function buildServer(options: BuildServerOptions = {}) {
  const fastify = Fastify({
    logger: options.logger ?? false,
    bodyLimit: options.bodyLimit,
  });

  const maxPageSize = options.maxPageSize ?? 1000;
  const listOptions: ListRoutesOptions = {
    clampLimit: (limit) => (limit === undefined ? undefined : Math.min(limit, maxPageSize)),
  };

  // Framework errors (bad JSON, oversized body) keep their 4xx status; anything else is a 500
  fastify.setErrorHandler((error, request, reply) => {
    if (error.statusCode !== undefined && error.statusCode < 500) {
      reply.status(error.statusCode).send({ error: error.message });
      return;
    }
    request.log.error({ err: error }, "Request failed");
    reply.status(500).send({ error: "Internal server error" });
  });

  fastify.setNotFoundHandler((request, reply) => {
    reply.status(404).send({ error: `Route ${request.method} ${request.url} not found` });
  });

  // Health check endpoint
  fastify.get("/health", async () => {
    return { status: "ok" };
  });

  fastify.register(snapshotRoutes, listOptions);
  fastify.register(assetRoutes, listOptions);
  fastify.register(windowsUpdateRoutes, listOptions);

  return fastify;
}
