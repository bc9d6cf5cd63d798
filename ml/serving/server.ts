import Fastify from "fastify";
import type { FastifyInstance, FastifyReply } from "fastify";

import type { Logger } from "../logging/logger";
import { handlePredict, handleReload } from "./handlers";
import type { HandlerResponse } from "./handlers";
import type { ModelHandle } from "./model_handle";

export type ServerOptions = {
  logger: Logger;
  /** Bearer token required by POST /reload; open when unset. */
  reloadToken?: string;
  bodyLimit?: number;
};

export const DEFAULT_BODY_LIMIT = 1_000_000;

function send(reply: FastifyReply, response: HandlerResponse) {
  return reply.status(response.status).send(response.body);
}

/**
 * HTTP surface over a ModelHandle:
 *
 *   GET  /health   -> { status, model_version }
 *   POST /predict  -> { records: [{ feature: value }] }
 *   POST /reload   -> reloads the champion
 */
export function buildServer(handle: ModelHandle, options: ServerOptions): FastifyInstance {
  const { logger } = options;
  const app = Fastify({
    logger: false,
    bodyLimit: options.bodyLimit ?? DEFAULT_BODY_LIMIT,
  });

  app.setErrorHandler((err, request, reply) => {
    const status = err.statusCode ?? 500;
    if (status >= 500) {
      logger.error(`Unhandled error on ${request.method} ${request.url}: ${err.message}`);
      return reply.status(status).send({ error: "Internal error" });
    }
    // Malformed JSON, oversized bodies and other client faults reported by fastify.
    return reply.status(status).send({ error: err.message });
  });

  app.setNotFoundHandler((request, reply) => {
    reply.status(404).send({ error: `Not found: ${request.method} ${request.url}` });
  });

  app.get("/health", async () => {
    const current = handle.current();
    return { status: "ok", model_version: current ? current.version.version : null };
  });

  app.post("/predict", async (request, reply) => send(reply, handlePredict(handle, request.body, logger)));

  app.post("/reload", async (request, reply) =>
    send(reply, await handleReload(handle, request.headers.authorization, options.reloadToken, logger))
  );

  return app;
}
