import Fastify, { type FastifyInstance } from "fastify";
import type { Config } from "@warmstart/config";
import { log } from "./logger.js";
import { getMetrics, register } from "./metrics.js";
import type { LifecycleStatus } from "./messaging/index.js";

export interface StatusSource {
  getStatus(): LifecycleStatus;
}

/**
 * Health and metrics only. No business routes live here.
 */
export function buildStatusServer(
  messaging: StatusSource,
  config: Pick<Config, "NODE_ENV" | "WORKER_ID">
): FastifyInstance {
  const app = Fastify({
    logger: false, // We use our own structured logger
  });

  // Global error handler - prevent stack trace leakage in production
  app.setErrorHandler((error, request, reply) => {
    log.api.error(
      {
        error: error.message,
        stack: error.stack,
        url: request.url,
        method: request.method,
        requestId: request.id,
      },
      "unhandled error"
    );

    const statusCode = error.statusCode ?? 500;
    if (config.NODE_ENV === "production") {
      return reply.status(statusCode).send({
        error: statusCode === 500 ? "Internal server error" : error.message,
        requestId: request.id,
      });
    }

    return reply.status(statusCode).send({
      error: error.message,
      stack: error.stack,
      requestId: request.id,
    });
  });

  // Health check endpoint for k8s probes: ready only once messaging is live
  app.get("/health", async (_request, reply) => {
    const status = messaging.getStatus();
    return reply.status(status.phase === "live" ? 200 : 503).send({
      status: status.phase === "live" ? "ok" : "degraded",
      workerId: config.WORKER_ID,
      messaging: status,
      timestamp: new Date().toISOString(),
    });
  });

  app.get("/metrics", async (_request, reply) => {
    const body = await getMetrics();
    return reply.header("content-type", register.contentType).send(body);
  });

  return app;
}
