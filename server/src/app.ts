import fastify, { FastifyServerOptions } from "fastify";
import { env } from "./config/env";
import { sendApiError } from "./http/api-error";
import { firmwareRoutes } from "./modules/firmware/routes";
import { FirmwareTaskQueue } from "./services/firmware-queue";
import { FirmwareStore } from "./services/firmware-store";
import { metricsService } from "./services/metrics-service";

export type AppDeps = {
  store: FirmwareStore;
  queue: FirmwareTaskQueue;
  logger?: FastifyServerOptions["logger"];
};

export function buildApp(deps: AppDeps) {
  const app = fastify({
    logger: deps.logger ?? { level: env.LOG_LEVEL },
    requestIdHeader: "x-request-id",
    requestIdLogLabel: "request_id",
    trustProxy: env.TRUST_PROXY
  });

  app.setErrorHandler((error, request, reply) => {
    // Fastify's own 4xx (malformed JSON, unsupported content type, oversized body).
    if (error.statusCode && error.statusCode >= 400 && error.statusCode < 500) {
      return sendApiError(reply, error.statusCode, error.code ?? "bad_request", error.message);
    }

    request.log.error({ err: error }, "unhandled request error");
    return sendApiError(reply, 500, "internal_error", "Internal Server Error");
  });

  app.setNotFoundHandler((request, reply) => {
    return sendApiError(reply, 404, "route_not_found", `Route ${request.method} ${request.url} not found.`);
  });

  app.get("/healthcheck", async () => {
    await deps.store.ping();
    return {
      status: 200,
      message: "Healthy"
    };
  });

  app.get("/metrics", async (_request, reply) => {
    const uptime = process.uptime().toFixed(3);

    reply.type("text/plain; version=0.0.4");
    return [
      "# HELP firmware_service_uptime_seconds Process uptime in seconds.",
      "# TYPE firmware_service_uptime_seconds gauge",
      `firmware_service_uptime_seconds ${uptime}`,
      metricsService.renderPrometheus()
    ].join("\n");
  });

  app.register(firmwareRoutes, {
    store: deps.store,
    queue: deps.queue
  });

  return app;
}
