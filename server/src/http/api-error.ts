import { FastifyReply } from "fastify";
import { metricsService } from "../services/metrics-service";
import { ServiceError } from "../services/errors";

export function sendApiError(
  reply: FastifyReply,
  statusCode: number,
  code: string,
  message: string,
  details?: unknown
) {
  metricsService.observeApiError({ statusCode, code });
  return reply.code(statusCode).send({
    code,
    message,
    details: details ?? null,
    request_id: reply.request.id
  });
}

export function sendServiceError(reply: FastifyReply, error: ServiceError) {
  return sendApiError(reply, error.statusCode, error.code, error.message, error.details);
}
