import { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { z } from "zod";
import { sendServiceError } from "../../http/api-error";
import { DEVICE_API_KEY_HEADER, MEMBERSHIP_API_KEY_HEADER, readHeader } from "../../http/api-key-headers";
import { AuthorizationError, NotFoundError, ServiceError, ValidationError } from "../../services/errors";
import { buildTaskMessage, firmwareReportSchema } from "../../services/firmware-message";
import { FirmwareTaskQueue } from "../../services/firmware-queue";
import { FirmwareStore, toFirmwareEventResponse } from "../../services/firmware-store";
import { KeyValidator } from "../../services/key-validator";
import { metricsService } from "../../services/metrics-service";

export type FirmwareRouteOptions = {
  store: FirmwareStore;
  queue: FirmwareTaskQueue;
};

const listFirmwareQuerySchema = z.object({
  device_id: z.coerce
    .number({ invalid_type_error: "device_id must be an integer" })
    .int("device_id must be an integer")
    .positive("device_id must be positive")
    .max(Number.MAX_SAFE_INTEGER, "device_id is out of range")
});

export async function firmwareRoutes(
  server: FastifyInstance,
  options: FirmwareRouteOptions
): Promise<void> {
  const keyValidator = new KeyValidator(options.store);

  server.decorateRequest("firmwareDevice", null);

  // onRequest runs before content-type parsing, so a bad key wins over a bad body.
  const requireDeviceKey = async (request: FastifyRequest, reply: FastifyReply) => {
    try {
      request.firmwareDevice = await keyValidator.resolveDevice(readHeader(request, DEVICE_API_KEY_HEADER));
    } catch (error) {
      if (error instanceof ServiceError) {
        return sendServiceError(reply, error);
      }

      throw error;
    }
  };

  server.post("/firmware", { onRequest: requireDeviceKey }, async (request, reply) => {
    try {
      const device = request.firmwareDevice;
      if (!device) {
        throw new AuthorizationError();
      }

      const parsed = firmwareReportSchema.safeParse(request.body);
      if (!parsed.success) {
        throw new ValidationError("Invalid request body.", parsed.error.flatten());
      }

      const message = buildTaskMessage(device.id, parsed.data);
      const started = Date.now();
      try {
        await options.queue.enqueue(message);
      } catch (error) {
        metricsService.observeEnqueue({ result: "failed", latencyMs: Date.now() - started });
        request.log.error({ err: error, device_id: device.id }, "firmware event enqueue failed");
        throw error;
      }
      metricsService.observeEnqueue({ result: "accepted", latencyMs: Date.now() - started });

      request.log.info(
        { device_id: device.id, version: message.version, timestamp: message.timestamp },
        "firmware event accepted"
      );
      return reply.code(202).send({ message: "Update Accepted." });
    } catch (error) {
      if (error instanceof ServiceError) {
        return sendServiceError(reply, error);
      }

      throw error;
    }
  });

  server.get("/firmware", async (request, reply) => {
    try {
      const member = await keyValidator.resolveMember(readHeader(request, MEMBERSHIP_API_KEY_HEADER));

      const parsed = listFirmwareQuerySchema.safeParse(request.query);
      if (!parsed.success) {
        throw new ValidationError("Invalid query.", parsed.error.flatten());
      }

      // Devices outside the member's project are reported as missing, not forbidden.
      const device = await options.store.findDeviceInProject(parsed.data.device_id, member.projectId);
      if (!device) {
        throw new NotFoundError("device_not_found", "Device not found.");
      }

      const events = await options.store.listFirmwareEvents(device.id);
      metricsService.observeListRequest();
      return reply.send(events.map(toFirmwareEventResponse));
    } catch (error) {
      if (error instanceof ServiceError) {
        return sendServiceError(reply, error);
      }

      throw error;
    }
  });
}
