import "fastify";
import { Device } from "../services/firmware-store";

declare module "fastify" {
  interface FastifyRequest {
    // Set by the device-key hook on POST /firmware before the body is parsed.
    firmwareDevice: Device | null;
  }
}
