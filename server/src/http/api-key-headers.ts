import { FastifyRequest } from "fastify";

export const DEVICE_API_KEY_HEADER = "x-device-api-key";
export const MEMBERSHIP_API_KEY_HEADER = "x-project-membership-api-key";

export function readHeader(request: FastifyRequest, name: string): string | undefined {
  const value = request.headers[name];
  if (Array.isArray(value)) {
    return value[0];
  }
  return value;
}
