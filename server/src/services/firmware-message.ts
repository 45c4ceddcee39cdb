import semver from "semver";
import { z } from "zod";

/**
 * major.minor.patch with optional pre-release and build metadata. semver.parse
 * on its own also accepts a leading "v" and surrounding whitespace.
 */
export function isSemanticVersion(value: string): boolean {
  return /^\d/.test(value) && value === value.trim() && semver.parse(value) !== null;
}

export const firmwareVersionSchema = z
  .string({ required_error: "version is required" })
  .min(1, "version is required")
  .max(256)
  .refine(isSemanticVersion, { message: "version must be a semantic version (major.minor.patch)" });

export const firmwareTimestampSchema = z
  .number({ required_error: "timestamp is required", invalid_type_error: "timestamp must be an integer" })
  .int("timestamp must be an integer")
  .nonnegative("timestamp must not be negative")
  .max(Number.MAX_SAFE_INTEGER);

export const firmwareReportSchema = z.object({
  version: firmwareVersionSchema,
  timestamp: firmwareTimestampSchema
});

export type FirmwareReport = z.infer<typeof firmwareReportSchema>;

export const firmwareTaskMessageSchema = z.object({
  device_id: z.number().int().positive(),
  version: firmwareVersionSchema,
  timestamp: firmwareTimestampSchema
});

export type FirmwareTaskMessage = z.infer<typeof firmwareTaskMessageSchema>;

export function buildTaskMessage(deviceId: number, report: FirmwareReport): FirmwareTaskMessage {
  return {
    device_id: deviceId,
    version: report.version,
    timestamp: report.timestamp
  };
}
