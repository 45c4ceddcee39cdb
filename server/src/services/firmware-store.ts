import { DatabaseError } from "pg";
import { Queryable } from "../db/connection";
import { toIso } from "../utils/time";

export type Device = {
  id: number;
  projectId: number;
  name: string;
};

export type ProjectMember = {
  id: number;
  projectId: number;
  email: string;
};

export type FirmwareEvent = {
  id: number;
  deviceId: number;
  version: string;
  timestamp: number;
  createdAt: string;
};

export type NewFirmwareEvent = {
  deviceId: number;
  version: string;
  timestamp: number;
};

export type InsertFirmwareEventResult =
  | { status: "inserted"; event: FirmwareEvent }
  | { status: "duplicate" }
  | { status: "device_missing" };

/**
 * Read/write access to devices, membership keys and firmware events.
 * Lookups by key take the SHA-256 hash, never the raw secret.
 */
export interface FirmwareStore {
  findDeviceByApiKeyHash(secretHash: string): Promise<Device | null>;
  findMemberByApiKeyHash(secretHash: string): Promise<ProjectMember | null>;
  findDeviceById(deviceId: number): Promise<Device | null>;
  findDeviceInProject(deviceId: number, projectId: number): Promise<Device | null>;
  insertFirmwareEvent(input: NewFirmwareEvent): Promise<InsertFirmwareEventResult>;
  listFirmwareEvents(deviceId: number): Promise<FirmwareEvent[]>;
  ping(): Promise<void>;
}

// BIGSERIAL/BIGINT columns arrive from pg as strings.
type DeviceRow = {
  id: string | number;
  project_id: string | number;
  name: string;
};

type MemberRow = {
  id: string | number;
  project_id: string | number;
  email: string;
};

type FirmwareEventRow = {
  id: string | number;
  device_id: string | number;
  version: string;
  event_timestamp: string | number;
  created_at: Date | string;
};

const FOREIGN_KEY_VIOLATION = "23503";

export function toDevice(row: DeviceRow): Device {
  return {
    id: Number(row.id),
    projectId: Number(row.project_id),
    name: row.name
  };
}

export function toProjectMember(row: MemberRow): ProjectMember {
  return {
    id: Number(row.id),
    projectId: Number(row.project_id),
    email: row.email
  };
}

export function toFirmwareEvent(row: FirmwareEventRow): FirmwareEvent {
  return {
    id: Number(row.id),
    deviceId: Number(row.device_id),
    version: row.version,
    timestamp: Number(row.event_timestamp),
    createdAt: toIso(row.created_at)
  };
}

export function toFirmwareEventResponse(event: FirmwareEvent): {
  device_id: number;
  version: string;
  timestamp: number;
  created_at: string;
} {
  return {
    device_id: event.deviceId,
    version: event.version,
    timestamp: event.timestamp,
    created_at: event.createdAt
  };
}

export class PostgresFirmwareStore implements FirmwareStore {
  constructor(private readonly db: Queryable) {}

  async findDeviceByApiKeyHash(secretHash: string): Promise<Device | null> {
    const result = await this.db.query<DeviceRow>(
      `SELECT d.id, d.project_id, d.name
       FROM device_api_keys k
       JOIN devices d ON d.id = k.device_id
       WHERE k.secret_hash = $1
         AND k.is_active = TRUE
       LIMIT 1`,
      [secretHash]
    );
    const row = result.rows[0];
    return row ? toDevice(row) : null;
  }

  async findMemberByApiKeyHash(secretHash: string): Promise<ProjectMember | null> {
    const result = await this.db.query<MemberRow>(
      `SELECT m.id, m.project_id, m.email
       FROM project_membership_api_keys k
       JOIN project_memberships m ON m.id = k.project_membership_id
       WHERE k.secret_hash = $1
         AND k.is_active = TRUE
       LIMIT 1`,
      [secretHash]
    );
    const row = result.rows[0];
    return row ? toProjectMember(row) : null;
  }

  async findDeviceById(deviceId: number): Promise<Device | null> {
    const result = await this.db.query<DeviceRow>(
      "SELECT id, project_id, name FROM devices WHERE id = $1 LIMIT 1",
      [deviceId]
    );
    const row = result.rows[0];
    return row ? toDevice(row) : null;
  }

  async findDeviceInProject(deviceId: number, projectId: number): Promise<Device | null> {
    const result = await this.db.query<DeviceRow>(
      `SELECT id, project_id, name
       FROM devices
       WHERE id = $1
         AND project_id = $2
       LIMIT 1`,
      [deviceId, projectId]
    );
    const row = result.rows[0];
    return row ? toDevice(row) : null;
  }

  async insertFirmwareEvent(input: NewFirmwareEvent): Promise<InsertFirmwareEventResult> {
    try {
      const result = await this.db.query<FirmwareEventRow>(
        `INSERT INTO device_firmware_events (device_id, version, event_timestamp)
         VALUES ($1, $2, $3)
         ON CONFLICT ON CONSTRAINT device_version_timestamp DO NOTHING
         RETURNING id, device_id, version, event_timestamp, created_at`,
        [input.deviceId, input.version, input.timestamp]
      );
      const row = result.rows[0];
      if (!row) {
        return { status: "duplicate" };
      }
      return { status: "inserted", event: toFirmwareEvent(row) };
    } catch (error) {
      if (error instanceof DatabaseError && error.code === FOREIGN_KEY_VIOLATION) {
        return { status: "device_missing" };
      }
      throw error;
    }
  }

  async listFirmwareEvents(deviceId: number): Promise<FirmwareEvent[]> {
    const result = await this.db.query<FirmwareEventRow>(
      `SELECT id, device_id, version, event_timestamp, created_at
       FROM device_firmware_events
       WHERE device_id = $1
       ORDER BY event_timestamp ASC, id ASC`,
      [deviceId]
    );
    return result.rows.map(toFirmwareEvent);
  }

  async ping(): Promise<void> {
    await this.db.query("SELECT 1");
  }
}
