import assert from "node:assert/strict";
import test from "node:test";
import { toDevice, toFirmwareEvent, toFirmwareEventResponse, toProjectMember } from "../../src/services/firmware-store";

test("firmware event rows map BIGINT strings and timestamps", () => {
  const event = toFirmwareEvent({
    id: "42",
    device_id: "7",
    version: "1.4.0-rc.1",
    event_timestamp: "1700000000",
    created_at: new Date(Date.UTC(2024, 4, 2, 3, 4, 5))
  });

  assert.deepEqual(event, {
    id: 42,
    deviceId: 7,
    version: "1.4.0-rc.1",
    timestamp: 1_700_000_000,
    createdAt: "2024-05-02T03:04:05.000Z"
  });
});

test("firmware event rows accept numeric columns and string dates", () => {
  const event = toFirmwareEvent({
    id: 3,
    device_id: 9,
    version: "2.0.0",
    event_timestamp: 0,
    created_at: "2024-01-01T00:00:00Z"
  });

  assert.equal(event.timestamp, 0);
  assert.equal(event.createdAt, "2024-01-01T00:00:00.000Z");
});

test("firmware event response uses the public field names", () => {
  assert.deepEqual(
    toFirmwareEventResponse({
      id: 42,
      deviceId: 7,
      version: "1.4.0",
      timestamp: 1_700_000_000,
      createdAt: "2024-05-02T03:04:05.000Z"
    }),
    {
      device_id: 7,
      version: "1.4.0",
      timestamp: 1_700_000_000,
      created_at: "2024-05-02T03:04:05.000Z"
    }
  );
});

test("device and member rows carry their project id", () => {
  assert.deepEqual(toDevice({ id: "7", project_id: "1", name: "Sensor" }), { id: 7, projectId: 1, name: "Sensor" });
  assert.deepEqual(toProjectMember({ id: "3", project_id: "1", email: "member@example.com" }), {
    id: 3,
    projectId: 1,
    email: "member@example.com"
  });
});
