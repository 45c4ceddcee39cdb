import assert from "node:assert/strict";
import test from "node:test";
import { AuthorizationError } from "../../src/services/errors";
import { KeyValidator } from "../../src/services/key-validator";
import { InMemoryFirmwareStore } from "../helpers/in-memory";

const DEVICE_KEY = "0b5a3c1e-0000-4000-8000-000000000001";
const MEMBER_KEY = "0b5a3c1e-0000-4000-8000-000000000002";
const UNKNOWN_KEY = "0b5a3c1e-0000-4000-8000-0000000000ff";

function setup() {
  const store = new InMemoryFirmwareStore();
  store.addDevice({ id: 7, projectId: 1, name: "Test Device" }, DEVICE_KEY);
  store.addMember({ id: 3, projectId: 1, email: "member@example.com" }, MEMBER_KEY);
  return { store, validator: new KeyValidator(store) };
}

async function assertUnauthorized(work: Promise<unknown>): Promise<void> {
  await assert.rejects(work, (error: unknown) => {
    assert.ok(error instanceof AuthorizationError);
    assert.equal(error.statusCode, 401);
    assert.equal(error.code, "unauthorized");
    assert.equal(error.message, "Access denied. Unauthorized request.");
    return true;
  });
}

test("key validator resolves a device key to its device", async () => {
  const { validator } = setup();
  const device = await validator.resolveDevice(DEVICE_KEY);
  assert.deepEqual(device, { id: 7, projectId: 1, name: "Test Device" });
});

test("key validator accepts keys regardless of case and padding", async () => {
  const { validator } = setup();
  const device = await validator.resolveDevice(`  ${DEVICE_KEY.toUpperCase()} `);
  assert.equal(device.id, 7);
});

test("key validator resolves a membership key to its member", async () => {
  const { validator } = setup();
  const member = await validator.resolveMember(MEMBER_KEY);
  assert.deepEqual(member, { id: 3, projectId: 1, email: "member@example.com" });
});

test("key validator gives the same failure for absent, malformed and unknown keys", async () => {
  const { validator } = setup();
  await assertUnauthorized(validator.resolveDevice(undefined));
  await assertUnauthorized(validator.resolveDevice(""));
  await assertUnauthorized(validator.resolveDevice("not-a-key"));
  await assertUnauthorized(validator.resolveDevice(UNKNOWN_KEY));
  await assertUnauthorized(validator.resolveMember(undefined));
  await assertUnauthorized(validator.resolveMember(UNKNOWN_KEY));
});

test("key validator does not accept a key of the other class", async () => {
  const { validator } = setup();
  await assertUnauthorized(validator.resolveDevice(MEMBER_KEY));
  await assertUnauthorized(validator.resolveMember(DEVICE_KEY));
});

test("key validator fails when the bound device is gone", async () => {
  const { store, validator } = setup();
  store.removeDevice(7);
  await assertUnauthorized(validator.resolveDevice(DEVICE_KEY));
});
