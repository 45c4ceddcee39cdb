import { createHash, randomUUID } from "node:crypto";

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export function sha256(input: string): string {
  return createHash("sha256").update(input).digest("hex");
}

export function newApiKey(): string {
  return randomUUID();
}

export function isApiKeyFormat(value: string): boolean {
  return UUID_PATTERN.test(value);
}

/** Keys are stored hashed; lookups hash the lowercased presented key. */
export function hashApiKey(key: string): string {
  return sha256(key.trim().toLowerCase());
}
