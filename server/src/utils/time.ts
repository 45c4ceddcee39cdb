export function nowIso(): string {
  return new Date().toISOString();
}

export function toIso(value: Date | string): string {
  return value instanceof Date ? value.toISOString() : new Date(value).toISOString();
}
