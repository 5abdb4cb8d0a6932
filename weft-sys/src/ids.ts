import { v4 as uuidv4, validate } from "uuid";

export function newUUID4(): string {
  return uuidv4();
}

/**
 * Normalize a UUID string, or null if the value is not one
 */
export function toUUID(value: unknown): string | null {
  if (typeof value !== "string") return null;
  const trimmed = value.trim();
  return validate(trimmed) ? trimmed.toLowerCase() : null;
}
