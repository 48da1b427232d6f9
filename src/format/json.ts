/**
 * JSON encoding of a job state.
 *
 * Field names are rewritten with toLowerUnderscore(); keys of Map values
 * are data and pass through unchanged. Undefined fields are omitted.
 */

import { toLowerUnderscore } from "./naming.js";

type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function toJsonValue(value: unknown): JsonValue {
  if (value === null) return null;
  if (typeof value === "string" || typeof value === "boolean") return value;
  if (typeof value === "number") {
    if (!Number.isFinite(value)) {
      throw new TypeError(`Cannot encode non-finite number ${value}`);
    }
    return value;
  }
  if (Array.isArray(value)) return value.map(toJsonValue);
  if (value instanceof Map) {
    const out: { [key: string]: JsonValue } = {};
    for (const [key, entry] of value) {
      if (entry !== undefined) out[String(key)] = toJsonValue(entry);
    }
    return out;
  }
  if (value instanceof Date) return value.toISOString();
  if (isRecord(value)) {
    const out: { [key: string]: JsonValue } = {};
    for (const [key, field] of Object.entries(value)) {
      if (field !== undefined) out[toLowerUnderscore(key)] = toJsonValue(field);
    }
    return out;
  }
  throw new TypeError(`Cannot encode value of type ${typeof value}`);
}

export function encodeJson(value: unknown): string {
  return JSON.stringify(toJsonValue(value));
}
