/**
 * Payload formatter — job state to bytes.
 *
 * The format also decides the HTTP Content-Type via isJsonFormat().
 */

import { SerializationError, ValidationError, describeError } from "../errors.js";
import { encodeJson } from "./json.js";
import type { JobState } from "./job-state.js";
import { encodeXml } from "./xml.js";

export type Format = "XML" | "JSON";

export const FORMATS: readonly Format[] = ["XML", "JSON"];

export function isFormat(value: unknown): value is Format {
  return typeof value === "string" && (FORMATS as readonly string[]).includes(value);
}

/** Case-insensitive: "json", "Json" and "JSON" all select JSON. */
export function parseFormat(raw: string): Format {
  const normalized = raw.trim().toUpperCase();
  if (!isFormat(normalized)) {
    throw new ValidationError(`Unknown format '${raw}'. Use one of: ${FORMATS.join(", ")}`);
  }
  return normalized;
}

export function isJsonFormat(format: Format): boolean {
  return format === "JSON";
}

const encoder = new TextEncoder();

/** Serialize to UTF-8 bytes. Throws SerializationError. */
export function serialize(jobState: JobState, format: Format): Uint8Array {
  let text: string;
  try {
    text = format === "JSON" ? encodeJson(jobState) : encodeXml(jobState);
  } catch (err) {
    throw new SerializationError(
      `Failed to encode job state '${jobState.name}' as ${format}: ${describeError(err)}`,
      { cause: err },
    );
  }
  return encoder.encode(text);
}

export { contentTypeFor } from "./content-type.js";
export { toLowerUnderscore } from "./naming.js";
export { jobStateFromJson, PHASES, type BuildState, type JobState, type Phase } from "./job-state.js";
