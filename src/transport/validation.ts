/**
 * Destination validation shared by the transports.
 */

import { ValidationError } from "../errors.js";
import { tryParseEndpoint } from "../endpoint/parser.js";

function isBlank(value: string | null | undefined): boolean {
  return value === null || value === undefined || value.trim().length === 0;
}

/**
 * Build the user-facing rejection.
 *
 *   invalidDestination("nope", "hostname:port")
 *     → "Invalid URL 'nope'. Use hostname:port for endpoint URL"
 *   invalidDestination("", "hostname:port")
 *     → "Use hostname:port for endpoint URL"
 */
export function invalidDestination(
  destination: string | null | undefined,
  expectedFormat: string,
  cause?: unknown,
): ValidationError {
  const prefix = isBlank(destination) ? "" : `Invalid URL '${destination}'. `;
  return new ValidationError(
    `${prefix}Use ${expectedFormat} for endpoint URL`,
    cause === undefined ? undefined : { cause },
  );
}

/** Default rule for socket transports: the endpoint parser must succeed. */
export function validateHostPort(destination: string, expectedFormat: string): void {
  if (isBlank(destination) || tryParseEndpoint(destination) === null) {
    throw invalidDestination(destination, expectedFormat);
  }
}

/**
 * HTTP rule: `$` marks an unresolved placeholder from the calling
 * environment and bypasses the check. Anything else must be an absolute
 * URL with a host.
 */
export function validateHttpUrl(destination: string, expectedFormat: string): void {
  if (destination.includes("$")) return;

  if (isBlank(destination)) {
    throw invalidDestination(destination, expectedFormat);
  }

  let parsed: URL;
  try {
    parsed = new URL(destination);
  } catch (err) {
    throw invalidDestination(destination, expectedFormat, err);
  }
  if (parsed.host.length === 0) {
    throw invalidDestination(destination, expectedFormat);
  }
}
