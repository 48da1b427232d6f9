/**
 * Endpoint parser for the socket transports.
 *
 * Turns `host:port` (or anything URL-shaped around it) into a structured
 * Endpoint. Scheme, userinfo, path, query and fragment are discarded so a
 * full URL yields just its authority's host and port.
 *
 *   "localhost:9000"                    → { hostname: "localhost", port: 9000 }
 *   "tcp://user:pw@ci.internal:4000/x"  → { hostname: "ci.internal", port: 4000 }
 *   "[::1]:5140"                        → { hostname: "::1", port: 5140 }
 */

import { EndpointParseError } from "../errors.js";

export interface Endpoint {
  hostname: string;
  port: number;
}

export const MAX_PORT = 65535;

const SCHEME_PREFIX = /^[a-zA-Z][a-zA-Z0-9+.-]*:\/\//;
const DIGITS = /^\d+$/;

/** Strip everything around the authority component. */
function extractAuthority(input: string): string {
  let rest = input.replace(SCHEME_PREFIX, "");

  const end = rest.search(/[/?#]/);
  if (end !== -1) rest = rest.slice(0, end);

  // Userinfo may itself contain ':' so only the last '@' separates it.
  const at = rest.lastIndexOf("@");
  if (at !== -1) rest = rest.slice(at + 1);

  return rest;
}

export function parseEndpoint(input: string): Endpoint {
  const trimmed = input.trim();
  if (trimmed.length === 0) {
    throw new EndpointParseError(input, "empty endpoint");
  }

  const authority = extractAuthority(trimmed);

  let hostname: string;
  let portText: string;

  if (authority.startsWith("[")) {
    const close = authority.indexOf("]");
    if (close === -1) {
      throw new EndpointParseError(input, "unterminated IPv6 literal");
    }
    hostname = authority.slice(1, close);
    const after = authority.slice(close + 1);
    if (!after.startsWith(":")) {
      throw new EndpointParseError(input, "missing ':port' suffix");
    }
    portText = after.slice(1);
  } else {
    const colon = authority.lastIndexOf(":");
    if (colon === -1) {
      throw new EndpointParseError(input, "missing ':port' suffix");
    }
    hostname = authority.slice(0, colon);
    portText = authority.slice(colon + 1);
  }

  if (hostname.length === 0) {
    throw new EndpointParseError(input, "missing hostname");
  }
  if (!DIGITS.test(portText)) {
    throw new EndpointParseError(input, `port '${portText}' is not a non-negative integer`);
  }
  const port = Number.parseInt(portText, 10);
  if (port > MAX_PORT) {
    throw new EndpointParseError(input, `port ${port} is out of range 0-${MAX_PORT}`);
  }

  return { hostname, port };
}

/** Non-throwing variant of parseEndpoint(). */
export function tryParseEndpoint(input: string): Endpoint | null {
  try {
    return parseEndpoint(input);
  } catch (err) {
    if (err instanceof EndpointParseError) return null;
    throw err;
  }
}

export function formatEndpoint(endpoint: Endpoint): string {
  const host = endpoint.hostname.includes(":") ? `[${endpoint.hostname}]` : endpoint.hostname;
  return `${host}:${endpoint.port}`;
}
