/**
 * Transport dispatcher.
 *
 * Looks up the strategy for a TransportKind and runs validate → send.
 * Validation always happens before any socket is opened.
 */

import { ValidationError } from "../errors.js";
import { datagramTransport } from "./datagram.js";
import { httpTransport } from "./http.js";
import { streamTransport } from "./stream.js";
import { TRANSPORT_KINDS, type SendContext, type SendRequest, type Transport, type TransportKind } from "./types.js";

const TRANSPORTS: Record<TransportKind, Transport> = {
  UDP: datagramTransport,
  TCP: streamTransport,
  HTTP: httpTransport,
};

export function isTransportKind(value: unknown): value is TransportKind {
  return typeof value === "string" && (TRANSPORT_KINDS as readonly string[]).includes(value);
}

/** Case-insensitive: "udp", "Udp" and "UDP" all select UDP. */
export function parseTransportKind(raw: string): TransportKind {
  const normalized = raw.trim().toUpperCase();
  if (!isTransportKind(normalized)) {
    throw new ValidationError(
      `Unknown transport '${raw}'. Use one of: ${TRANSPORT_KINDS.join(", ")}`,
    );
  }
  return normalized;
}

export function getTransport(kind: TransportKind): Transport {
  return TRANSPORTS[kind];
}

export function validateDestination(kind: TransportKind, destination: string): void {
  TRANSPORTS[kind].validate(destination);
}

export async function sendPayload(
  kind: TransportKind,
  request: SendRequest,
  context: SendContext,
): Promise<void> {
  const transport = TRANSPORTS[kind];
  transport.validate(request.destination);
  await transport.send(request, context);
}

export { TRANSPORT_KINDS };
export type { SendContext, SendRequest, Transport, TransportKind };
export { DEFAULT_MAX_REDIRECTS, basicAuthorization } from "./http.js";
export {
  parseProxyUrl,
  proxyFromEnv,
  resolveProxy,
  DEFAULT_PROXY_PORT,
  type ProxyConfig,
} from "./proxy.js";
