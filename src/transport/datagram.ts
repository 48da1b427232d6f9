/**
 * UDP transport: one datagram per notification, fire-and-forget.
 *
 * No acknowledgement and no timeout. The socket lives only for the
 * duration of the send and is closed on every path. Payloads above the
 * datagram size limit surface as a TransportError (EMSGSIZE).
 */

import { createSocket, type SocketType } from "node:dgram";
import { isIPv6 } from "node:net";
import { TransportError } from "../errors.js";
import { formatEndpoint, parseEndpoint } from "../endpoint/parser.js";
import type { SendContext, SendRequest, Transport } from "./types.js";
import { validateHostPort } from "./validation.js";

const EXPECTED_FORMAT = "hostname:port";

function sendDatagram(request: SendRequest, context: SendContext): Promise<void> {
  const endpoint = parseEndpoint(request.destination);
  const target = formatEndpoint(endpoint);
  const type: SocketType = isIPv6(endpoint.hostname) ? "udp6" : "udp4";

  context.logger.debug?.(`[jobcast:udp] sending ${request.payload.byteLength} bytes to ${target}`);

  return new Promise<void>((resolve, reject) => {
    const socket = createSocket(type);
    let settled = false;

    const finish = (err?: Error | null) => {
      if (settled) return;
      settled = true;
      socket.close();
      if (err) {
        reject(new TransportError(`UDP send to ${target} failed: ${err.message}`, { cause: err }));
      } else {
        resolve();
      }
    };

    socket.once("error", finish);
    socket.send(request.payload, endpoint.port, endpoint.hostname, (err) => finish(err));
  });
}

export const datagramTransport: Transport = {
  kind: "UDP",
  expectedFormat: EXPECTED_FORMAT,
  validate: (destination) => validateHostPort(destination, EXPECTED_FORMAT),
  send: sendDatagram,
};
