/**
 * TCP transport — raw payload bytes over a fresh connection.
 *
 * Flow: connect → write whole payload → FIN → close once flushed.
 * `timeoutMs` bounds the connect and any idle period afterwards. There is
 * no framing; the receiver sees EOF as the end of the notification.
 */

import { createConnection } from "node:net";
import { TransportError } from "../errors.js";
import { formatEndpoint, parseEndpoint } from "../endpoint/parser.js";
import type { SendContext, SendRequest, Transport } from "./types.js";
import { validateHostPort } from "./validation.js";

const EXPECTED_FORMAT = "hostname:port";

function sendStream(request: SendRequest, context: SendContext): Promise<void> {
  const endpoint = parseEndpoint(request.destination);
  const target = formatEndpoint(endpoint);

  context.logger.debug?.(`[jobcast:tcp] sending ${request.payload.byteLength} bytes to ${target}`);

  return new Promise<void>((resolve, reject) => {
    const socket = createConnection({ host: endpoint.hostname, port: endpoint.port });
    let settled = false;

    const fail = (err: Error) => {
      if (settled) return;
      settled = true;
      socket.destroy();
      reject(new TransportError(`TCP send to ${target} failed: ${err.message}`, { cause: err }));
    };

    socket.setTimeout(request.timeoutMs);
    socket.on("timeout", () => {
      fail(new Error(`timed out after ${request.timeoutMs}ms`));
    });
    socket.on("error", fail);

    socket.on("connect", () => {
      // end() flushes the payload and sends FIN; its callback fires on "finish".
      socket.end(request.payload, () => {
        if (settled) return;
        settled = true;
        socket.destroy();
        resolve();
      });
    });
  });
}

export const streamTransport: Transport = {
  kind: "TCP",
  expectedFormat: EXPECTED_FORMAT,
  validate: (destination) => validateHostPort(destination, EXPECTED_FORMAT),
  send: sendStream,
};
