/**
 * jobcast transport types.
 *
 * The transports form a closed set keyed by TransportKind. Each one is a
 * plain object exposing the same validate/send capability pair; the
 * dispatcher looks them up by tag.
 */

import type { NotifyLogger } from "../types.js";
import type { ProxyConfig } from "./proxy.js";

export type TransportKind = "UDP" | "TCP" | "HTTP";

export const TRANSPORT_KINDS: readonly TransportKind[] = ["UDP", "TCP", "HTTP"];

/** One delivery attempt. Redirect hops build a fresh request with a new destination. */
export interface SendRequest {
  readonly destination: string;
  readonly payload: Uint8Array;
  /** Connect/read budget in ms. Ignored by UDP. */
  readonly timeoutMs: number;
  /** Selects the HTTP Content-Type. Ignored by UDP and TCP. */
  readonly contentIsJson: boolean;
}

/** Collaborators supplied by the caller for a single send. */
export interface SendContext {
  logger: NotifyLogger;
  /**
   * Proxy for the HTTP transport. `null` forces a direct connection;
   * leaving it undefined falls back to the `http_proxy` variable in `env`.
   */
  proxy?: ProxyConfig | null;
  /** Environment consulted for `http_proxy`. Default: process.env. */
  env?: NodeJS.ProcessEnv;
  /** Redirect hop cap for the HTTP transport. Default: 10. */
  maxRedirects?: number;
}

export interface Transport {
  readonly kind: TransportKind;
  /** Human-readable shape of a valid destination, e.g. "hostname:port". */
  readonly expectedFormat: string;
  /** Throws ValidationError when the destination does not fit this transport. */
  validate(destination: string): void;
  send(request: SendRequest, context: SendContext): Promise<void>;
}
