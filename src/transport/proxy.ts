/**
 * HTTP proxy resolution.
 *
 * Resolution order for a send:
 *   1. Explicit ProxyConfig from the caller (or explicit `null` = direct)
 *   2. `http_proxy` / `HTTP_PROXY` from the supplied environment
 *   3. Direct connection
 */

import { ProtocolError } from "../errors.js";

export interface ProxyConfig {
  host: string;
  port: number;
}

export const DEFAULT_PROXY_PORT = 80;

const PROXY_ENV_VARS = ["http_proxy", "HTTP_PROXY"] as const;

/** Parse a proxy URL such as `http://proxy.internal:3128`. */
export function parseProxyUrl(raw: string): ProxyConfig {
  let url: URL;
  try {
    url = new URL(raw);
  } catch (err) {
    throw new ProtocolError(`Malformed proxy URL: ${raw}`, { cause: err });
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new ProtocolError(`Not an http(s) url: ${raw}`);
  }
  if (url.hostname.length === 0) {
    throw new ProtocolError(`Malformed proxy URL: ${raw}`);
  }
  // URL drops the port when it equals the scheme default, so 443 on an
  // https proxy URL also reads as empty here and falls back to 80.
  const port = url.port.length > 0 ? Number.parseInt(url.port, 10) : DEFAULT_PROXY_PORT;
  return { host: url.hostname.replace(/^\[|\]$/g, ""), port };
}

export function proxyFromEnv(env: NodeJS.ProcessEnv): ProxyConfig | null {
  for (const name of PROXY_ENV_VARS) {
    const value = env[name]?.trim();
    if (value) return parseProxyUrl(value);
  }
  return null;
}

export function resolveProxy(
  explicit: ProxyConfig | null | undefined,
  env: NodeJS.ProcessEnv,
): ProxyConfig | null {
  if (explicit !== undefined) return explicit;
  return proxyFromEnv(env);
}

/** Proxy URI in the form the HTTP client expects. */
export function proxyUrl(config: ProxyConfig): string {
  const host = config.host.includes(":") ? `[${config.host}]` : config.host;
  return `http://${host}:${config.port}`;
}
