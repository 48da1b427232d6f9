/**
 * jobcast configuration resolution.
 *
 * Two entry points:
 *   1. Embedded:   resolveNotifyConfig(raw) — host passes an untyped record
 *   2. Standalone: loadNotifyConfig() — reads from file / env directly
 */

import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { isFormat, type Format } from "./format/index.js";
import { PHASES } from "./format/job-state.js";
import { DEFAULT_TIMEOUT_MS, type EndpointEvent, type NotifyEndpoint } from "./notifier.js";
import { DEFAULT_MAX_REDIRECTS } from "./transport/http.js";
import { parseProxyUrl, type ProxyConfig } from "./transport/proxy.js";
import { TRANSPORT_KINDS } from "./transport/types.js";
import { isLogLevel, type LogLevel } from "./types.js";

export interface NotifyConfig {
  endpoints: NotifyEndpoint[];
  defaultTimeoutMs: number;
  maxRedirects: number;
  /**
   * undefined: consult `http_proxy` at send time.
   * null: always connect directly.
   */
  proxy: ProxyConfig | null | undefined;
  logLevel: LogLevel;
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/** Safely coerce an unknown value to a string-keyed record. */
function toRecord(v: unknown): Record<string, unknown> {
  return isRecord(v) ? v : {};
}

function nonNegativeInt(v: unknown): number | undefined {
  return typeof v === "number" && Number.isInteger(v) && v >= 0 ? v : undefined;
}

function upper(v: unknown): string | undefined {
  return typeof v === "string" ? v.trim().toUpperCase() : undefined;
}

function resolveEvent(v: unknown): EndpointEvent | undefined {
  if (typeof v !== "string") return undefined;
  if (v.trim().toLowerCase() === "all") return "all";
  return PHASES.find((p) => p === v.trim().toUpperCase());
}

function resolveEndpoint(n: unknown): NotifyEndpoint | null {
  const obj = toRecord(n);
  if (typeof obj.url !== "string") return null;

  const transportName = upper(obj.transport ?? obj.protocol) ?? "HTTP";
  const transport = TRANSPORT_KINDS.find((k) => k === transportName);
  if (!transport) return null;

  const formatName = upper(obj.format) ?? "JSON";
  if (!isFormat(formatName)) return null;
  const format: Format = formatName;

  const endpoint: NotifyEndpoint = { transport, format, url: obj.url };
  const timeoutMs = nonNegativeInt(obj.timeoutMs ?? obj.timeout);
  if (timeoutMs !== undefined) endpoint.timeoutMs = timeoutMs;
  const event = resolveEvent(obj.event);
  if (event !== undefined) endpoint.event = event;
  return endpoint;
}

/**
 * `proxy` accepts a URL string, a { host, port } object, or `false` to
 * force direct connections. Anything else leaves proxy selection to the
 * environment.
 */
function resolveProxyOption(v: unknown): ProxyConfig | null | undefined {
  if (v === false || v === null) return null;
  if (typeof v === "string") return parseProxyUrl(v);
  const obj = toRecord(v);
  if (typeof obj.host === "string" && obj.host.length > 0) {
    return { host: obj.host, port: nonNegativeInt(obj.port) ?? 80 };
  }
  return undefined;
}

export function resolveNotifyConfig(raw?: Record<string, unknown> | null): NotifyConfig {
  const r = raw ?? {};

  const endpoints: NotifyEndpoint[] = Array.isArray(r.endpoints)
    ? r.endpoints
        .map(resolveEndpoint)
        .filter((e): e is NotifyEndpoint => e !== null)
    : [];

  return {
    endpoints,
    defaultTimeoutMs: nonNegativeInt(r.defaultTimeoutMs) ?? DEFAULT_TIMEOUT_MS,
    maxRedirects: nonNegativeInt(r.maxRedirects) ?? DEFAULT_MAX_REDIRECTS,
    proxy: resolveProxyOption(r.proxy),
    logLevel: isLogLevel(r.logLevel) ? r.logLevel : "info",
  };
}

/**
 * Default config file search paths (highest priority first):
 *   1. $JOBCAST_CONFIG env
 *   2. ./jobcast.json (cwd)
 *   3. ~/.jobcast/jobcast.json
 */
function resolveConfigPath(): string | null {
  if (process.env.JOBCAST_CONFIG) {
    return process.env.JOBCAST_CONFIG;
  }
  const cwdPath = path.resolve("jobcast.json");
  if (fs.existsSync(cwdPath)) return cwdPath;

  const homePath = path.join(os.homedir(), ".jobcast", "jobcast.json");
  if (fs.existsSync(homePath)) return homePath;

  return null;
}

/**
 * Load config from the file system (standalone mode).
 * Falls back to defaults if no config file is found.
 * JOBCAST_LOG_LEVEL overrides the file's logLevel.
 */
export function loadNotifyConfig(): NotifyConfig {
  const configPath = resolveConfigPath();
  let config: NotifyConfig;

  if (!configPath) {
    config = resolveNotifyConfig({});
  } else {
    const raw: unknown = JSON.parse(fs.readFileSync(configPath, "utf8"));
    if (!isRecord(raw)) {
      throw new Error(`Invalid jobcast config at ${configPath}: expected a JSON object`);
    }
    config = resolveNotifyConfig(raw);
  }

  const envLevel = process.env.JOBCAST_LOG_LEVEL?.trim().toLowerCase();
  if (isLogLevel(envLevel)) {
    config.logLevel = envLevel;
  }
  return config;
}
