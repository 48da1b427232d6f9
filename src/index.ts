/**
 * jobcast — transport-agnostic build notification sender.
 *
 * Provides:
 * - Endpoint parsing for `host:port` destinations
 * - UDP, TCP and HTTP(S) transports behind one validate/send dispatcher
 * - HTTP proxying, basic auth from URL userinfo, bounded 307 redirect chasing
 * - XML / JSON job-state payloads
 * - A notifier that fans a job state out to configured endpoints
 */

export {
  NotifyError,
  EndpointParseError,
  ValidationError,
  TransportError,
  ProtocolError,
  SerializationError,
  TooManyRedirectsError,
  type NotifyErrorCode,
} from "./errors.js";
export { parseEndpoint, tryParseEndpoint, formatEndpoint, type Endpoint } from "./endpoint/parser.js";
export {
  TRANSPORT_KINDS,
  DEFAULT_MAX_REDIRECTS,
  DEFAULT_PROXY_PORT,
  getTransport,
  parseTransportKind,
  validateDestination,
  sendPayload,
  parseProxyUrl,
  proxyFromEnv,
  resolveProxy,
  type ProxyConfig,
  type SendContext,
  type SendRequest,
  type Transport,
  type TransportKind,
} from "./transport/index.js";
export {
  FORMATS,
  PHASES,
  serialize,
  parseFormat,
  isJsonFormat,
  contentTypeFor,
  jobStateFromJson,
  type Format,
  type JobState,
  type BuildState,
  type Phase,
} from "./format/index.js";
export {
  createNotifier,
  DEFAULT_TIMEOUT_MS,
  type Notifier,
  type NotifierOptions,
  type NotifyEndpoint,
  type NotifyOutcome,
} from "./notifier.js";
export { createNotifyLogger, silentLogger, type NotifyLoggerOptions } from "./logger.js";
export { loadNotifyConfig, resolveNotifyConfig, type NotifyConfig } from "./config.js";
export type { NotifyLogger, LogLevel } from "./types.js";
