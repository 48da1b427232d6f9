/**
 * jobcast error taxonomy.
 *
 * Everything thrown by the parser, the transports and the formatter is a
 * NotifyError. The `code` is stable and safe to branch on; the message is
 * meant for humans.
 */

export type NotifyErrorCode =
  | "endpoint_parse"
  | "validation"
  | "transport"
  | "protocol"
  | "serialization"
  | "too_many_redirects";

/** Base class for all jobcast errors. */
export class NotifyError extends Error {
  readonly code: NotifyErrorCode;

  constructor(code: NotifyErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "NotifyError";
    this.code = code;
  }
}

/** A `host:port` string could not be parsed. */
export class EndpointParseError extends NotifyError {
  readonly input: string;

  constructor(input: string, reason: string) {
    super("endpoint_parse", `Cannot parse endpoint '${input}': ${reason}`);
    this.name = "EndpointParseError";
    this.input = input;
  }
}

/** Destination rejected by a transport's address grammar. Raised before any I/O. */
export class ValidationError extends NotifyError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("validation", message, options);
    this.name = "ValidationError";
  }
}

/** Connect, write or read failed. The underlying error is kept as `cause`. */
export class TransportError extends NotifyError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("transport", message, options);
    this.name = "TransportError";
  }
}

/** Unsupported URL scheme for the target or the proxy. Raised before connecting. */
export class ProtocolError extends NotifyError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("protocol", message, options);
    this.name = "ProtocolError";
  }
}

export class SerializationError extends NotifyError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("serialization", message, options);
    this.name = "SerializationError";
  }
}

/** The HTTP transport hit its redirect cap. */
export class TooManyRedirectsError extends NotifyError {
  readonly hops: number;
  readonly location: string;

  constructor(hops: number, location: string) {
    super("too_many_redirects", `Gave up after ${hops} redirects (next location: ${location})`);
    this.name = "TooManyRedirectsError";
    this.hops = hops;
    this.location = location;
  }
}

/** Render an unknown thrown value as a one-line message. */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
