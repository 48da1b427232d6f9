/**
 * HTTP(S) transport — POST the payload, chase 307 redirects.
 *
 * Per hop:
 *   Parsed → ProxyResolved → Connected → HeadersSet → BodySent
 *     → ResponseReceived → Done | RedirectFollowed (next hop)
 *
 * - Only `http:` and `https:` targets are accepted (ProtocolError otherwise).
 * - Userinfo in the URL becomes `Authorization: Basic …` and is stripped
 *   from the request line.
 * - The body is sent with a fixed Content-Length, never chunked.
 * - A 307 with a Location header repeats the same POST against the new
 *   location. Hops run in a loop capped by `maxRedirects`; exceeding the
 *   cap throws TooManyRedirectsError.
 * - Every other status, 4xx and 5xx included, counts as a completed
 *   delivery attempt. The receiver's verdict is logged, not raised.
 * - `timeoutMs` is a per-hop budget: each redirect hop starts a fresh one.
 *   Worst-case latency is therefore (maxRedirects + 1) × timeoutMs.
 *
 * Each hop gets its own undici dispatcher (direct Agent or ProxyAgent),
 * destroyed before the next hop starts or the call returns, so no
 * connection outlives the send.
 */

import { Agent, ProxyAgent, fetch, type Dispatcher } from "undici";
import { ProtocolError, TooManyRedirectsError, TransportError, describeError } from "../errors.js";
import { contentTypeFor } from "../format/content-type.js";
import { proxyUrl, resolveProxy, type ProxyConfig } from "./proxy.js";
import type { SendContext, SendRequest, Transport } from "./types.js";
import { validateHttpUrl } from "./validation.js";

const EXPECTED_FORMAT = "http://hostname:port/path";

export const DEFAULT_MAX_REDIRECTS = 10;

const TEMPORARY_REDIRECT = 307;

function parseTargetUrl(destination: string): URL {
  let url: URL;
  try {
    url = new URL(destination);
  } catch (err) {
    throw new ProtocolError(`Malformed URL: ${destination}`, { cause: err });
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new ProtocolError(`Not an http(s) url: ${destination}`);
  }
  return url;
}

function resolveLocation(location: string, base: string): string {
  try {
    return new URL(location, base).href;
  } catch (err) {
    throw new ProtocolError(`Malformed redirect location: ${location}`, { cause: err });
  }
}

function decodeUserInfoPart(part: string): string {
  try {
    return decodeURIComponent(part);
  } catch {
    // Stray '%' that is not an escape: send it as written.
    return part;
  }
}

/** `Basic base64(user[:password])` from the URL's userinfo, if any. */
export function basicAuthorization(url: URL): string | undefined {
  if (url.username.length === 0 && url.password.length === 0) return undefined;
  const user = decodeUserInfoPart(url.username);
  const userInfo = url.password.length > 0
    ? `${user}:${decodeUserInfoPart(url.password)}`
    : user;
  return `Basic ${Buffer.from(userInfo, "utf8").toString("base64")}`;
}

/** Copy of the URL without userinfo, for the request line and for logs. */
function withoutCredentials(url: URL): URL {
  const copy = new URL(url.href);
  copy.username = "";
  copy.password = "";
  return copy;
}

function createDispatcher(proxy: ProxyConfig | null, timeoutMs: number): Dispatcher {
  const options = {
    connect: { timeout: timeoutMs },
    headersTimeout: timeoutMs,
    bodyTimeout: timeoutMs,
  };
  return proxy
    ? new ProxyAgent({ uri: proxyUrl(proxy), ...options })
    : new Agent(options);
}

interface HopResult {
  status: number;
  location: string | null;
}

async function postOnce(request: SendRequest, context: SendContext): Promise<HopResult> {
  const url = parseTargetUrl(request.destination);
  const proxy = resolveProxy(context.proxy, context.env ?? process.env);
  const target = withoutCredentials(url);

  const headers: Record<string, string> = {
    "Content-Type": contentTypeFor(request.contentIsJson),
  };
  const authorization = basicAuthorization(url);
  if (authorization) {
    headers["Authorization"] = authorization;
  }

  const via = proxy ? ` via proxy ${proxy.host}:${proxy.port}` : "";
  context.logger.debug?.(
    `[jobcast:http] POST ${target.href}${via} (${request.payload.byteLength} bytes)`,
  );

  const dispatcher = createDispatcher(proxy, request.timeoutMs);
  const controller = new AbortController();
  const timer = request.timeoutMs > 0
    ? setTimeout(() => controller.abort(), request.timeoutMs)
    : undefined;

  try {
    const res = await fetch(target, {
      method: "POST",
      headers,
      body: request.payload,
      redirect: "manual",
      signal: controller.signal,
      dispatcher,
    });
    const location = res.status === TEMPORARY_REDIRECT ? res.headers.get("location") : null;
    // Drain so the exchange is complete before the dispatcher goes away.
    await res.arrayBuffer();
    return { status: res.status, location };
  } catch (err) {
    if (controller.signal.aborted) {
      throw new TransportError(
        `HTTP POST to ${target.href} timed out after ${request.timeoutMs}ms`,
        { cause: err },
      );
    }
    throw new TransportError(`HTTP POST to ${target.href} failed: ${describeError(err)}`, {
      cause: err,
    });
  } finally {
    clearTimeout(timer);
    await dispatcher.destroy();
  }
}

async function sendHttp(request: SendRequest, context: SendContext): Promise<void> {
  const maxRedirects = context.maxRedirects ?? DEFAULT_MAX_REDIRECTS;
  let current = request;
  let hops = 0;

  for (;;) {
    const { status, location } = await postOnce(current, context);
    const shown = withoutCredentials(new URL(current.destination)).href;

    if (status !== TEMPORARY_REDIRECT) {
      context.logger.debug?.(`[jobcast:http] ${shown} answered ${status}`);
      return;
    }
    if (location === null) {
      context.logger.warn(`[jobcast:http] ${shown} answered 307 without a Location header`);
      return;
    }

    const next = resolveLocation(location, current.destination);
    if (hops >= maxRedirects) {
      throw new TooManyRedirectsError(hops, withoutCredentials(new URL(next)).href);
    }
    hops += 1;
    context.logger.info(
      `[jobcast:http] following 307 from ${shown} to ${withoutCredentials(new URL(next)).href}`,
    );
    current = { ...current, destination: next };
  }
}

export const httpTransport: Transport = {
  kind: "HTTP",
  expectedFormat: EXPECTED_FORMAT,
  validate: (destination) => validateHttpUrl(destination, EXPECTED_FORMAT),
  send: sendHttp,
};
