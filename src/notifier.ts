/**
 * Notifier — format a job state and deliver it to configured endpoints.
 *
 * One attempt per endpoint per call. Failures are logged and rethrown by
 * notify(); notifyAll() records them per endpoint and moves on.
 */

import { describeError } from "./errors.js";
import { isJsonFormat, serialize, type Format } from "./format/index.js";
import type { JobState, Phase } from "./format/job-state.js";
import { sendPayload, validateDestination } from "./transport/index.js";
import type { ProxyConfig } from "./transport/proxy.js";
import type { SendContext, TransportKind } from "./transport/types.js";
import type { NotifyLogger } from "./types.js";

export const DEFAULT_TIMEOUT_MS = 30_000;

/** Which build phases an endpoint wants to hear about. */
export type EndpointEvent = "all" | Phase;

export interface NotifyEndpoint {
  transport: TransportKind;
  format: Format;
  url: string;
  /** Per-attempt timeout. Default: 30000. */
  timeoutMs?: number;
  /** Default: "all". */
  event?: EndpointEvent;
}

export type NotifyStatus = "sent" | "skipped" | "failed";

export interface NotifyOutcome {
  endpoint: NotifyEndpoint;
  status: NotifyStatus;
  error?: Error;
}

export interface NotifierOptions {
  logger: NotifyLogger;
  /** See SendContext.proxy. */
  proxy?: ProxyConfig | null;
  env?: NodeJS.ProcessEnv;
  maxRedirects?: number;
  /** Timeout for endpoints that do not set their own. Default: 30000. */
  defaultTimeoutMs?: number;
}

export interface Notifier {
  validate(endpoint: NotifyEndpoint): void;
  /** Resolves true when sent, false when the endpoint's event filter skipped it. */
  notify(endpoint: NotifyEndpoint, jobState: JobState): Promise<boolean>;
  notifyAll(endpoints: readonly NotifyEndpoint[], jobState: JobState): Promise<NotifyOutcome[]>;
}

export function wantsPhase(endpoint: NotifyEndpoint, phase: Phase): boolean {
  const event = endpoint.event ?? "all";
  return event === "all" || event === phase;
}

export function createNotifier(opts: NotifierOptions): Notifier {
  const { logger } = opts;
  const defaultTimeoutMs = opts.defaultTimeoutMs ?? DEFAULT_TIMEOUT_MS;
  const context: SendContext = {
    logger,
    env: opts.env,
    maxRedirects: opts.maxRedirects,
  };
  if (opts.proxy !== undefined) {
    context.proxy = opts.proxy;
  }

  function validate(endpoint: NotifyEndpoint): void {
    validateDestination(endpoint.transport, endpoint.url);
  }

  async function notify(endpoint: NotifyEndpoint, jobState: JobState): Promise<boolean> {
    const { phase } = jobState.build;
    const label = `${jobState.name} #${jobState.build.number} ${phase}`;

    if (!wantsPhase(endpoint, phase)) {
      logger.debug?.(
        `[jobcast:notifier] ${endpoint.transport} endpoint skips ${label} (event=${endpoint.event ?? "all"})`,
      );
      return false;
    }

    try {
      validate(endpoint);
      const payload = serialize(jobState, endpoint.format);
      await sendPayload(
        endpoint.transport,
        {
          destination: endpoint.url,
          payload,
          timeoutMs: endpoint.timeoutMs ?? defaultTimeoutMs,
          contentIsJson: isJsonFormat(endpoint.format),
        },
        context,
      );
    } catch (err) {
      logger.error(
        `[jobcast:notifier] ${endpoint.transport} notification for ${label} failed: ${describeError(err)}`,
      );
      throw err;
    }

    logger.info(`[jobcast:notifier] sent ${label} to ${endpoint.transport} endpoint`);
    return true;
  }

  async function notifyAll(
    endpoints: readonly NotifyEndpoint[],
    jobState: JobState,
  ): Promise<NotifyOutcome[]> {
    const outcomes: NotifyOutcome[] = [];
    for (const endpoint of endpoints) {
      try {
        const sent = await notify(endpoint, jobState);
        outcomes.push({ endpoint, status: sent ? "sent" : "skipped" });
      } catch (err) {
        const error = err instanceof Error ? err : new Error(String(err));
        outcomes.push({ endpoint, status: "failed", error });
      }
    }
    return outcomes;
  }

  return { validate, notify, notifyAll };
}
