/**
 * Shared type definitions for jobcast.
 */

/**
 * Minimal logging surface. Library code only ever receives one of these;
 * hosts can hand in their own logger or use createNotifyLogger().
 */
export interface NotifyLogger {
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
  debug?(msg: string): void;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && (LOG_LEVELS as readonly string[]).includes(value);
}
