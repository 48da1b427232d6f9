/**
 * jobcast logger.
 *
 * Provides a NotifyLogger factory backed by Winston. Embedding hosts that
 * already have a logger pass it in directly instead.
 */

import winston from "winston";
import type { LogLevel, NotifyLogger } from "./types.js";

export interface NotifyLoggerOptions {
  /** Prefix for all log lines. Default: "jobcast". */
  prefix?: string;
  /** Minimum log level. Default: "info". */
  level?: LogLevel;
}

export function createNotifyLogger(opts?: NotifyLoggerOptions): NotifyLogger {
  const prefix = opts?.prefix ?? "jobcast";
  const minLevel = opts?.level ?? "info";

  const winstonLogger = winston.createLogger({
    level: minLevel,
    format: winston.format.combine(
      winston.format.timestamp({ format: "YYYY-MM-DDTHH:mm:ss.SSSZ" }),
      winston.format.printf(({ timestamp, level, message }) =>
        `${String(timestamp)} [${prefix}:${level}] ${String(message)}`
      ),
    ),
    transports: [
      // stderr for everything: stdout stays free for CLI output.
      new winston.transports.Console({
        forceConsole: true,
        stderrLevels: ["error", "warn", "info", "debug"],
      }),
    ],
  });

  return {
    info: (msg: string) => winstonLogger.info(msg),
    warn: (msg: string) => winstonLogger.warn(msg),
    error: (msg: string) => winstonLogger.error(msg),
    debug: (msg: string) => winstonLogger.debug(msg),
  };
}

/** Logger that drops everything. */
export const silentLogger: NotifyLogger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
};
