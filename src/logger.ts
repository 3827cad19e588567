/**
 * podmig logger.
 *
 * Provides a Logger factory backed by Winston. Every module receives the
 * logger by injection, so tests pass a vi.fn() stub instead.
 */

import winston from "winston";
import type { Logger } from "./types.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LoggerOptions {
  /** Prefix for all log lines. Default: "podmig". */
  prefix?: string;
  /** Minimum log level. Default: "info". */
  level?: LogLevel;
}

/** Runtime check for LogLevel. */
export function isLogLevel(v: unknown): v is LogLevel {
  return v === "debug" || v === "info" || v === "warn" || v === "error";
}

/** Create a console logger satisfying the Logger interface. */
export function createLogger(opts?: LoggerOptions): Logger {
  const prefix = opts?.prefix ?? "podmig";
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
      new winston.transports.Console({ forceConsole: true }),
    ],
  });

  return {
    info: (msg: string) => winstonLogger.info(msg),
    warn: (msg: string) => winstonLogger.warn(msg),
    error: (msg: string) => winstonLogger.error(msg),
    debug: (msg: string) => winstonLogger.debug(msg),
  };
}
