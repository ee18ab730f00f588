/**
 * Switchboard logger.
 *
 * Provides a Logger factory backed by Winston.
 */

import winston from "winston";
import type { Logger } from "./types.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface SwitchboardLoggerOptions {
  /** Prefix for all log lines. Default: "switchboard". */
  prefix?: string;
  /** Minimum log level. Default: "info". */
  level?: LogLevel;
}

/**
 * Create a logger satisfying the Logger interface.
 * Every component receives one by injection; nothing logs through a global.
 */
export function createSwitchboardLogger(opts?: SwitchboardLoggerOptions): Logger {
  const prefix = opts?.prefix ?? "switchboard";
  const minLevel = opts?.level ?? "info";

  const winstonLogger = winston.createLogger({
    level: minLevel,
    format: winston.format.combine(
      winston.format.timestamp({ format: "YYYY-MM-DDTHH:mm:ss.SSSZ" }),
      winston.format.printf(({ timestamp, level, message }) =>
        `${timestamp} [${prefix}:${level}] ${message}`
      ),
    ),
    transports: [
      // Log lines go to stderr so they never interleave with REPL answers.
      new winston.transports.Console({
        forceConsole: true,
        stderrLevels: ["debug", "info", "warn", "error"],
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
