import { CONFIG, type LogLevel } from "./config.js";

export interface Logger {
  debug(message: string, ...meta: unknown[]): void;
  warn(message: string, ...meta: unknown[]): void;
}

const PREFIX = "[img-fit]";

/**
 * Console-backed logger filtered by level.
 *
 * @params {LogLevel} level: most verbose level to emit
 * @returns {Logger}
 */
export function createConsoleLogger(level: LogLevel = CONFIG.LOG_LEVEL): Logger {
  return {
    debug(message, ...meta) {
      if (level === "debug") {
        console.debug(`${PREFIX} ${message}`, ...meta);
      }
    },
    warn(message, ...meta) {
      if (level !== "silent") {
        console.warn(`${PREFIX} ${message}`, ...meta);
      }
    },
  };
}

export const logger: Logger = createConsoleLogger();
