/**
 * Logging
 *
 * Structured JSON lines on the console. Warnings and errors are also
 * forwarded to the observability provider.
 */

import type { Logger } from "@resourceful/contracts";
import { captureMessage } from "../observability/index.js";

/**
 * Creates a simple structured logger.
 * Prefixes all messages with a context identifier.
 */
export function createLogger(context: string): Logger {
  return {
    info(message, data) {
      console.log(
        JSON.stringify({ level: "info", context, message, ...data })
      );
    },
    warn(message, data) {
      console.warn(
        JSON.stringify({ level: "warn", context, message, ...data })
      );
      captureMessage(`[${context}] ${message}`, "warning", data);
    },
    error(message, data) {
      console.error(
        JSON.stringify({ level: "error", context, message, ...data })
      );
      captureMessage(`[${context}] ${message}`, "error", data);
    },
    debug(message, data) {
      if (process.env.NODE_ENV !== "production") {
        console.debug(
          JSON.stringify({ level: "debug", context, message, ...data })
        );
      }
    },
  };
}

/** A logger that drops everything. Handy for tests and internal fetches. */
export const silentLogger: Logger = {
  info() {},
  warn() {},
  error() {},
  debug() {},
};

/**
 * Logs one completed client request with its duration.
 */
export function logRequest(
  logger: Logger,
  method: string,
  path: string,
  status: number,
  durationMs: number
) {
  const entry = {
    event: "request.completed",
    method,
    path,
    status,
    durationMs,
  };

  if (status >= 500) {
    logger.error("Request failed", entry);
  } else {
    logger.info("Request completed", entry);
  }
}
