/**
 * Structured logging middleware.
 *
 * Uses pino for JSON-structured request logging.
 * Creates a child logger with requestId context per request and logs
 * one line when the response is ready.
 */

import type { MiddlewareHandler } from "hono";
import type { Logger } from "pino";
import type { AppEnv } from "../types/api-contract.js";

export interface RequestLogEntry {
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
}

export function loggerMiddleware(logger: Logger): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = performance.now();
    const log = logger.child({ requestId: c.get("requestId") });
    c.set("log", log);

    await next();

    const entry: RequestLogEntry = {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Math.round(performance.now() - start),
    };
    const msg = `${entry.method} ${entry.path} ${entry.status}`;

    if (entry.status >= 500) {
      log.error(entry, msg);
    } else if (entry.status >= 400) {
      log.warn(entry, msg);
    } else {
      log.info(entry, msg);
    }
  };
}
