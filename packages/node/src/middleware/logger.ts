/**
 * Structured request logging middleware.
 *
 * Hands one entry per request to a log function; main.ts routes it to
 * pino. The calling account is included when the request named one.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ACCOUNT_HEADER } from "./caller.js";

export interface RequestLogEntry {
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
  readonly requestId: string;
  readonly account?: string | undefined;
}

export function loggerMiddleware(
  log: (entry: RequestLogEntry) => void,
  now: () => number = Date.now,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = now();

    await next();

    log({
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: now() - start,
      requestId: c.get("requestId"),
      account: c.req.header(ACCOUNT_HEADER)?.trim() || undefined,
    });
  };
}
