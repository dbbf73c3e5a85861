/**
 * Caller identity middleware.
 *
 * Resolves the calling account from the X-Account-Id header and provides
 * it via c.set("caller"). Requests without one are rejected with 401.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

export const ACCOUNT_HEADER = "X-Account-Id";

export function callerMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const caller = c.req.header(ACCOUNT_HEADER)?.trim() ?? "";
    if (caller === "") {
      return c.json(
        createErrorEnvelope("UNAUTHORIZED", `Missing ${ACCOUNT_HEADER} header`),
        401,
      );
    }

    c.set("caller", caller);
    return next();
  };
}
