/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Maps known domain errors (VaultError, EventStoreError) and request
 * validation errors to HTTP status codes through STATUS_MAP.
 */

import type { Context } from "hono";
import { HTTPException } from "hono/http-exception";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { VaultError } from "@capvault/ledger";
import type { VaultFailure } from "@capvault/ledger";
import { EventStoreError } from "@capvault/event-store";
import type { AppEnv } from "../types/api-contract.js";
import type { ApiErrorCode } from "../types/error.js";
import { createErrorEnvelope, RequestValidationError } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

export const STATUS_MAP: Partial<Record<ApiErrorCode, ContentfulStatusCode>> = {
  // Request errors
  VALIDATION_ERROR: 400,
  ZERO_AMOUNT: 400,
  INVALID_AMOUNT: 400,
  INVALID_ACCOUNT: 400,
  UNAUTHORIZED: 401,
  NOT_FOUND: 404,
  IDEMPOTENCY_IN_PROGRESS: 409,
  IDEMPOTENCY_KEY_REUSED: 422,

  // Ledger errors
  NOT_OWNER: 403,
  REENTRANCY: 409,
  BANK_CAP_EXCEEDED: 422,
  EXCEEDS_PER_TX_LIMIT: 422,
  INSUFFICIENT_BALANCE: 422,
  TRANSFER_FAILED: 502,

  // Event store errors
  CONCURRENCY_CONFLICT: 409,
};

function statusFor(code: ApiErrorCode): ContentfulStatusCode {
  return STATUS_MAP[code] ?? 500;
}

/**
 * Ledger failure fields as JSON-safe details (amounts as strings).
 */
export function failureDetails(failure: VaultFailure): Record<string, unknown> | undefined {
  const entries: [string, unknown][] = Object.entries(failure);
  const details: Record<string, unknown> = {};

  for (const [key, value] of entries) {
    if (key === "code") continue;
    details[key] = typeof value === "bigint" ? value.toString() : value;
  }

  return Object.keys(details).length > 0 ? details : undefined;
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Global error handler. Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context<AppEnv>): Response {
  if (err instanceof VaultError) {
    const status = statusFor(err.code);
    // Unmapped ledger codes are internal faults
    if (status === 500) {
      return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
    }
    return c.json(
      createErrorEnvelope(err.code, err.message, failureDetails(err.failure)),
      status,
    );
  }

  if (err instanceof RequestValidationError) {
    return c.json(
      createErrorEnvelope(
        "VALIDATION_ERROR",
        err.message,
        err.issues.length > 0 ? { issues: err.issues } : undefined,
      ),
      400,
    );
  }

  if (err instanceof EventStoreError && err.code === "CONCURRENCY_CONFLICT") {
    return c.json(createErrorEnvelope("CONCURRENCY_CONFLICT", err.message), 409);
  }

  if (err instanceof HTTPException && err.status < 500) {
    const code: ApiErrorCode = err.status === 401 ? "UNAUTHORIZED" : err.status === 404 ? "NOT_FOUND" : "VALIDATION_ERROR";
    return c.json(createErrorEnvelope(code, err.message), statusFor(code));
  }

  // Don't leak internal details
  return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
}
