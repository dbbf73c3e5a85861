/**
 * Error envelope types for API responses.
 *
 * Every error response is `{ error: { code, message, details? } }`.
 * Ledger failure fields travel in `details` with amounts as strings.
 */

import type { VaultErrorCode } from "@capvault/ledger";

/** Every ledger failure code plus the HTTP layer's own. */
export type ApiErrorCode =
  | VaultErrorCode
  | "VALIDATION_ERROR"
  | "NOT_FOUND"
  | "CONCURRENCY_CONFLICT"
  | "IDEMPOTENCY_IN_PROGRESS"
  | "IDEMPOTENCY_KEY_REUSED"
  | "UNAUTHORIZED"
  | "INTERNAL_ERROR";

export interface ErrorDetail {
  readonly code: ApiErrorCode;
  readonly message: string;
  readonly details?: Record<string, unknown>;
}

export interface ErrorEnvelope {
  readonly error: ErrorDetail;
}

export function createErrorEnvelope(
  code: ApiErrorCode,
  message: string,
  details?: Record<string, unknown>,
): ErrorEnvelope {
  return { error: details === undefined ? { code, message } : { code, message, details } };
}

/**
 * Thrown by request parsing helpers; rendered as 400 VALIDATION_ERROR.
 */
export class RequestValidationError extends Error {
  readonly code = "VALIDATION_ERROR";
  readonly issues: readonly { path: string; message: string }[];

  constructor(
    message: string,
    issues: readonly { path: string; message: string }[] = [],
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "RequestValidationError";
    this.issues = issues;
  }
}
