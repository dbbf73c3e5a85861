/**
 * Zod request validation.
 *
 * Parses the JSON request body against a Zod schema. Failures are thrown
 * as RequestValidationError and rendered by the global error handler as
 * 400 with the error envelope.
 */

import type { Context } from "hono";
import type { ZodError, ZodType, ZodTypeDef } from "zod";
import type { AppEnv } from "../types/api-contract.js";
import { RequestValidationError } from "../types/error.js";

/**
 * Read and validate the JSON request body.
 */
export async function readJsonBody<T>(
  c: Context<AppEnv>,
  schema: ZodType<T, ZodTypeDef, unknown>,
): Promise<T> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch (err) {
    throw new RequestValidationError("Invalid JSON in request body", [], { cause: err });
  }

  const result = schema.safeParse(body);
  if (!result.success) {
    throw new RequestValidationError(
      "Request body validation failed",
      formatZodErrors(result.error),
    );
  }

  return result.data;
}

export function formatZodErrors(
  error: ZodError,
): readonly { path: string; message: string }[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}
