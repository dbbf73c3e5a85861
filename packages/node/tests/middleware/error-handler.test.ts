/**
 * Tests for error handler middleware.
 *
 * Verifies domain errors are mapped to correct HTTP status codes
 * and the error envelope format.
 */

import { describe, it, expect } from "vitest";
import { Hono } from "hono";
import { VaultError } from "@capvault/ledger";
import type { VaultFailure } from "@capvault/ledger";
import { EventStoreError } from "@capvault/event-store";
import { handleError, failureDetails } from "../../src/middleware/error-handler.js";
import type { AppEnv } from "../../src/types/api-contract.js";
import { createTestApp } from "../setup.js";

function appThrowing(error: Error): Hono<AppEnv> {
  const app = new Hono<AppEnv>();
  app.onError(handleError);
  app.get("/boom", () => {
    throw error;
  });
  return app;
}

async function statusFor(failure: VaultFailure): Promise<number> {
  const res = await appThrowing(new VaultError(failure)).request("/boom");
  return res.status;
}

describe("handleError", () => {
  it("maps every ledger failure to its status", async () => {
    expect(await statusFor({ code: "ZERO_AMOUNT" })).toBe(400);
    expect(await statusFor({ code: "INVALID_AMOUNT", value: "x" })).toBe(400);
    expect(await statusFor({ code: "INVALID_ACCOUNT", value: "" })).toBe(400);
    expect(await statusFor({ code: "NOT_OWNER", caller: "a", owner: "b" })).toBe(403);
    expect(await statusFor({ code: "REENTRANCY" })).toBe(409);
    expect(await statusFor({ code: "BANK_CAP_EXCEEDED", remainingCapacity: 0n, attempted: 1n })).toBe(422);
    expect(await statusFor({ code: "EXCEEDS_PER_TX_LIMIT", requested: 2n, limit: 1n })).toBe(422);
    expect(
      await statusFor({ code: "INSUFFICIENT_BALANCE", account: "a", available: 0n, requested: 1n }),
    ).toBe(422);
    expect(await statusFor({ code: "TRANSFER_FAILED", destination: "a", amount: 1n })).toBe(502);
  });

  it("renders REENTRANCY without details", async () => {
    const res = await appThrowing(new VaultError({ code: "REENTRANCY" })).request("/boom");

    expect(await res.json()).toEqual({
      error: {
        code: "REENTRANCY",
        message: "Reentrant call rejected: another operation is in progress",
      },
    });
  });

  it("hides unmapped ledger failures behind INTERNAL_ERROR", async () => {
    const res = await appThrowing(
      new VaultError({ code: "INVALID_SNAPSHOT", reason: "balances do not add up" }),
    ).request("/boom");

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      error: { code: "INTERNAL_ERROR", message: "Internal server error" },
    });
  });

  it("does not leak the message of unknown errors", async () => {
    const res = await appThrowing(new Error("connection string with test-secret")).request("/boom");

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      error: { code: "INTERNAL_ERROR", message: "Internal server error" },
    });
  });

  it("maps event store concurrency conflicts to 409", async () => {
    const res = await appThrowing(
      new EventStoreError("CONCURRENCY_CONFLICT", "Stream \"vault\" is at version 2, expected 1", "vault"),
    ).request("/boom");

    expect(res.status).toBe(409);
    expect(await res.json()).toEqual({
      error: {
        code: "CONCURRENCY_CONFLICT",
        message: 'Stream "vault" is at version 2, expected 1',
      },
    });
  });
});

describe("failureDetails", () => {
  it("stringifies amounts and drops the code", () => {
    expect(
      failureDetails({
        code: "INSUFFICIENT_BALANCE",
        account: "alice",
        available: 10n ** 20n,
        requested: 1n,
      }),
    ).toEqual({ account: "alice", available: "100000000000000000000", requested: "1" });
  });

  it("returns undefined for failures without fields", () => {
    expect(failureDetails({ code: "ZERO_AMOUNT" })).toBeUndefined();
  });
});

describe("unknown routes", () => {
  it("return the error envelope with 404", async () => {
    const { app } = createTestApp();

    const res = await app.request("/api/v1/nope");

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      error: { code: "NOT_FOUND", message: "No route for GET /api/v1/nope" },
    });
  });
});
