/**
 * Tests for notification log routes.
 */

import { describe, it, expect } from "vitest";
import { createTestApp, postAs, TS, OWNER } from "./setup.js";
import type { AppInstance } from "../src/app.js";

async function seed(instance: AppInstance): Promise<void> {
  const { app, service } = instance;
  await app.request(postAs("alice", "/api/v1/deposits", { amount: "250" }, { "X-Request-Id": "req-1" }));
  await app.request(postAs("bob", "/api/v1/deposits", { amount: "40" }, { "X-Request-Id": "req-2" }));
  await app.request(postAs("alice", "/api/v1/withdrawals", { amount: "100" }, { "X-Request-Id": "req-3" }));
  service.ledger.receiveUntracked(3n);
  await app.request(
    postAs(OWNER, "/api/v1/rescues", { destination: "treasury", amount: "3" }, { "X-Request-Id": "req-4" }),
  );
}

describe("GET /api/v1/events", () => {
  it("lists committed notifications in log order", async () => {
    const instance = createTestApp();
    await seed(instance);

    const res = await instance.app.request("/api/v1/events");

    expect(res.status).toBe(200);
    const body: unknown = await res.json();
    expect(body).toMatchObject({
      data: [
        {
          globalPosition: 1,
          streamId: "vault-0xVault",
          version: 1,
          appendedAt: TS,
          previousHash: "genesis",
          event: {
            type: "vault.deposited",
            metadata: {
              timestamp: TS,
              actor: "alice",
              correlationId: "req-1",
              source: "node",
            },
            payload: { account: "alice", amount: "250", newBalance: "250" },
          },
        },
        {
          globalPosition: 2,
          event: { type: "vault.deposited", payload: { account: "bob", amount: "40", newBalance: "40" } },
        },
        {
          globalPosition: 3,
          event: {
            type: "vault.withdrawn",
            metadata: { correlationId: "req-3" },
            payload: { account: "alice", amount: "100", newBalance: "150" },
          },
        },
        {
          globalPosition: 4,
          event: {
            type: "vault.rescued",
            metadata: { actor: "owner", correlationId: "req-4" },
            payload: { caller: "owner", destination: "treasury", amount: "3" },
          },
        },
      ],
      pagination: { nextAfterPosition: null, hasMore: false },
    });
  });

  it("omits rejected operations", async () => {
    const { app, service } = createTestApp();
    await app.request(postAs("alice", "/api/v1/deposits", { amount: "10" }));
    await app.request(postAs("alice", "/api/v1/withdrawals", { amount: "11" }));
    await app.request(postAs("alice", "/api/v1/deposits", { amount: "0" }));

    expect(service.eventStore.globalPosition()).toBe(1);
    expect(service.ledger.notifications()).toHaveLength(1);
  });

  it("pages with afterPosition and limit", async () => {
    const instance = createTestApp();
    await seed(instance);

    const first = await instance.app.request("/api/v1/events?limit=3");
    const firstBody: unknown = await first.json();
    expect(firstBody).toMatchObject({
      data: [{ globalPosition: 1 }, { globalPosition: 2 }, { globalPosition: 3 }],
      pagination: { nextAfterPosition: 3, hasMore: true },
    });

    const second = await instance.app.request("/api/v1/events?afterPosition=3&limit=3");
    const secondBody: unknown = await second.json();
    expect(secondBody).toMatchObject({
      data: [{ globalPosition: 4 }],
      pagination: { nextAfterPosition: null, hasMore: false },
    });
  });

  it("rejects an invalid limit", async () => {
    const { app } = createTestApp();

    const res = await app.request("/api/v1/events?limit=0");

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({
      error: { code: "VALIDATION_ERROR", message: "Invalid query parameters" },
    });
  });
});

describe("GET /api/v1/events/integrity", () => {
  it("verifies the hash chain", async () => {
    const instance = createTestApp();
    await seed(instance);

    const res = await instance.app.request("/api/v1/events/integrity");

    expect(await res.json()).toEqual({ valid: true, lastVerifiedPosition: 4, errors: [] });
  });
});
