/**
 * Tests for the event store hash chain: tamper-evident notification log.
 */

import { createHash } from "node:crypto";
import { describe, it, expect } from "vitest";
import { canonicalize } from "json-canonicalize";
import type { DomainEvent } from "@capvault/types";
import { InMemoryEventStore } from "../src/in-memory-store.js";
import { computeEventHash, verifyHashChain, GENESIS_HASH } from "../src/hash-chain.js";
import { isHashedEvent } from "../src/types.js";
import type { HashedStoredEvent, StoredEvent } from "../src/types.js";

const TS = "2025-01-01T00:00:00.000Z";

function makeEvent(amount: string): DomainEvent {
  return {
    type: "vault.deposited",
    metadata: {
      eventId: `evt-${amount}`,
      timestamp: TS,
      actor: "account-x",
      correlationId: "corr-1",
      source: "ledger",
    },
    payload: { account: "account-x", amount, newBalance: amount },
  };
}

function storedEvent(payload: Record<string, unknown> = {}): StoredEvent {
  return {
    event: { type: "vault.deposited", metadata: makeEvent("1").metadata, payload },
    streamId: "vault",
    version: 1,
    globalPosition: 1,
    appendedAt: TS,
  };
}

function chainOf(count: number): readonly HashedStoredEvent[] {
  const store = new InMemoryEventStore({ clock: () => TS });
  for (let i = 1; i <= count; i++) {
    store.append("vault", [makeEvent(String(i))]);
  }
  return store.readAll();
}

// =============================================================================
// computeEventHash
// =============================================================================

describe("computeEventHash", () => {
  it("hashes the canonical event content followed by the previous hash", () => {
    const event = storedEvent({ amount: "5" });
    const expected = createHash("sha256")
      .update(
        canonicalize({
          event: { type: event.event.type, metadata: event.event.metadata, payload: event.event.payload },
          streamId: "vault",
          version: 1,
          globalPosition: 1,
          appendedAt: TS,
        }) + GENESIS_HASH,
      )
      .digest("hex");

    expect(computeEventHash(event, GENESIS_HASH)).toBe(expected);
  });

  it("is deterministic for the same input", () => {
    const event = storedEvent({ amount: "1" });
    expect(computeEventHash(event, GENESIS_HASH)).toBe(computeEventHash(event, GENESIS_HASH));
  });

  it("ignores payload key order", () => {
    const a = storedEvent({ account: "account-x", amount: "1" });
    const b = storedEvent({ amount: "1", account: "account-x" });
    expect(computeEventHash(a, GENESIS_HASH)).toBe(computeEventHash(b, GENESIS_HASH));
  });

  it("changes when the payload changes", () => {
    expect(computeEventHash(storedEvent({ amount: "1" }), GENESIS_HASH)).not.toBe(
      computeEventHash(storedEvent({ amount: "2" }), GENESIS_HASH),
    );
  });

  it("changes when previousHash changes", () => {
    const event = storedEvent();
    expect(computeEventHash(event, GENESIS_HASH)).not.toBe(computeEventHash(event, "other"));
  });

  it("excludes the hash fields of an already hashed event", () => {
    const [first] = chainOf(1);
    expect(first).toBeDefined();
    if (first === undefined) return;

    expect(computeEventHash(first, first.previousHash)).toBe(first.hash);
  });
});

// =============================================================================
// verifyHashChain
// =============================================================================

describe("verifyHashChain", () => {
  it("accepts an empty sequence", () => {
    expect(verifyHashChain([])).toEqual({ valid: true, lastVerifiedPosition: 0, errors: [] });
  });

  it("accepts an untouched chain", () => {
    expect(verifyHashChain(chainOf(4))).toEqual({
      valid: true,
      lastVerifiedPosition: 4,
      errors: [],
    });
  });

  it("detects a tampered payload", () => {
    const events = [...chainOf(3)];
    const second = events[1];
    if (second === undefined) throw new Error("missing event");
    events[1] = {
      ...second,
      event: { ...second.event, payload: { ...second.event.payload, amount: "999" } },
    };

    const result = verifyHashChain(events);

    expect(result.valid).toBe(false);
    expect(result.errors.map((e) => e.position)).toEqual([2]);
    expect(result.errors[0]?.reason).toMatch(/^Hash mismatch at position 2/);
  });

  it("detects a removed event", () => {
    const [first, , third] = chainOf(3);
    if (first === undefined || third === undefined) throw new Error("missing event");

    const result = verifyHashChain([first, third]);

    expect(result.valid).toBe(false);
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]?.position).toBe(3);
    expect(result.errors[0]?.reason).toMatch(/^previousHash mismatch at position 3/);
  });

  it("requires the first event to link to genesis", () => {
    const [, second] = chainOf(2);
    if (second === undefined) throw new Error("missing event");

    const result = verifyHashChain([second]);

    expect(result.errors.map((e) => e.position)).toEqual([2]);
  });

  it("reports events without hash fields", () => {
    const result = verifyHashChain([storedEvent()]);

    expect(result).toEqual({
      valid: false,
      lastVerifiedPosition: 0,
      errors: [{ position: 1, reason: "Event at position 1 is missing hash fields" }],
    });
  });
});

describe("isHashedEvent", () => {
  it("narrows only events that carry both hash fields", () => {
    const [hashed] = chainOf(1);
    expect(hashed !== undefined && isHashedEvent(hashed)).toBe(true);
    expect(isHashedEvent(storedEvent())).toBe(false);
  });
});
