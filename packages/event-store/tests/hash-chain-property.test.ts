/**
 * Property-based tests for hash chain integrity.
 *
 * Uses fast-check to verify invariants:
 * 1. Any N events → valid chain
 * 2. Remove any event → breaks chain
 * 3. Modify any amount → breaks chain
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import type { VaultNotification } from "@capvault/types";
import { InMemoryEventStore } from "../src/in-memory-store.js";
import { verifyHashChain } from "../src/hash-chain.js";
import { toDomainEvent } from "../src/vault-events.js";
import type { HashedStoredEvent } from "../src/types.js";

// =============================================================================
// Arbitraries
// =============================================================================

const TS = "2025-01-01T00:00:00.000Z";
const arbAccount = fc.constantFrom("account-x", "account-y", "owner");
const arbAmount = fc.bigInt({ min: 1n, max: 10n ** 24n });

const arbNotification: fc.Arbitrary<VaultNotification> = fc.oneof(
  fc.record({
    kind: fc.constant("Deposited" as const),
    account: arbAccount,
    amount: arbAmount,
    newBalance: arbAmount,
    timestamp: fc.constant(TS),
  }),
  fc.record({
    kind: fc.constant("Withdrawn" as const),
    account: arbAccount,
    amount: arbAmount,
    newBalance: arbAmount,
    timestamp: fc.constant(TS),
  }),
  fc.record({
    kind: fc.constant("Rescued" as const),
    caller: arbAccount,
    destination: arbAccount,
    amount: arbAmount,
    timestamp: fc.constant(TS),
  }),
);

function storeOf(notifications: readonly VaultNotification[]): readonly HashedStoredEvent[] {
  const store = new InMemoryEventStore({ clock: () => TS });
  notifications.forEach((notification, i) => {
    store.append("vault", [
      toDomainEvent(notification, { correlationId: `corr-${i}`, eventId: `evt-${i}` }),
    ]);
  });
  return store.readAll();
}

// =============================================================================
// Tests
// =============================================================================

describe("hash chain property tests", () => {
  it("any N events produce a valid chain", () => {
    fc.assert(
      fc.property(fc.array(arbNotification, { minLength: 1, maxLength: 20 }), (notifications) => {
        const result = verifyHashChain(storeOf(notifications));
        expect(result.valid).toBe(true);
        expect(result.lastVerifiedPosition).toBe(notifications.length);
      }),
      { numRuns: 50 },
    );
  });

  it("removing any event except the last breaks the chain", () => {
    fc.assert(
      fc.property(
        fc.array(arbNotification, { minLength: 2, maxLength: 15 }),
        fc.nat(),
        (notifications, seed) => {
          const events = storeOf(notifications);
          const removeAt = seed % (events.length - 1);
          const remaining = events.filter((_, i) => i !== removeAt);

          expect(verifyHashChain(remaining).valid).toBe(false);
        },
      ),
      { numRuns: 50 },
    );
  });

  it("changing the amount of any event breaks the chain", () => {
    fc.assert(
      fc.property(
        fc.array(arbNotification, { minLength: 1, maxLength: 15 }),
        fc.nat(),
        (notifications, seed) => {
          const events = [...storeOf(notifications)];
          const index = seed % events.length;
          const target = events[index];
          if (target === undefined) return;

          events[index] = {
            ...target,
            event: {
              ...target.event,
              payload: { ...target.event.payload, amount: `${String(target.event.payload["amount"])}0` },
            },
          };

          const result = verifyHashChain(events);
          expect(result.valid).toBe(false);
          expect(result.errors[0]?.position).toBe(index + 1);
        },
      ),
      { numRuns: 50 },
    );
  });
});
