/**
 * Tests for InMemoryTransferPort.
 */

import { describe, it, expect } from "vitest";
import { InMemoryTransferPort } from "../src/transfers.js";

describe("InMemoryTransferPort", () => {
  it("records delivered payouts in order", () => {
    const port = new InMemoryTransferPort();

    expect(port.send("alice", 3n)).toBe(true);
    expect(port.send("bob", 1n)).toBe(true);
    expect(port.send("alice", 2n)).toBe(true);

    expect(port.payouts()).toEqual([
      { destination: "alice", amount: 3n },
      { destination: "bob", amount: 1n },
      { destination: "alice", amount: 2n },
    ]);
    expect(port.receivedBy("alice")).toBe(5n);
    expect(port.receivedBy("carol")).toBe(0n);
  });

  it("fails sends to refused destinations until accepted again", () => {
    const port = new InMemoryTransferPort();
    port.refuse("alice");

    expect(port.send("alice", 1n)).toBe(false);
    expect(port.payouts()).toEqual([]);

    port.accept("alice");
    expect(port.send("alice", 1n)).toBe(true);
  });

  it("runs the receive hook with the amount", () => {
    const port = new InMemoryTransferPort();
    const seen: bigint[] = [];
    port.onReceive("alice", (amount) => {
      seen.push(amount);
    });

    port.send("alice", 7n);

    expect(seen).toEqual([7n]);
    expect(port.receivedBy("alice")).toBe(7n);
  });

  it("treats a hook returning false as a refusal", () => {
    const port = new InMemoryTransferPort();
    port.onReceive("alice", () => false);

    expect(port.send("alice", 7n)).toBe(false);
    expect(port.receivedBy("alice")).toBe(0n);
  });

  it("propagates a throwing hook without recording the payout", () => {
    const port = new InMemoryTransferPort();
    port.onReceive("alice", () => {
      throw new Error("no thanks");
    });

    expect(() => port.send("alice", 1n)).toThrow("no thanks");
    expect(port.payouts()).toEqual([]);
  });
});
