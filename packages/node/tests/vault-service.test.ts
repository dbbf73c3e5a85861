/**
 * Tests for VaultService: notification log wiring and logging.
 */

import { describe, it, expect } from "vitest";
import pino from "pino";
import { VaultError } from "@capvault/ledger";
import { VaultService } from "../src/services/vault-service.js";
import { TEST_SERVICE_CONFIG, TS, OWNER } from "./setup.js";

const ETH = 10n ** 18n;

interface LogLine {
  readonly level: number;
  readonly msg: string;
  readonly [key: string]: unknown;
}

function capturingService(): { service: VaultService; lines: LogLine[] } {
  const lines: LogLine[] = [];
  const logger = pino(
    { level: "info" },
    {
      write(msg: string): void {
        lines.push(JSON.parse(msg));
      },
    },
  );
  const service = new VaultService(
    { ...TEST_SERVICE_CONFIG, bankCap: 10n * ETH, perTxWithdrawLimit: ETH },
    { logger, clock: () => TS },
  );
  return { service, lines };
}

describe("VaultService", () => {
  it("appends each committed notification to the log with its correlation id", () => {
    const { service } = capturingService();

    service.deposit("alice", 3n, { correlationId: "corr-1" });
    service.withdraw("alice", 1n, { correlationId: "corr-2" });

    const events = service.readEvents();
    expect(events.map((e) => e.event.type)).toEqual(["vault.deposited", "vault.withdrawn"]);
    expect(events.map((e) => e.event.metadata.correlationId)).toEqual(["corr-1", "corr-2"]);
    expect(events.every((e) => e.streamId === "vault-0xVault")).toBe(true);
  });

  it("generates a correlation id when none is given", () => {
    const { service } = capturingService();

    service.deposit("alice", 3n);

    const [event] = service.readEvents();
    expect(event?.event.metadata.correlationId).toMatch(/^[0-9a-f-]{36}$/);
  });

  it("logs deposits with display amounts", () => {
    const { service, lines } = capturingService();

    service.deposit("alice", 3n * ETH / 2n, { correlationId: "corr-1" });

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      level: 30,
      msg: "Deposited 1.5 ETH for alice",
      event: "Deposited",
      account: "alice",
      amount: "1500000000000000000",
      newBalance: "1500000000000000000",
      version: 1,
      correlationId: "corr-1",
    });
  });

  it("logs rescues at warn level", () => {
    const { service, lines } = capturingService();
    service.ledger.receiveUntracked(ETH / 2n);

    service.rescue(OWNER, "treasury", ETH / 2n, { correlationId: "corr-9" });

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      level: 40,
      msg: "Rescued 0.5 ETH to treasury",
      caller: OWNER,
      destination: "treasury",
      amount: "500000000000000000",
    });
  });

  it("records nothing for rejected operations", () => {
    const { service, lines } = capturingService();

    expect(() => service.withdraw("alice", 1n)).toThrow(VaultError);

    expect(lines).toEqual([]);
    expect(service.readEvents()).toEqual([]);
  });

  it("restores the outer correlation id after a nested call", () => {
    const { service } = capturingService();
    service.deposit("bob", 5n);
    service.transfers.onReceive("bob", () => {
      service.deposit("carol", 1n, { correlationId: "inner" });
    });

    service.withdraw("bob", 2n, { correlationId: "outer" });

    const types = service
      .readEvents({ fromPosition: 2 })
      .map((e) => [e.event.type, e.event.metadata.correlationId]);
    expect(types).toEqual([
      ["vault.deposited", "outer"],
      ["vault.withdrawn", "outer"],
    ]);
  });

  it("is ready while the log and the ledger agree", () => {
    const { service } = capturingService();
    service.deposit("alice", 3n);

    expect(service.readiness()).toEqual({
      ready: true,
      conservation: true,
      notificationLog: { valid: true, lastVerifiedPosition: 1, errors: [] },
    });
  });

  it("formats amounts with the configured symbol and decimals", () => {
    const { service } = capturingService();

    expect(service.formatAmount(ETH)).toBe("1 ETH");
    expect(service.formatAmount(0n)).toBe("0 ETH");
  });

  it("logs a failing subscriber and still commits and records the deposit", () => {
    const { service, lines } = capturingService();
    service.ledger.subscribe(() => {
      throw new Error("listener broke");
    });

    const receipt = service.deposit("alice", 3n, { correlationId: "corr-9" });

    expect(receipt.newBalance).toBe(3n);
    expect(service.eventStore.globalPosition()).toBe(1);
    expect(lines).toHaveLength(2);
    expect(lines[1]).toMatchObject({
      level: 50,
      msg: "Notification subscriber failed on Deposited",
      event: "Deposited",
      correlationId: "corr-9",
      err: { message: "listener broke" },
    });
  });
});
