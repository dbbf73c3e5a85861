/**
 * Runtime Type Guards
 *
 * Narrowing functions for vault domain types.
 * Used at system boundaries (HTTP bodies, restored snapshots,
 * deserialized events).
 */

import type { AccountId, VaultNotification } from "./vault.js";
import type { DomainEvent, EventMetadata } from "./event.js";

const AMOUNT_PATTERN = /^\d+$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object";
}

// =============================================================================
// Vault guards
// =============================================================================

export function isAccountId(value: unknown): value is AccountId {
  return typeof value === "string" && value.trim().length > 0;
}

/**
 * True for a non-negative bigint.
 */
export function isAmount(value: unknown): value is bigint {
  return typeof value === "bigint" && value >= 0n;
}

/**
 * True for the wire form of an amount: base-10 digits, no sign, no decimal point.
 */
export function isAmountString(value: unknown): value is string {
  return typeof value === "string" && AMOUNT_PATTERN.test(value);
}

export function isVaultNotification(value: unknown): value is VaultNotification {
  if (!isRecord(value)) return false;
  if (typeof value.timestamp !== "string" || !isAmount(value.amount)) return false;

  switch (value.kind) {
    case "Deposited":
    case "Withdrawn":
      return isAccountId(value.account) && isAmount(value.newBalance);
    case "Rescued":
      return isAccountId(value.caller) && isAccountId(value.destination);
    default:
      return false;
  }
}

// =============================================================================
// Event guards
// =============================================================================

const EVENT_SOURCES = new Set<string>(["ledger", "node"]);

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (!isRecord(value)) return false;
  return (
    typeof value.eventId === "string" &&
    typeof value.timestamp === "string" &&
    typeof value.actor === "string" &&
    typeof value.correlationId === "string" &&
    typeof value.source === "string" &&
    EVENT_SOURCES.has(value.source)
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (!isRecord(value)) return false;
  return (
    typeof value.type === "string" &&
    isEventMetadata(value.metadata) &&
    isRecord(value.payload)
  );
}
