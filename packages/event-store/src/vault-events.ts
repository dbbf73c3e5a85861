/**
 * @capvault/event-store: Vault Domain Event Definitions.
 *
 * Maps committed ledger notifications onto DomainEvents for the
 * notification log.
 *
 * Naming convention: `vault.<action>`
 *
 * Amounts travel as base-unit digit strings so events survive JSON
 * and canonicalization.
 */

import { randomUUID } from "node:crypto";
import type { DomainEvent, EventMetadata, VaultNotification } from "@capvault/types";
import { isAccountId, isAmountString } from "@capvault/types";

// =============================================================================
// Event Types
// =============================================================================

export const VAULT_EVENTS = {
  DEPOSITED: "vault.deposited",
  WITHDRAWN: "vault.withdrawn",
  RESCUED: "vault.rescued",
} as const;

export type VaultEventType = (typeof VAULT_EVENTS)[keyof typeof VAULT_EVENTS];

// =============================================================================
// Payloads
// =============================================================================

export interface DepositedPayload {
  readonly account: string;
  readonly amount: string;
  readonly newBalance: string;
}

export interface WithdrawnPayload {
  readonly account: string;
  readonly amount: string;
  readonly newBalance: string;
}

export interface RescuedPayload {
  readonly caller: string;
  readonly destination: string;
  readonly amount: string;
}

// =============================================================================
// Validation
// =============================================================================

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isBalanceChange(p: unknown): p is DepositedPayload {
  return (
    isObject(p) &&
    isAccountId(p["account"]) &&
    isAmountString(p["amount"]) &&
    isAmountString(p["newBalance"])
  );
}

export function isVaultEventType(type: string): type is VaultEventType {
  return (
    type === VAULT_EVENTS.DEPOSITED ||
    type === VAULT_EVENTS.WITHDRAWN ||
    type === VAULT_EVENTS.RESCUED
  );
}

/**
 * Check a payload against the shape of its event type.
 * Unknown types are rejected.
 */
export function isValidVaultPayload(type: string, payload: unknown): boolean {
  switch (type) {
    case VAULT_EVENTS.DEPOSITED:
    case VAULT_EVENTS.WITHDRAWN:
      return isBalanceChange(payload);
    case VAULT_EVENTS.RESCUED:
      return (
        isObject(payload) &&
        isAccountId(payload["caller"]) &&
        isAccountId(payload["destination"]) &&
        isAmountString(payload["amount"])
      );
    default:
      return false;
  }
}

// =============================================================================
// Mapping
// =============================================================================

export interface VaultEventContext {
  /** Groups every event emitted by one request or operation */
  readonly correlationId: string;

  /** Default: random UUID */
  readonly eventId?: string | undefined;

  /** Default: "ledger" */
  readonly source?: EventMetadata["source"] | undefined;
}

/**
 * Convert a committed ledger notification into a DomainEvent.
 */
export function toDomainEvent(
  notification: VaultNotification,
  context: VaultEventContext,
): DomainEvent {
  const base: Omit<EventMetadata, "actor"> = {
    eventId: context.eventId ?? randomUUID(),
    timestamp: notification.timestamp,
    correlationId: context.correlationId,
    source: context.source ?? "ledger",
  };

  switch (notification.kind) {
    case "Deposited": {
      const payload: DepositedPayload = {
        account: notification.account,
        amount: notification.amount.toString(),
        newBalance: notification.newBalance.toString(),
      };
      return {
        type: VAULT_EVENTS.DEPOSITED,
        metadata: { ...base, actor: notification.account },
        payload: { ...payload },
      };
    }
    case "Withdrawn": {
      const payload: WithdrawnPayload = {
        account: notification.account,
        amount: notification.amount.toString(),
        newBalance: notification.newBalance.toString(),
      };
      return {
        type: VAULT_EVENTS.WITHDRAWN,
        metadata: { ...base, actor: notification.account },
        payload: { ...payload },
      };
    }
    case "Rescued": {
      const payload: RescuedPayload = {
        caller: notification.caller,
        destination: notification.destination,
        amount: notification.amount.toString(),
      };
      return {
        type: VAULT_EVENTS.RESCUED,
        metadata: { ...base, actor: notification.caller },
        payload: { ...payload },
      };
    }
  }
}
