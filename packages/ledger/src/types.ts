/**
 * @capvault/ledger: Types for the vault ledger engine.
 *
 * These extend the shared @capvault/types with ledger-specific
 * structures: configuration, receipts, snapshots and errors.
 *
 * Rules:
 * - All types are readonly
 * - Amounts are bigint in memory and digit strings in snapshots
 * - Fail-closed: invalid operations throw, never silently succeed
 */

import type { AccountId, VaultNotification, VaultParameters } from "@capvault/types";

// ─── Configuration ───────────────────────────────────────────────────────

/**
 * Immutable construction parameters of a ledger.
 */
export interface VaultConfig extends VaultParameters {
  /** Account that initialized the ledger; the only account allowed to rescue */
  readonly owner: AccountId;

  /** The ledger's own account id. Default: "vault" */
  readonly address?: AccountId | undefined;
}

/**
 * Runtime collaborators that are not part of the ledger's state.
 */
export interface VaultLedgerOptions {
  /** Returns the ISO 8601 timestamp stamped on notifications */
  readonly clock?: (() => string) | undefined;

  /**
   * Receives an error thrown by a subscriber. The operation that produced
   * the notification stays committed and later subscribers still run.
   * Default: written to stderr.
   */
  readonly onListenerError?: ListenerErrorHandler | undefined;
}

export type ListenerErrorHandler = (error: unknown, notification: VaultNotification) => void;

// ─── Results ─────────────────────────────────────────────────────────────

/**
 * Tracked position of one account.
 */
export interface AccountSummary {
  readonly account: AccountId;
  readonly balance: bigint;
  readonly deposits: number;
  readonly withdrawals: number;
}

export interface DepositReceipt {
  readonly account: AccountId;
  readonly amount: bigint;
  readonly newBalance: bigint;
}

export interface WithdrawReceipt {
  readonly account: AccountId;
  readonly amount: bigint;
  readonly newBalance: bigint;
}

export interface RescueReceipt {
  readonly destination: AccountId;
  readonly amount: bigint;
  readonly heldFunds: bigint;
}

// ─── Notifications ───────────────────────────────────────────────────────

export type NotificationListener = (notification: VaultNotification) => void;

/**
 * A subscription that can be unsubscribed.
 */
export interface Subscription {
  unsubscribe(): void;
}

// ─── Snapshot Types ──────────────────────────────────────────────────────

export interface AccountSnapshot {
  readonly account: AccountId;
  readonly balance: string;
  readonly deposits: number;
  readonly withdrawals: number;
}

/**
 * Serializable snapshot of the entire ledger state.
 * Amounts are base-unit digit strings so the snapshot survives JSON.
 */
export interface VaultSnapshot {
  readonly version: 1;
  readonly config: {
    readonly owner: AccountId;
    readonly address: AccountId;
    readonly bankCap: string;
    readonly perTxWithdrawLimit: string;
  };
  readonly accounts: readonly AccountSnapshot[];
  readonly totalDeposited: string;
  readonly heldFunds: string;
  readonly depositCount: number;
  readonly withdrawCount: number;
  readonly createdAt: string;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/**
 * Structured reason for a rejected operation, discriminated by `code`.
 */
export type VaultFailure =
  | { readonly code: "ZERO_AMOUNT" }
  | {
      readonly code: "BANK_CAP_EXCEEDED";
      readonly remainingCapacity: bigint;
      readonly attempted: bigint;
    }
  | {
      readonly code: "EXCEEDS_PER_TX_LIMIT";
      readonly requested: bigint;
      readonly limit: bigint;
    }
  | {
      readonly code: "INSUFFICIENT_BALANCE";
      readonly account: AccountId;
      readonly available: bigint;
      readonly requested: bigint;
    }
  | {
      readonly code: "TRANSFER_FAILED";
      readonly destination: AccountId;
      readonly amount: bigint;
    }
  | { readonly code: "REENTRANCY" }
  | {
      readonly code: "NOT_OWNER";
      readonly caller: AccountId;
      readonly owner: AccountId;
    }
  | { readonly code: "INVALID_AMOUNT"; readonly value: string }
  | { readonly code: "INVALID_ACCOUNT"; readonly value: string }
  | { readonly code: "INVALID_SNAPSHOT"; readonly reason: string };

/** Error codes for ledger operations. */
export type VaultErrorCode = VaultFailure["code"];

function describeFailure(failure: VaultFailure): string {
  switch (failure.code) {
    case "ZERO_AMOUNT":
      return "Amount must be greater than zero";
    case "BANK_CAP_EXCEEDED":
      return `Deposit of ${failure.attempted.toString()} exceeds remaining capacity ${failure.remainingCapacity.toString()}`;
    case "EXCEEDS_PER_TX_LIMIT":
      return `Withdrawal of ${failure.requested.toString()} exceeds per-transaction limit ${failure.limit.toString()}`;
    case "INSUFFICIENT_BALANCE":
      return `Account "${failure.account}" has ${failure.available.toString()}, requested ${failure.requested.toString()}`;
    case "TRANSFER_FAILED":
      return `Transfer of ${failure.amount.toString()} to "${failure.destination}" failed`;
    case "REENTRANCY":
      return "Reentrant call rejected: another operation is in progress";
    case "NOT_OWNER":
      return `Caller "${failure.caller}" is not the owner "${failure.owner}"`;
    case "INVALID_AMOUNT":
      return `Invalid amount: "${failure.value}"`;
    case "INVALID_ACCOUNT":
      return `Invalid account id: "${failure.value}"`;
    case "INVALID_SNAPSHOT":
      return `Invalid snapshot: ${failure.reason}`;
  }
}

/**
 * Structured error from the ledger engine.
 * Always thrown, never returned as a code.
 */
export class VaultError extends Error {
  public readonly code: VaultErrorCode;
  public readonly failure: VaultFailure;

  constructor(failure: VaultFailure, options?: { cause?: unknown }) {
    super(describeFailure(failure), options);
    this.name = "VaultError";
    this.code = failure.code;
    this.failure = failure;
  }
}
