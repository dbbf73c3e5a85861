/**
 * Vault Types
 *
 * Primitives shared by the ledger, the notification log and the HTTP node.
 *
 * Rules:
 * - Amounts are bigint in the smallest native unit, never negative
 * - Amounts cross serialization boundaries as base-10 digit strings
 * - Notifications are immutable after emission
 */

/**
 * Identifier of an account holding a vault inside the ledger.
 */
export type AccountId = string;

/**
 * An amount of the native currency in its smallest denomination.
 */
export type Amount = bigint;

/**
 * Fixed parameters of a ledger, set once at construction.
 */
export interface VaultParameters {
  /** Maximum aggregate of all tracked balances */
  readonly bankCap: Amount;

  /** Maximum amount a single withdrawal may move */
  readonly perTxWithdrawLimit: Amount;
}

/**
 * Emitted after a deposit (or unsolicited inbound transfer) is credited.
 */
export interface DepositedNotification {
  readonly kind: "Deposited";
  readonly account: AccountId;
  readonly amount: Amount;
  readonly newBalance: Amount;
  readonly timestamp: string;
}

/**
 * Emitted after a withdrawal's outbound transfer succeeded.
 */
export interface WithdrawnNotification {
  readonly kind: "Withdrawn";
  readonly account: AccountId;
  readonly amount: Amount;
  readonly newBalance: Amount;
  readonly timestamp: string;
}

/**
 * Emitted after the owner swept ledger-held funds to a destination.
 */
export interface RescuedNotification {
  readonly kind: "Rescued";
  readonly caller: AccountId;
  readonly destination: AccountId;
  readonly amount: Amount;
  readonly timestamp: string;
}

/**
 * Everything a ledger publishes to its observers.
 * Discriminated by `kind`.
 */
export type VaultNotification =
  | DepositedNotification
  | WithdrawnNotification
  | RescuedNotification;

export type VaultNotificationKind = VaultNotification["kind"];
