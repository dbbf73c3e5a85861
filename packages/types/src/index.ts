/**
 * @capvault/types: Shared domain types for the capped vault stack.
 *
 * These types are used across all packages:
 * - Account identifiers and native amounts
 * - Ledger parameters and notifications
 * - Event architecture
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - Types carry no semantics; meaning lives in consuming code
 */

// Vault types
export type {
  AccountId,
  Amount,
  VaultParameters,
  DepositedNotification,
  WithdrawnNotification,
  RescuedNotification,
  VaultNotification,
  VaultNotificationKind,
} from "./vault.js";

// Event types
export type {
  DomainEvent,
  EventMetadata,
} from "./event.js";

// Runtime type guards
export {
  isAccountId,
  isAmount,
  isAmountString,
  isVaultNotification,
  isEventMetadata,
  isDomainEvent,
} from "./guards.js";
