/**
 * @capvault/ledger: Capped custodial vault ledger.
 *
 * A pure TypeScript ledger with zero runtime dependencies.
 * Enforces the vault invariants:
 * - The aggregate of tracked balances equals the sum of all balances
 * - The aggregate never exceeds the bank cap
 * - No withdrawal moves more than the per-transaction limit
 * - Withdrawals and rescues cannot be re-entered
 * - Rejected operations leave no trace (state or notifications)
 *
 * Design rules:
 * - All amounts are bigint base units (no floating point)
 * - Checks, then effects, then the one outbound transfer
 * - Fail-closed: invalid operations throw, never silently succeed
 */

// Core engine
export { VaultLedger } from "./vault-ledger.js";

// Reentrancy protection
export { ReentrancyGuard } from "./reentrancy-guard.js";

// Outbound transfers
export { InMemoryTransferPort } from "./transfers.js";
export type { TransferPort, ReceiveHook, Payout } from "./transfers.js";

// Amount arithmetic
export {
  assertAmount,
  parseBaseUnits,
  parseUnits,
  formatUnits,
} from "./amount-math.js";

// Types
export type {
  VaultConfig,
  VaultLedgerOptions,
  ListenerErrorHandler,
  AccountSummary,
  DepositReceipt,
  WithdrawReceipt,
  RescueReceipt,
  NotificationListener,
  Subscription,
  AccountSnapshot,
  VaultSnapshot,
  VaultFailure,
  VaultErrorCode,
} from "./types.js";

export { VaultError } from "./types.js";
