/**
 * @capvault/ledger: Core VaultLedger class.
 *
 * Custodial ledger of per-account native balances under a global cap.
 *
 * API surface:
 * - deposit() / receive(): Credit attached funds to the caller
 * - withdraw(): Debit the caller and send the funds out
 * - rescue(): Owner-only sweep of ledger-held funds
 * - receiveUntracked(): Value that arrived without running deposit logic
 * - getBalance() / remainingCapacity(): Pure reads
 * - subscribe() / notifications(): Committed notifications
 * - snapshot() / fromSnapshot(): Persist and restore state
 *
 * Every mutating operation is one transaction: checks first, then state
 * effects, then the single outbound transfer. A failure anywhere restores
 * the state the transaction started from.
 */

import { isAccountId } from "@capvault/types";
import type { AccountId, VaultNotification } from "@capvault/types";
import { assertAmount, parseBaseUnits } from "./amount-math.js";
import { ReentrancyGuard } from "./reentrancy-guard.js";
import type { TransferPort } from "./transfers.js";
import type {
  AccountSummary,
  DepositReceipt,
  ListenerErrorHandler,
  NotificationListener,
  RescueReceipt,
  Subscription,
  VaultConfig,
  VaultLedgerOptions,
  VaultSnapshot,
  WithdrawReceipt,
} from "./types.js";
import { VaultError } from "./types.js";

const DEFAULT_ADDRESS = "vault";

interface Checkpoint {
  readonly journalLength: number;
  readonly notificationCount: number;
  readonly totalDeposited: bigint;
  readonly heldFunds: bigint;
  readonly depositCount: number;
  readonly withdrawCount: number;
}

function assertAccount(value: AccountId): AccountId {
  if (!isAccountId(value)) {
    throw new VaultError({ code: "INVALID_ACCOUNT", value });
  }
  return value;
}

function assertPositive(amount: bigint): bigint {
  assertAmount(amount);
  if (amount === 0n) {
    throw new VaultError({ code: "ZERO_AMOUNT" });
  }
  return amount;
}

function invalidSnapshot(reason: string): VaultError {
  return new VaultError({ code: "INVALID_SNAPSHOT", reason });
}

/**
 * Capped custodial ledger.
 *
 * Invariants after every operation:
 * - totalDeposited equals the sum of all tracked balances
 * - totalDeposited never exceeds bankCap
 * - no single withdrawal moves more than perTxWithdrawLimit
 * - a rejected operation changes nothing and emits nothing
 */
export class VaultLedger {
  readonly owner: AccountId;
  readonly address: AccountId;
  readonly bankCap: bigint;
  readonly perTxWithdrawLimit: bigint;

  private readonly _transfers: TransferPort;
  private readonly _clock: () => string;
  private readonly _onListenerError: ListenerErrorHandler;
  private readonly _guard = new ReentrancyGuard();

  private readonly _balances = new Map<AccountId, bigint>();
  private readonly _depositCounts = new Map<AccountId, number>();
  private readonly _withdrawCounts = new Map<AccountId, number>();
  private _totalDeposited = 0n;
  private _heldFunds = 0n;
  private _depositCount = 0;
  private _withdrawCount = 0;

  private readonly _notifications: VaultNotification[] = [];
  private readonly _listeners = new Set<NotificationListener>();
  private _published = 0;

  /** Undo actions for map writes made by the open transaction */
  private readonly _journal: (() => void)[] = [];
  private _depth = 0;

  constructor(config: VaultConfig, transfers: TransferPort, options?: VaultLedgerOptions) {
    this.owner = assertAccount(config.owner);
    this.address = assertAccount(config.address ?? DEFAULT_ADDRESS);
    this.bankCap = assertPositive(config.bankCap);
    this.perTxWithdrawLimit = assertPositive(config.perTxWithdrawLimit);
    this._transfers = transfers;
    this._clock = options?.clock ?? (() => new Date().toISOString());
    this._onListenerError = options?.onListenerError ?? reportListenerError;
  }

  // ─── Deposits ────────────────────────────────────────────────────────

  /**
   * Credit `amount` of attached funds to `caller`.
   *
   * @throws VaultError ZERO_AMOUNT, BANK_CAP_EXCEEDED
   */
  deposit(caller: AccountId, amount: bigint): DepositReceipt {
    return this._transaction(() => {
      assertAccount(caller);
      assertPositive(amount);

      const remainingCapacity = this.remainingCapacity();
      if (amount > remainingCapacity) {
        throw new VaultError({
          code: "BANK_CAP_EXCEEDED",
          remainingCapacity,
          attempted: amount,
        });
      }

      const newBalance = this.getBalance(caller) + amount;
      this._put(this._balances, caller, newBalance);
      this._put(this._depositCounts, caller, this.depositCountOf(caller) + 1);
      this._totalDeposited += amount;
      this._heldFunds += amount;
      this._depositCount += 1;

      this._emit({
        kind: "Deposited",
        account: caller,
        amount,
        newBalance,
        timestamp: this._clock(),
      });

      return { account: caller, amount, newBalance };
    });
  }

  /**
   * Funds sent to the ledger without selecting an operation.
   * Same checks and effects as deposit().
   */
  receive(caller: AccountId, amount: bigint): DepositReceipt {
    return this.deposit(caller, amount);
  }

  /**
   * Value that reached the ledger without running any ledger logic.
   * Raises held funds only; no account is credited and nothing is emitted.
   */
  receiveUntracked(amount: bigint): bigint {
    return this._transaction(() => {
      this._heldFunds += assertAmount(amount);
      return this._heldFunds;
    });
  }

  // ─── Withdrawals ─────────────────────────────────────────────────────

  /**
   * Debit `amount` from `caller` and send it to them.
   *
   * @throws VaultError REENTRANCY, ZERO_AMOUNT, EXCEEDS_PER_TX_LIMIT,
   *   INSUFFICIENT_BALANCE, TRANSFER_FAILED
   */
  withdraw(caller: AccountId, amount: bigint): WithdrawReceipt {
    return this._transaction(() =>
      this._guard.run(() => {
        assertAccount(caller);
        assertPositive(amount);

        if (amount > this.perTxWithdrawLimit) {
          throw new VaultError({
            code: "EXCEEDS_PER_TX_LIMIT",
            requested: amount,
            limit: this.perTxWithdrawLimit,
          });
        }

        const available = this.getBalance(caller);
        if (amount > available) {
          throw new VaultError({
            code: "INSUFFICIENT_BALANCE",
            account: caller,
            available,
            requested: amount,
          });
        }

        this._put(this._balances, caller, available - amount);
        this._put(this._withdrawCounts, caller, this.withdrawCountOf(caller) + 1);
        this._totalDeposited -= amount;
        this._withdrawCount += 1;

        this._payOut(caller, amount);

        const newBalance = this.getBalance(caller);
        this._emit({
          kind: "Withdrawn",
          account: caller,
          amount,
          newBalance,
          timestamp: this._clock(),
        });

        return { account: caller, amount, newBalance };
      }),
    );
  }

  // ─── Administration ──────────────────────────────────────────────────

  /**
   * Send `amount` of ledger-held funds to `destination`.
   * Tracked balances are not touched.
   *
   * @throws VaultError REENTRANCY, NOT_OWNER, ZERO_AMOUNT,
   *   INSUFFICIENT_BALANCE, TRANSFER_FAILED
   */
  rescue(caller: AccountId, destination: AccountId, amount: bigint): RescueReceipt {
    return this._transaction(() =>
      this._guard.run(() => {
        assertAccount(caller);
        assertAccount(destination);

        if (caller !== this.owner) {
          throw new VaultError({ code: "NOT_OWNER", caller, owner: this.owner });
        }

        assertPositive(amount);

        if (amount > this._heldFunds) {
          throw new VaultError({
            code: "INSUFFICIENT_BALANCE",
            account: this.address,
            available: this._heldFunds,
            requested: amount,
          });
        }

        this._payOut(destination, amount);

        this._emit({
          kind: "Rescued",
          caller,
          destination,
          amount,
          timestamp: this._clock(),
        });

        return { destination, amount, heldFunds: this._heldFunds };
      }),
    );
  }

  // ─── Query Operations ────────────────────────────────────────────────

  /**
   * Tracked balance of `account`. Zero for unknown accounts.
   */
  getBalance(account: AccountId): bigint {
    return this._balances.get(account) ?? 0n;
  }

  /**
   * How much more the ledger accepts before hitting bankCap.
   */
  remainingCapacity(): bigint {
    const remaining = this.bankCap - this._totalDeposited;
    return remaining > 0n ? remaining : 0n;
  }

  getAccount(account: AccountId): AccountSummary {
    return {
      account,
      balance: this.getBalance(account),
      deposits: this.depositCountOf(account),
      withdrawals: this.withdrawCountOf(account),
    };
  }

  /**
   * Every account that ever deposited, in first-deposit order.
   */
  accounts(): readonly AccountSummary[] {
    return [...this._balances.keys()].map((account) => this.getAccount(account));
  }

  depositCountOf(account: AccountId): number {
    return this._depositCounts.get(account) ?? 0;
  }

  withdrawCountOf(account: AccountId): number {
    return this._withdrawCounts.get(account) ?? 0;
  }

  /** Sum of all tracked balances. */
  get totalDeposited(): bigint {
    return this._totalDeposited;
  }

  /** Native funds the ledger actually holds. */
  get heldFunds(): bigint {
    return this._heldFunds;
  }

  /** Held funds not reflected in any tracked balance. */
  get untrackedFunds(): bigint {
    const untracked = this._heldFunds - this._totalDeposited;
    return untracked > 0n ? untracked : 0n;
  }

  get depositCount(): number {
    return this._depositCount;
  }

  get withdrawCount(): number {
    return this._withdrawCount;
  }

  /** True while withdraw() or rescue() is running. */
  get isLocked(): boolean {
    return this._guard.locked;
  }

  // ─── Notifications ───────────────────────────────────────────────────

  /**
   * All committed notifications, oldest first.
   */
  notifications(): readonly VaultNotification[] {
    return this._notifications.slice(0, this._published);
  }

  /**
   * Receive every notification committed from now on.
   */
  subscribe(listener: NotificationListener): Subscription {
    this._listeners.add(listener);
    return {
      unsubscribe: () => {
        this._listeners.delete(listener);
      },
    };
  }

  // ─── Snapshot (Persistence) ──────────────────────────────────────────

  /**
   * Create a serializable snapshot of the ledger.
   * Can be restored with VaultLedger.fromSnapshot().
   */
  snapshot(): VaultSnapshot {
    return {
      version: 1,
      config: {
        owner: this.owner,
        address: this.address,
        bankCap: this.bankCap.toString(),
        perTxWithdrawLimit: this.perTxWithdrawLimit.toString(),
      },
      accounts: this.accounts().map((summary) => ({
        account: summary.account,
        balance: summary.balance.toString(),
        deposits: summary.deposits,
        withdrawals: summary.withdrawals,
      })),
      totalDeposited: this._totalDeposited.toString(),
      heldFunds: this._heldFunds.toString(),
      depositCount: this._depositCount,
      withdrawCount: this._withdrawCount,
      createdAt: this._clock(),
    };
  }

  /**
   * Restore a ledger from a snapshot.
   *
   * @throws VaultError INVALID_SNAPSHOT if the snapshot breaks conservation,
   *   the cap, or the held-funds floor
   */
  static fromSnapshot(
    snapshot: VaultSnapshot,
    transfers: TransferPort,
    options?: VaultLedgerOptions,
  ): VaultLedger {
    if (snapshot.version !== 1) {
      throw invalidSnapshot(`unsupported version ${String(snapshot.version)}`);
    }

    const ledger = new VaultLedger(
      {
        owner: snapshot.config.owner,
        address: snapshot.config.address,
        bankCap: parseBaseUnits(snapshot.config.bankCap),
        perTxWithdrawLimit: parseBaseUnits(snapshot.config.perTxWithdrawLimit),
      },
      transfers,
      options,
    );

    let sum = 0n;
    let deposits = 0;
    let withdrawals = 0;

    for (const entry of snapshot.accounts) {
      const account = assertAccount(entry.account);
      if (ledger._balances.has(account)) {
        throw invalidSnapshot(`duplicate account "${account}"`);
      }
      if (!Number.isInteger(entry.deposits) || !Number.isInteger(entry.withdrawals)
        || entry.deposits < 0 || entry.withdrawals < 0) {
        throw invalidSnapshot(`invalid counters for account "${account}"`);
      }

      const balance = parseBaseUnits(entry.balance);
      ledger._balances.set(account, balance);
      ledger._depositCounts.set(account, entry.deposits);
      ledger._withdrawCounts.set(account, entry.withdrawals);

      sum += balance;
      deposits += entry.deposits;
      withdrawals += entry.withdrawals;
    }

    const totalDeposited = parseBaseUnits(snapshot.totalDeposited);
    const heldFunds = parseBaseUnits(snapshot.heldFunds);

    if (sum !== totalDeposited) {
      throw invalidSnapshot(
        `balances sum to ${sum.toString()} but totalDeposited is ${totalDeposited.toString()}`,
      );
    }
    if (totalDeposited > ledger.bankCap) {
      throw invalidSnapshot(
        `totalDeposited ${totalDeposited.toString()} exceeds bankCap ${ledger.bankCap.toString()}`,
      );
    }
    if (heldFunds < totalDeposited) {
      throw invalidSnapshot(
        `heldFunds ${heldFunds.toString()} is below totalDeposited ${totalDeposited.toString()}`,
      );
    }
    if (deposits !== snapshot.depositCount || withdrawals !== snapshot.withdrawCount) {
      throw invalidSnapshot("global counters do not match per-account counters");
    }

    ledger._totalDeposited = totalDeposited;
    ledger._heldFunds = heldFunds;
    ledger._depositCount = snapshot.depositCount;
    ledger._withdrawCount = snapshot.withdrawCount;

    return ledger;
  }

  // ─── Internal ────────────────────────────────────────────────────────

  /**
   * Run `body` as one all-or-nothing unit. Nested calls (a recipient
   * re-entering from inside a transfer) join the enclosing unit;
   * notifications are published when the outermost unit commits.
   */
  private _transaction<T>(body: () => T): T {
    const checkpoint = this._checkpoint();
    this._depth += 1;

    let result: T;
    try {
      result = body();
    } catch (err) {
      this._restore(checkpoint);
      throw err;
    } finally {
      this._depth -= 1;
    }

    if (this._depth === 0) {
      this._journal.length = 0;
      this._publish();
    }
    return result;
  }

  private _checkpoint(): Checkpoint {
    return {
      journalLength: this._journal.length,
      notificationCount: this._notifications.length,
      totalDeposited: this._totalDeposited,
      heldFunds: this._heldFunds,
      depositCount: this._depositCount,
      withdrawCount: this._withdrawCount,
    };
  }

  private _restore(checkpoint: Checkpoint): void {
    while (this._journal.length > checkpoint.journalLength) {
      const undo = this._journal.pop();
      undo?.();
    }
    this._notifications.length = checkpoint.notificationCount;
    this._totalDeposited = checkpoint.totalDeposited;
    this._heldFunds = checkpoint.heldFunds;
    this._depositCount = checkpoint.depositCount;
    this._withdrawCount = checkpoint.withdrawCount;
  }

  /** Journaled map write. */
  private _put<V>(map: Map<AccountId, V>, key: AccountId, value: V): void {
    const had = map.has(key);
    const previous = map.get(key);
    this._journal.push(() => {
      if (had && previous !== undefined) {
        map.set(key, previous);
      } else {
        map.delete(key);
      }
    });
    map.set(key, value);
  }

  /**
   * Take `amount` out of held funds and hand it to the transfer port.
   * Must be the last state-changing step before emitting.
   */
  private _payOut(destination: AccountId, amount: bigint): void {
    if (amount > this._heldFunds) {
      throw new VaultError({ code: "TRANSFER_FAILED", destination, amount });
    }
    this._heldFunds -= amount;

    let delivered: boolean;
    try {
      delivered = this._transfers.send(destination, amount);
    } catch (err) {
      throw new VaultError({ code: "TRANSFER_FAILED", destination, amount }, { cause: err });
    }

    if (!delivered) {
      throw new VaultError({ code: "TRANSFER_FAILED", destination, amount });
    }
  }

  private _emit(notification: VaultNotification): void {
    this._notifications.push(notification);
  }

  private _publish(): void {
    const pending = this._notifications.slice(this._published);
    this._published = this._notifications.length;

    for (const notification of pending) {
      for (const listener of this._listeners) {
        try {
          listener(notification);
        } catch (err) {
          this._onListenerError(err, notification);
        }
      }
    }
  }
}

function reportListenerError(error: unknown, notification: VaultNotification): void {
  // eslint-disable-next-line no-console
  console.error(`Subscriber failed on ${notification.kind} notification:`, error);
}
