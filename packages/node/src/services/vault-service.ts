/**
 * VaultService: Composition root for the vault node.
 *
 * Owns one VaultLedger, its transfer port and the notification log.
 * Route handlers delegate to this service; they never touch the ledger's
 * collaborators directly.
 *
 * Every committed ledger notification is appended to the notification
 * log and written to the service logger.
 */

import { randomUUID } from "node:crypto";
import pino from "pino";
import type { Logger } from "pino";
import {
  InMemoryTransferPort,
  VaultLedger,
  formatUnits,
} from "@capvault/ledger";
import type {
  AccountSummary,
  DepositReceipt,
  RescueReceipt,
  WithdrawReceipt,
} from "@capvault/ledger";
import { InMemoryEventStore, toDomainEvent } from "@capvault/event-store";
import type {
  EventStoreIntegrityResult,
  HashedStoredEvent,
  ReadAllOptions,
} from "@capvault/event-store";
import type { AccountId, VaultNotification } from "@capvault/types";

// =============================================================================
// Configuration
// =============================================================================

export interface VaultServiceConfig {
  readonly owner: AccountId;
  readonly address: AccountId;
  readonly bankCap: bigint;
  readonly perTxWithdrawLimit: bigint;
  readonly nativeSymbol: string;
  readonly nativeDecimals: number;
}

export interface VaultServiceOptions {
  /** Default: a disabled pino logger */
  readonly logger?: Logger | undefined;

  /** Returns ISO 8601 timestamps for notifications and the log */
  readonly clock?: (() => string) | undefined;
}

/**
 * Per-call context threaded into the notification log.
 */
export interface OperationContext {
  /** Usually the request id */
  readonly correlationId?: string | undefined;
}

export interface VaultSummary {
  readonly owner: AccountId;
  readonly address: AccountId;
  readonly bankCap: bigint;
  readonly perTxWithdrawLimit: bigint;
  readonly totalDeposited: bigint;
  readonly heldFunds: bigint;
  readonly untrackedFunds: bigint;
  readonly remainingCapacity: bigint;
  readonly depositCount: number;
  readonly withdrawCount: number;
  readonly accountCount: number;
}

export interface ReadinessReport {
  readonly ready: boolean;
  readonly notificationLog: EventStoreIntegrityResult;

  /** Sum of tracked balances equals the aggregate */
  readonly conservation: boolean;
}

// =============================================================================
// Service
// =============================================================================

export class VaultService {
  readonly ledger: VaultLedger;
  readonly transfers: InMemoryTransferPort;
  readonly eventStore: InMemoryEventStore;
  readonly streamId: string;

  private readonly _config: VaultServiceConfig;
  private readonly _logger: Logger;
  private _context: OperationContext = {};

  constructor(config: VaultServiceConfig, options?: VaultServiceOptions) {
    this._config = config;
    this._logger = options?.logger ?? pino({ enabled: false });

    const clock = options?.clock;
    this.transfers = new InMemoryTransferPort();
    this.eventStore = new InMemoryEventStore({ clock });
    this.ledger = new VaultLedger(
      {
        owner: config.owner,
        address: config.address,
        bankCap: config.bankCap,
        perTxWithdrawLimit: config.perTxWithdrawLimit,
      },
      this.transfers,
      {
        clock,
        onListenerError: (err, notification) => {
          this._logger.error(
            { err, event: notification.kind, correlationId: this._context.correlationId },
            `Notification subscriber failed on ${notification.kind}`,
          );
        },
      },
    );
    this.streamId = `vault-${config.address}`;

    this.ledger.subscribe((notification) => {
      this._record(notification);
    });
  }

  // ─── Operations ──────────────────────────────────────────────────────

  deposit(caller: AccountId, amount: bigint, context?: OperationContext): DepositReceipt {
    return this._within(context, () => this.ledger.deposit(caller, amount));
  }

  withdraw(caller: AccountId, amount: bigint, context?: OperationContext): WithdrawReceipt {
    return this._within(context, () => this.ledger.withdraw(caller, amount));
  }

  rescue(
    caller: AccountId,
    destination: AccountId,
    amount: bigint,
    context?: OperationContext,
  ): RescueReceipt {
    return this._within(context, () => this.ledger.rescue(caller, destination, amount));
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  summary(): VaultSummary {
    const ledger = this.ledger;
    return {
      owner: ledger.owner,
      address: ledger.address,
      bankCap: ledger.bankCap,
      perTxWithdrawLimit: ledger.perTxWithdrawLimit,
      totalDeposited: ledger.totalDeposited,
      heldFunds: ledger.heldFunds,
      untrackedFunds: ledger.untrackedFunds,
      remainingCapacity: ledger.remainingCapacity(),
      depositCount: ledger.depositCount,
      withdrawCount: ledger.withdrawCount,
      accountCount: ledger.accounts().length,
    };
  }

  account(account: AccountId): AccountSummary {
    return this.ledger.getAccount(account);
  }

  accounts(): readonly AccountSummary[] {
    return this.ledger.accounts();
  }

  readEvents(options?: ReadAllOptions): readonly HashedStoredEvent[] {
    return this.eventStore.readAll(options);
  }

  verifyIntegrity(): EventStoreIntegrityResult {
    return this.eventStore.verifyIntegrity();
  }

  /**
   * Deep readiness: the notification log's hash chain is intact and the
   * ledger's balances add up to its aggregate.
   */
  readiness(): ReadinessReport {
    const notificationLog = this.eventStore.verifyIntegrity();
    const sum = this.ledger.accounts().reduce((acc, a) => acc + a.balance, 0n);
    const conservation = sum === this.ledger.totalDeposited;

    return {
      ready: notificationLog.valid && conservation,
      notificationLog,
      conservation,
    };
  }

  /** Render a base-unit amount for humans, e.g. "1.5 ETH". */
  formatAmount(amount: bigint): string {
    return `${formatUnits(amount, this._config.nativeDecimals)} ${this._config.nativeSymbol}`;
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private _within<T>(context: OperationContext | undefined, body: () => T): T {
    const previous = this._context;
    this._context = context ?? {};
    try {
      return body();
    } finally {
      this._context = previous;
    }
  }

  private _record(notification: VaultNotification): void {
    const correlationId = this._context.correlationId ?? randomUUID();
    const result = this.eventStore.append(this.streamId, [
      toDomainEvent(notification, { correlationId, source: "node" }),
    ]);

    switch (notification.kind) {
      case "Deposited":
      case "Withdrawn":
        this._logger.info(
          {
            event: notification.kind,
            account: notification.account,
            amount: notification.amount.toString(),
            newBalance: notification.newBalance.toString(),
            version: result.toVersion,
            correlationId,
          },
          `${notification.kind} ${this.formatAmount(notification.amount)} for ${notification.account}`,
        );
        break;
      case "Rescued":
        this._logger.warn(
          {
            event: notification.kind,
            caller: notification.caller,
            destination: notification.destination,
            amount: notification.amount.toString(),
            version: result.toVersion,
            correlationId,
          },
          `Rescued ${this.formatAmount(notification.amount)} to ${notification.destination}`,
        );
        break;
    }
  }
}
