/**
 * @capvault/ledger: Outbound transfer port.
 *
 * The ledger never moves native funds itself. It hands every payout to a
 * TransferPort. A port reports failure by returning false or throwing;
 * either way the ledger rolls the whole operation back.
 */

import type { AccountId } from "@capvault/types";

/**
 * Sends native funds from the ledger to a destination.
 */
export interface TransferPort {
  send(destination: AccountId, amount: bigint): boolean;
}

/**
 * Code a destination runs when it receives funds. May call back into the
 * ledger. Returning false (or throwing) refuses the funds.
 */
export type ReceiveHook = (amount: bigint) => boolean | void;

/**
 * A payout that reached its destination.
 */
export interface Payout {
  readonly destination: AccountId;
  readonly amount: bigint;
}

/**
 * In-process transfer port.
 *
 * Records every accepted payout and a running received total per
 * destination. Destinations can refuse funds outright or run a hook on
 * receipt, which is how a recipient re-enters the ledger.
 */
export class InMemoryTransferPort implements TransferPort {
  private readonly _payouts: Payout[] = [];
  private readonly _received = new Map<AccountId, bigint>();
  private readonly _refused = new Set<AccountId>();
  private readonly _hooks = new Map<AccountId, ReceiveHook>();

  send(destination: AccountId, amount: bigint): boolean {
    if (this._refused.has(destination)) {
      return false;
    }

    const hook = this._hooks.get(destination);
    if (hook !== undefined && hook(amount) === false) {
      return false;
    }

    this._payouts.push({ destination, amount });
    this._received.set(destination, this.receivedBy(destination) + amount);
    return true;
  }

  /** Make every future send to `destination` fail. */
  refuse(destination: AccountId): void {
    this._refused.add(destination);
  }

  /** Undo a previous refuse(). */
  accept(destination: AccountId): void {
    this._refused.delete(destination);
  }

  /** Run `hook` whenever `destination` is sent funds. Replaces any previous hook. */
  onReceive(destination: AccountId, hook: ReceiveHook): void {
    this._hooks.set(destination, hook);
  }

  /** Total amount delivered to `destination`. */
  receivedBy(destination: AccountId): bigint {
    return this._received.get(destination) ?? 0n;
  }

  /** All delivered payouts in order. */
  payouts(): readonly Payout[] {
    return [...this._payouts];
  }
}
