/**
 * @capvault/ledger: Mutual-exclusion guard for operations that transfer out.
 *
 * A held guard means an operation is between its first check and its
 * final commit. Any attempt to acquire it again (a recipient calling back
 * into the ledger from inside the transfer) fails fast.
 */

import { VaultError } from "./types.js";

export class ReentrancyGuard {
  private _entered = false;

  /** True while an operation holds the guard. */
  get locked(): boolean {
    return this._entered;
  }

  /**
   * Run `body` while holding the guard. The guard is released on every
   * exit path, including throws.
   *
   * @throws VaultError REENTRANCY if the guard is already held
   */
  run<T>(body: () => T): T {
    if (this._entered) {
      throw new VaultError({ code: "REENTRANCY" });
    }

    this._entered = true;
    try {
      return body();
    } finally {
      this._entered = false;
    }
  }
}
