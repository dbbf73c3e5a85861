/**
 * Vault and account query routes.
 *
 * GET /api/v1/vault             : Configuration, totals, counters
 * GET /api/v1/vault/capacity    : Remaining capacity under the bank cap
 * GET /api/v1/accounts          : Every account that ever deposited
 * GET /api/v1/accounts/:account : Balance and counters of one account
 */

import { Hono } from "hono";
import { isAccountId } from "@capvault/types";
import { VaultError } from "@capvault/ledger";
import type { AppEnv } from "../types/api-contract.js";
import { toAccountDto } from "../types/dto.js";

export function createVaultRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/vault", (c) => {
    const summary = c.get("service").summary();

    return c.json({
      owner: summary.owner,
      address: summary.address,
      bankCap: summary.bankCap.toString(),
      perTxWithdrawLimit: summary.perTxWithdrawLimit.toString(),
      totalDeposited: summary.totalDeposited.toString(),
      heldFunds: summary.heldFunds.toString(),
      untrackedFunds: summary.untrackedFunds.toString(),
      remainingCapacity: summary.remainingCapacity.toString(),
      depositCount: summary.depositCount,
      withdrawCount: summary.withdrawCount,
      accountCount: summary.accountCount,
    });
  });

  routes.get("/vault/capacity", (c) => {
    const service = c.get("service");
    const summary = service.summary();

    return c.json({
      remainingCapacity: summary.remainingCapacity.toString(),
      bankCap: summary.bankCap.toString(),
      totalDeposited: summary.totalDeposited.toString(),
      display: service.formatAmount(summary.remainingCapacity),
    });
  });

  routes.get("/accounts", (c) => {
    const accounts = c.get("service").accounts();
    return c.json({ data: accounts.map(toAccountDto) });
  });

  routes.get("/accounts/:account", (c) => {
    const account = c.req.param("account");
    if (!isAccountId(account)) {
      throw new VaultError({ code: "INVALID_ACCOUNT", value: account });
    }

    return c.json(toAccountDto(c.get("service").account(account)));
  });

  return routes;
}
