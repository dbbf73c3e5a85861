/**
 * Ledger mutation routes. All require the X-Account-Id header.
 *
 * POST /api/v1/deposits     { amount }             : deposit
 * POST /api/v1/withdrawals  { amount }             : withdraw
 * POST /api/v1/rescues      { destination, amount }: owner-only rescue
 *
 * Amounts are base-unit digit strings. Ledger failures propagate to the
 * global error handler.
 */

import { Hono } from "hono";
import { parseBaseUnits } from "@capvault/ledger";
import type { AppEnv } from "../types/api-contract.js";
import { callerMiddleware } from "../middleware/caller.js";
import { readJsonBody } from "../middleware/validate.js";
import {
  DepositSchema,
  RescueSchema,
  WithdrawSchema,
  toBalanceChangeDto,
  toRescueDto,
} from "../types/dto.js";

export function createOperationRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  const requireCaller = callerMiddleware();

  routes.post("/deposits", requireCaller, async (c) => {
    const body = await readJsonBody(c, DepositSchema);
    const receipt = c.get("service").deposit(c.get("caller"), parseBaseUnits(body.amount), {
      correlationId: c.get("requestId"),
    });

    return c.json(toBalanceChangeDto(receipt), 201);
  });

  routes.post("/withdrawals", requireCaller, async (c) => {
    const body = await readJsonBody(c, WithdrawSchema);
    const receipt = c.get("service").withdraw(c.get("caller"), parseBaseUnits(body.amount), {
      correlationId: c.get("requestId"),
    });

    return c.json(toBalanceChangeDto(receipt), 201);
  });

  routes.post("/rescues", requireCaller, async (c) => {
    const body = await readJsonBody(c, RescueSchema);
    const receipt = c.get("service").rescue(
      c.get("caller"),
      body.destination,
      parseBaseUnits(body.amount),
      { correlationId: c.get("requestId") },
    );

    return c.json(toRescueDto(receipt), 201);
  });

  return routes;
}
