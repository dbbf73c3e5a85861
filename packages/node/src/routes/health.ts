/**
 * Health check routes.
 *
 * GET /health: Liveness probe (always 200 if server is running)
 * GET /ready : Readiness probe (notification log integrity + ledger conservation)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { VaultService } from "../services/vault-service.js";

interface SubsystemStatus {
  readonly status: "ok" | "down";
  readonly detail?: string | undefined;
}

export function createHealthRoutes(
  service: VaultService,
  clock: () => string = () => new Date().toISOString(),
): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: clock(),
    });
  });

  routes.get("/ready", (c) => {
    const report = service.readiness();
    const integrity = report.notificationLog;

    const subsystems: Record<string, SubsystemStatus> = {
      notificationLog: integrity.valid
        ? { status: "ok" }
        : {
            status: "down",
            detail: `chainValid=false, errors=${integrity.errors.length}, lastVerifiedPosition=${integrity.lastVerifiedPosition}`,
          },
      ledger: report.conservation
        ? { status: "ok" }
        : { status: "down", detail: "tracked balances do not sum to totalDeposited" },
    };

    return c.json(
      {
        status: report.ready ? "ready" : "not_ready",
        subsystems,
        timestamp: clock(),
      },
      report.ready ? 200 : 503,
    );
  });

  return routes;
}
