/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts so tests create the app without starting the
 * HTTP server.
 */

import { Hono } from "hono";
import type { Logger } from "pino";
import type { AppEnv } from "./types/api-contract.js";
import { createErrorEnvelope } from "./types/error.js";
import { VaultService } from "./services/vault-service.js";
import type { VaultServiceConfig } from "./services/vault-service.js";
import { handleError } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import {
  idempotencyMiddleware,
  InMemoryIdempotencyStore,
} from "./middleware/idempotency.js";
import { createHealthRoutes } from "./routes/health.js";
import { createVaultRoutes } from "./routes/vault.js";
import { createOperationRoutes } from "./routes/operations.js";
import { createEventRoutes } from "./routes/events.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly serviceConfig: VaultServiceConfig;
  readonly logger?: Logger | undefined;
  readonly logFn?: ((entry: RequestLogEntry) => void) | undefined;
  readonly idempotencyTtlMs?: number | undefined;
  /** Returns ISO 8601 timestamps for notifications, the log and health */
  readonly clock?: (() => string) | undefined;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: VaultService;
  readonly idempotencyStore: InMemoryIdempotencyStore;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const service = new VaultService(options.serviceConfig, {
    logger: options.logger,
    clock: options.clock,
  });
  const idempotencyStore = new InMemoryIdempotencyStore(
    options.idempotencyTtlMs ?? 86400000,
  );

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handling ─────────────────────────────────────────────
  app.onError((err, c) => {
    const response = handleError(err, c);
    if (response.status === 500) {
      options.logger?.error({ err, requestId: c.get("requestId") }, "Unhandled error");
    }
    return response;
  });

  app.notFound((c) =>
    c.json(createErrorEnvelope("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`), 404),
  );

  // ─── Health Routes ──────────────────────────────────────────────
  app.route("/", createHealthRoutes(service, options.clock));

  // ─── API Routes ─────────────────────────────────────────────────
  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  // Idempotency for POST /api/* requests
  app.use("/api/*", idempotencyMiddleware(idempotencyStore));

  // Mount v1 API routes
  app.route("/api/v1", createVaultRoutes());
  app.route("/api/v1", createOperationRoutes());
  app.route("/api/v1/events", createEventRoutes());

  return { app, service, idempotencyStore };
}
