/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { AccountId } from "@capvault/types";
import type { VaultService } from "../services/vault-service.js";

/**
 * Hono environment type for the vault node.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** The vault service behind /api routes */
    service: VaultService;

    /** Calling account (set by caller middleware on mutations) */
    caller: AccountId;
  };
}
