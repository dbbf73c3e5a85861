/**
 * @capvault/node: HTTP surface over one vault ledger.
 *
 * Public API of the package; main.ts is the process entry point.
 */

export { VaultService } from "./services/vault-service.js";
export type {
  VaultServiceConfig,
  VaultServiceOptions,
  OperationContext,
  VaultSummary,
  ReadinessReport,
} from "./services/vault-service.js";
export { loadConfig, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./types/index.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
