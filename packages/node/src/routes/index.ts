/**
 * Route barrel: re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createVaultRoutes } from "./vault.js";
export { createOperationRoutes } from "./operations.js";
export { createEventRoutes } from "./events.js";
