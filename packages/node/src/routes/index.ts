/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createVaultRoutes } from "./vaults.js";
export { createRegistryRoutes } from "./registry.js";
export { createAccountRoutes } from "./accounts.js";
export { createEventRoutes } from "./events.js";
