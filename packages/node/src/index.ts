/**
 * @keepsake/node — HTTP service over the vault ledger.
 *
 * @packageDocumentation
 */

export { VaultService } from "./services/vault-service.js";
export type {
  VaultServiceConfig,
  AccountBalanceView,
  CreditResult,
} from "./services/vault-service.js";
export { readStateFile, writeStateFile, StateFileSchema } from "./services/state-file.js";
export type { SavedState } from "./services/state-file.js";
export { loadConfig, parseApiKeys, ConfigSchema } from "./config.js";
export type { AppConfig, ParsedApiKey } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
