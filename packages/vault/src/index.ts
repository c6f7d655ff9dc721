/**
 * @keepsake/vault — Time-locked inheritance vaults.
 *
 * Three subsystems over one store, linearizable per vault:
 * - Vault Ledger: create, fund, extend, re-assign, annotate
 * - Release Authorization: inheritance tokens, claims, emergency withdrawal
 * - Heartbeat Monitor: owner proof-of-life deadlines (advisory)
 *
 * @packageDocumentation
 */

// Ledger
export { VaultLedger } from "./vault-ledger.js";
export type { VaultLedgerOptions } from "./vault-ledger.js";

// Errors
export { VaultError, categoryOf } from "./errors.js";
export type { VaultErrorCode, VaultErrorCategory } from "./errors.js";

// Store
export { InMemoryVaultStore, VaultStoreError } from "./store.js";
export type { VaultStore } from "./store.js";

// Value transfer
export { LedgerTransferBackend, DEFAULT_ESCROW_ACCOUNT } from "./transfer.js";
export type { ValueTransfer, ValueTransferBackend, TransferDirection } from "./transfer.js";

// Heartbeat
export {
  MIN_HEARTBEAT_INTERVAL,
  MAX_HEARTBEAT_INTERVAL,
  isValidHeartbeatInterval,
  isOverdue,
  heartbeatStatus,
} from "./heartbeat.js";

// Shares
export { TOTAL_PERCENTAGE, validateShares, buildShares, computePayouts } from "./shares.js";

// Concurrency & time
export { KeyedLock } from "./keyed-lock.js";
export { systemClock, ManualClock } from "./clock.js";
export type { Clock } from "./clock.js";

// Types
export type {
  VaultId,
  TokenId,
  Vault,
  BeneficiaryShare,
  InheritanceToken,
  Payout,
  MultiClaimResult,
  VaultStats,
  VaultStatus,
  HeartbeatStatus,
  VaultStoreState,
  VaultLedgerSnapshot,
} from "./types.js";
