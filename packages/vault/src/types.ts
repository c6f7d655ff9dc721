/**
 * Vault Types
 *
 * Domain types for time-locked inheritance vaults.
 * The ledger operates three subsystems over one shared store:
 *
 * 1. Vault Ledger — create, fund and configure vaults
 * 2. Release Authorization — tokens, claims, emergency withdrawal
 * 3. Heartbeat Monitor — owner proof-of-life deadlines (advisory)
 *
 * Rules:
 * - All types are readonly (immutability by default)
 * - Stored records are replaced on write, never mutated in place
 * - Amounts are Money in the ledger's single currency
 * - Timestamps are unix seconds
 */

import type { Identity, Money, UnixSeconds } from "@keepsake/types";

export type VaultId = number;
export type TokenId = number;

// =============================================================================
// Vault
// =============================================================================

/**
 * A locked balance awaiting conditional release.
 */
export interface Vault {
  readonly id: VaultId;
  readonly owner: Identity;

  /** Single recipient, or `null` when the vault is split across shares */
  readonly beneficiary: Identity | null;

  readonly balance: Money;
  readonly unlockTime: UnixSeconds;

  /** Terminal: set once by claim or emergency withdrawal */
  readonly claimed: boolean;

  readonly heartbeatEnabled: boolean;
  /** Seconds; 0 until heartbeat is enabled */
  readonly heartbeatInterval: number;
  readonly lastHeartbeatAt: UnixSeconds;

  /** Free-form text visible to the beneficiary */
  readonly note: string;
  readonly createdAt: UnixSeconds;
}

/**
 * One recipient's fixed percentage of a multi-beneficiary vault.
 * Written once at creation, in the order supplied.
 */
export interface BeneficiaryShare {
  readonly vaultId: VaultId;
  readonly beneficiary: Identity;
  /** Integer in 1..100; a vault's shares sum to exactly 100 */
  readonly percentage: number;
}

/**
 * Capability to claim a single-beneficiary vault, bound to the
 * beneficiary the vault had when the token was minted.
 */
export interface InheritanceToken {
  readonly id: TokenId;
  readonly vaultId: VaultId;
  /** `null` when minted on a multi-beneficiary vault (never claims) */
  readonly beneficiary: Identity | null;
  readonly active: boolean;
  readonly mintedAt: UnixSeconds;
}

// =============================================================================
// Results
// =============================================================================

/**
 * Value paid out by a release.
 */
export interface Payout {
  readonly beneficiary: Identity;
  readonly amount: Money;
  /** Share percentage for multi-beneficiary releases */
  readonly percentage?: number;
}

export interface MultiClaimResult {
  readonly vaultId: VaultId;
  readonly payouts: readonly Payout[];
  /** Truncation remainder left in escrow */
  readonly remainder: Money;
}

export interface VaultStats {
  readonly totalVaults: number;
  readonly totalTokens: number;
  /** Sum of balances of unclaimed vaults */
  readonly totalEscrowed: Money;
  readonly activeVaults: number;
  readonly claimedVaults: number;
  /** Accumulated truncation remainders of multi-beneficiary releases */
  readonly unallocatedRemainder: Money;
}

export interface VaultStatus {
  readonly vaultId: VaultId;
  readonly claimed: boolean;
  readonly locked: boolean;
  /** Unclaimed and unlocked */
  readonly claimable: boolean;
  readonly secondsUntilUnlock: number;
  readonly heartbeatOverdue: boolean;
}

export interface HeartbeatStatus {
  readonly vaultId: VaultId;
  readonly enabled: boolean;
  readonly interval: number;
  readonly lastHeartbeatAt: UnixSeconds;
  /** `lastHeartbeatAt + interval`, or null while disabled */
  readonly nextDeadline: UnixSeconds | null;
  readonly overdue: boolean;
  /** Negative once overdue; null while disabled */
  readonly secondsUntilDeadline: number | null;
}

// =============================================================================
// Persistence
// =============================================================================

/**
 * Full store state, JSON-safe.
 */
export interface VaultStoreState {
  readonly vaults: readonly Vault[];
  readonly tokens: readonly InheritanceToken[];
  readonly shares: readonly (readonly [VaultId, readonly BeneficiaryShare[]])[];
  readonly ownerIndex: readonly (readonly [Identity, readonly VaultId[]])[];
  readonly beneficiaryIndex: readonly (readonly [Identity, readonly VaultId[]])[];
  readonly nextVaultId: VaultId;
  readonly nextTokenId: TokenId;
  /** Scaled units, as a decimal integer string */
  readonly unallocatedUnits: string;
}

export interface VaultLedgerSnapshot {
  readonly version: 1;
  readonly currency: string;
  readonly decimals: number;
  readonly state: VaultStoreState;
  readonly savedAt: string;
}
