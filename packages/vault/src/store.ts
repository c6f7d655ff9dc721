/**
 * VaultStore — keyed-record persistence for the vault ledger.
 *
 * Logical layout:
 * - Vault table keyed by vault id
 * - Token table keyed by token id
 * - Share table keyed by vault id (ordered list per key)
 * - owner → vault ids and beneficiary → vault ids indices (append-only)
 * - Id counters and the unallocated-remainder accumulator
 *
 * Every method is synchronous, so a sequence of writes made without an
 * intervening `await` is observed by readers as a single commit.
 */

import type { Identity } from "@keepsake/types";
import type {
  BeneficiaryShare,
  InheritanceToken,
  TokenId,
  Vault,
  VaultId,
  VaultStoreState,
} from "./types.js";

export interface VaultStore {
  /** Reserve the next vault id (1, 2, 3, ...). Ids are never reused. */
  allocateVaultId(): VaultId;
  allocateTokenId(): TokenId;

  getVault(id: VaultId): Vault | undefined;
  /** Insert or replace a vault record. */
  putVault(vault: Vault): void;
  listVaults(): readonly Vault[];

  getToken(id: TokenId): InheritanceToken | undefined;
  putToken(token: InheritanceToken): void;
  countTokens(): number;

  getShares(vaultId: VaultId): readonly BeneficiaryShare[];
  /** Shares are written once per vault. */
  putShares(vaultId: VaultId, shares: readonly BeneficiaryShare[]): void;

  indexOwner(owner: Identity, vaultId: VaultId): void;
  ownerVaultIds(owner: Identity): readonly VaultId[];

  indexBeneficiary(beneficiary: Identity, vaultId: VaultId): void;
  /** Raw index entries; may include stale and repeated ids. */
  beneficiaryVaultIds(beneficiary: Identity): readonly VaultId[];

  addUnallocated(units: bigint): void;
  unallocatedUnits(): bigint;

  snapshot(): VaultStoreState;
}

export class VaultStoreError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "VaultStoreError";
  }
}

// =============================================================================
// In-memory implementation
// =============================================================================

export class InMemoryVaultStore implements VaultStore {
  private readonly _vaults = new Map<VaultId, Vault>();
  private readonly _tokens = new Map<TokenId, InheritanceToken>();
  private readonly _shares = new Map<VaultId, readonly BeneficiaryShare[]>();
  private readonly _ownerIndex = new Map<Identity, VaultId[]>();
  private readonly _beneficiaryIndex = new Map<Identity, VaultId[]>();
  private _nextVaultId: VaultId = 1;
  private _nextTokenId: TokenId = 1;
  private _unallocated = 0n;

  // ─── Counters ───────────────────────────────────────────────────────

  allocateVaultId(): VaultId {
    return this._nextVaultId++;
  }

  allocateTokenId(): TokenId {
    return this._nextTokenId++;
  }

  // ─── Tables ─────────────────────────────────────────────────────────

  getVault(id: VaultId): Vault | undefined {
    return this._vaults.get(id);
  }

  putVault(vault: Vault): void {
    this._vaults.set(vault.id, vault);
  }

  listVaults(): readonly Vault[] {
    return [...this._vaults.values()];
  }

  getToken(id: TokenId): InheritanceToken | undefined {
    return this._tokens.get(id);
  }

  putToken(token: InheritanceToken): void {
    this._tokens.set(token.id, token);
  }

  countTokens(): number {
    return this._tokens.size;
  }

  getShares(vaultId: VaultId): readonly BeneficiaryShare[] {
    return this._shares.get(vaultId) ?? [];
  }

  putShares(vaultId: VaultId, shares: readonly BeneficiaryShare[]): void {
    if (this._shares.has(vaultId)) {
      throw new VaultStoreError(`Shares for vault ${String(vaultId)} are already recorded`);
    }
    this._shares.set(vaultId, [...shares]);
  }

  // ─── Indices ────────────────────────────────────────────────────────

  indexOwner(owner: Identity, vaultId: VaultId): void {
    appendTo(this._ownerIndex, owner, vaultId);
  }

  ownerVaultIds(owner: Identity): readonly VaultId[] {
    return [...(this._ownerIndex.get(owner) ?? [])];
  }

  indexBeneficiary(beneficiary: Identity, vaultId: VaultId): void {
    appendTo(this._beneficiaryIndex, beneficiary, vaultId);
  }

  beneficiaryVaultIds(beneficiary: Identity): readonly VaultId[] {
    return [...(this._beneficiaryIndex.get(beneficiary) ?? [])];
  }

  // ─── Remainder ──────────────────────────────────────────────────────

  addUnallocated(units: bigint): void {
    this._unallocated += units;
  }

  unallocatedUnits(): bigint {
    return this._unallocated;
  }

  // ─── Snapshot ───────────────────────────────────────────────────────

  snapshot(): VaultStoreState {
    return {
      vaults: [...this._vaults.values()],
      tokens: [...this._tokens.values()],
      shares: [...this._shares.entries()].map(([id, shares]) => [id, [...shares]] as const),
      ownerIndex: [...this._ownerIndex.entries()].map(([who, ids]) => [who, [...ids]] as const),
      beneficiaryIndex: [...this._beneficiaryIndex.entries()].map(
        ([who, ids]) => [who, [...ids]] as const,
      ),
      nextVaultId: this._nextVaultId,
      nextTokenId: this._nextTokenId,
      unallocatedUnits: this._unallocated.toString(),
    };
  }

  static fromSnapshot(state: VaultStoreState): InMemoryVaultStore {
    const store = new InMemoryVaultStore();
    for (const vault of state.vaults) {
      if (vault.id >= state.nextVaultId) {
        throw new VaultStoreError(
          `Vault ${String(vault.id)} is not below nextVaultId ${String(state.nextVaultId)}`,
        );
      }
      store._vaults.set(vault.id, vault);
    }
    for (const token of state.tokens) {
      if (token.id >= state.nextTokenId) {
        throw new VaultStoreError(
          `Token ${String(token.id)} is not below nextTokenId ${String(state.nextTokenId)}`,
        );
      }
      store._tokens.set(token.id, token);
    }
    for (const [vaultId, shares] of state.shares) {
      store._shares.set(vaultId, [...shares]);
    }
    for (const [owner, ids] of state.ownerIndex) {
      store._ownerIndex.set(owner, [...ids]);
    }
    for (const [beneficiary, ids] of state.beneficiaryIndex) {
      store._beneficiaryIndex.set(beneficiary, [...ids]);
    }
    store._nextVaultId = state.nextVaultId;
    store._nextTokenId = state.nextTokenId;
    store._unallocated = BigInt(state.unallocatedUnits);
    return store;
  }
}

function appendTo(index: Map<Identity, VaultId[]>, key: Identity, vaultId: VaultId): void {
  const ids = index.get(key);
  if (ids === undefined) {
    index.set(key, [vaultId]);
  } else {
    ids.push(vaultId);
  }
}
