/**
 * VaultLedger — transactional state machine over vaults, inheritance
 * tokens and beneficiary shares.
 *
 * Composes:
 * - VaultStore (tables, indices, counters)
 * - ValueTransferBackend (escrow deposits and releases)
 * - EventStore (one fact stream per vault)
 * - KeyedLock (per-vault linearizability)
 *
 * Every operation on an existing vault runs exclusively for that vault:
 *
 *   validate → await backend (if value moves) → commit synchronously → emit
 *
 * The commit is a run of synchronous store writes, so readers, which
 * never take the lock, see either the whole mutation or none of it.
 * A backend failure happens before the commit and leaves no trace.
 * Fact delivery comes after the commit, so a failing append or
 * subscriber is reported to `onFactError` and never fails the operation.
 *
 * Check order is fixed: existence → ownership/identity → terminal state
 * → time → operation-specific validation.
 */

import { randomUUID } from "node:crypto";
import type { EventSource, Identity, Money, UnixSeconds } from "@keepsake/types";
import { isIdentity } from "@keepsake/types";
import {
  addMoney,
  parseAmount,
  toMoney,
  toUnits,
  zeroMoney,
} from "@keepsake/ledger";
import {
  InMemoryEventStore,
  VAULT_EVENTS,
  vaultStreamId,
} from "@keepsake/event-store";
import type { EventStore, VaultFact } from "@keepsake/event-store";
import { systemClock } from "./clock.js";
import type { Clock } from "./clock.js";
import { VaultError } from "./errors.js";
import { heartbeatStatus, isOverdue, isValidHeartbeatInterval } from "./heartbeat.js";
import { KeyedLock } from "./keyed-lock.js";
import { buildShares, computePayouts, validateShares } from "./shares.js";
import { InMemoryVaultStore } from "./store.js";
import type { VaultStore } from "./store.js";
import type { ValueTransfer, ValueTransferBackend } from "./transfer.js";
import type {
  BeneficiaryShare,
  HeartbeatStatus,
  InheritanceToken,
  MultiClaimResult,
  Payout,
  TokenId,
  Vault,
  VaultId,
  VaultLedgerSnapshot,
  VaultStats,
  VaultStatus,
} from "./types.js";

// =============================================================================
// Configuration
// =============================================================================

export interface VaultLedgerOptions {
  /** Currency every amount is denominated in */
  readonly currency: string;
  readonly decimals: number;
  readonly backend: ValueTransferBackend;
  /** Default: a fresh InMemoryVaultStore */
  readonly store?: VaultStore;
  /** Default: a fresh InMemoryEventStore */
  readonly events?: EventStore;
  /** Default: system time */
  readonly clock?: Clock;
  /**
   * Receives errors from appending a committed operation's facts,
   * including subscriber errors of the default event store.
   */
  readonly onFactError?: (error: unknown, streamId: string) => void;
}

// =============================================================================
// Vault Ledger
// =============================================================================

export class VaultLedger {
  readonly currency: string;
  readonly decimals: number;
  readonly events: EventStore;

  private readonly _store: VaultStore;
  private readonly _backend: ValueTransferBackend;
  private readonly _clock: Clock;
  private readonly _locks = new KeyedLock<VaultId>();
  private readonly _onFactError: ((error: unknown, streamId: string) => void) | undefined;
  private _factFailures = 0;

  constructor(options: VaultLedgerOptions) {
    this.currency = options.currency;
    this.decimals = options.decimals;
    this._onFactError = options.onFactError;
    this.events =
      options.events ??
      new InMemoryEventStore({
        onSubscriberError: (error, stored) => this._factFailed(error, stored.streamId),
      });
    this._store = options.store ?? new InMemoryVaultStore();
    this._backend = options.backend;
    this._clock = options.clock ?? systemClock;
  }

  /** Committed operations whose facts could not be fully delivered. */
  get factFailures(): number {
    return this._factFailures;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Vault Ledger
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Create a single-beneficiary vault funded by `depositAmount` from the
   * caller. The id is allocated only once the deposit is escrowed.
   */
  async createVault(
    caller: Identity,
    beneficiary: Identity,
    unlockTime: UnixSeconds,
    depositAmount: string,
  ): Promise<VaultId> {
    const deposit = this._parseDeposit(depositAmount);
    this._requireBeneficiary(beneficiary);
    this._requireFutureUnlock(unlockTime);

    const correlationId = randomUUID();
    await this._move(
      [{ direction: "deposit", party: caller, amount: deposit }],
      `create:${correlationId}`,
    );

    const vault = this._insertVault(caller, beneficiary, unlockTime, deposit);
    this._store.indexBeneficiary(beneficiary, vault.id);
    this._emit(vault.id, caller, correlationId, "ledger", [
      {
        type: VAULT_EVENTS.CREATED,
        payload: {
          vaultId: vault.id,
          owner: caller,
          beneficiary,
          unlockTime,
          amount: deposit.amount,
          currency: deposit.currency,
        },
      },
    ]);
    return vault.id;
  }

  /**
   * Create a vault split across beneficiaries by fixed percentages.
   */
  async createMultiBeneficiaryVault(
    caller: Identity,
    beneficiaries: readonly Identity[],
    percentages: readonly number[],
    unlockTime: UnixSeconds,
    depositAmount: string,
  ): Promise<VaultId> {
    const split = validateShares(beneficiaries, percentages, (id) => this._backend.isReserved(id));
    const deposit = this._parseDeposit(depositAmount);
    this._requireFutureUnlock(unlockTime);

    const correlationId = randomUUID();
    await this._move(
      [{ direction: "deposit", party: caller, amount: deposit }],
      `create:${correlationId}`,
    );

    const vault = this._insertVault(caller, null, unlockTime, deposit);
    this._store.putShares(vault.id, buildShares(vault.id, split.beneficiaries, split.percentages));
    for (const beneficiary of split.beneficiaries) {
      this._store.indexBeneficiary(beneficiary, vault.id);
    }
    this._emit(vault.id, caller, correlationId, "ledger", [
      {
        type: VAULT_EVENTS.MULTI_BENEFICIARY_CREATED,
        payload: {
          vaultId: vault.id,
          owner: caller,
          beneficiaries: split.beneficiaries,
          percentages: split.percentages,
          unlockTime,
          amount: deposit.amount,
          currency: deposit.currency,
        },
      },
    ]);
    return vault.id;
  }

  async addFunds(caller: Identity, vaultId: VaultId, amount: string): Promise<Vault> {
    return this._locks.run(vaultId, async () => {
      const vault = this._requireOwnedUnclaimed(caller, vaultId);
      const deposit = this._parseDeposit(amount);

      const correlationId = randomUUID();
      await this._move(
        [{ direction: "deposit", party: caller, amount: deposit }],
        `fund:${String(vaultId)}:${correlationId}`,
      );

      const updated: Vault = { ...vault, balance: addMoney(vault.balance, deposit) };
      this._store.putVault(updated);
      this._emit(vaultId, caller, correlationId, "ledger", [
        {
          type: VAULT_EVENTS.FUNDED,
          payload: {
            vaultId,
            amount: deposit.amount,
            currency: deposit.currency,
            newBalance: updated.balance.amount,
          },
        },
      ]);
      return updated;
    });
  }

  /**
   * Push the unlock time later. It can never move earlier.
   */
  async extendVaultTime(
    caller: Identity,
    vaultId: VaultId,
    newUnlockTime: UnixSeconds,
  ): Promise<Vault> {
    return this._locks.run(vaultId, async () => {
      const vault = this._requireOwnedUnclaimed(caller, vaultId);
      if (!Number.isSafeInteger(newUnlockTime)) {
        throw new VaultError("INVALID_UNLOCK_TIME", "Unlock time must be an integer (unix seconds)");
      }
      if (newUnlockTime <= vault.unlockTime) {
        throw new VaultError(
          "TIME_NOT_LATER",
          `New unlock time ${String(newUnlockTime)} is not later than ${String(vault.unlockTime)}`,
        );
      }

      const updated: Vault = { ...vault, unlockTime: newUnlockTime };
      this._store.putVault(updated);
      this._emit(vaultId, caller, randomUUID(), "ledger", [
        {
          type: VAULT_EVENTS.EXTENDED,
          payload: { vaultId, previousUnlockTime: vault.unlockTime, newUnlockTime },
        },
      ]);
      return updated;
    });
  }

  /**
   * Replace the beneficiary of a single-beneficiary vault. The previous
   * beneficiary's index entry stays; queries filter it out.
   */
  async updateBeneficiary(
    caller: Identity,
    vaultId: VaultId,
    newBeneficiary: Identity,
  ): Promise<Vault> {
    return this._locks.run(vaultId, async () => {
      const vault = this._requireOwnedUnclaimed(caller, vaultId);
      if (vault.beneficiary === null) {
        throw new VaultError(
          "CANNOT_UPDATE_MULTI_BENEFICIARY_VAULT",
          `Vault ${String(vaultId)} has fixed beneficiary shares`,
        );
      }
      this._requireBeneficiary(newBeneficiary);

      const updated: Vault = { ...vault, beneficiary: newBeneficiary };
      this._store.putVault(updated);
      this._store.indexBeneficiary(newBeneficiary, vaultId);
      this._emit(vaultId, caller, randomUUID(), "ledger", [
        {
          type: VAULT_EVENTS.BENEFICIARY_UPDATED,
          payload: { vaultId, previousBeneficiary: vault.beneficiary, newBeneficiary },
        },
      ]);
      return updated;
    });
  }

  async setMessage(caller: Identity, vaultId: VaultId, text: string): Promise<Vault> {
    return this._locks.run(vaultId, async () => {
      const vault = this._requireOwnedUnclaimed(caller, vaultId);

      const updated: Vault = { ...vault, note: text };
      this._store.putVault(updated);
      this._emit(vaultId, caller, randomUUID(), "ledger", [
        { type: VAULT_EVENTS.MESSAGE_UPDATED, payload: { vaultId, note: text } },
      ]);
      return updated;
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Release Authorization
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Mint a token bound to the vault's current beneficiary. Tokens are
   * not deduplicated; a token minted on a multi-beneficiary vault binds
   * `null` and can never satisfy a claim.
   */
  async mintInheritanceToken(caller: Identity, vaultId: VaultId): Promise<TokenId> {
    return this._locks.run(vaultId, async () => {
      const vault = this._requireOwnedUnclaimed(caller, vaultId);

      const token: InheritanceToken = {
        id: this._store.allocateTokenId(),
        vaultId,
        beneficiary: vault.beneficiary,
        active: true,
        mintedAt: this._clock.now(),
      };
      this._store.putToken(token);
      this._emit(vaultId, caller, randomUUID(), "release", [
        {
          type: VAULT_EVENTS.TOKEN_MINTED,
          payload: { tokenId: token.id, vaultId, beneficiary: token.beneficiary },
        },
      ]);
      return token.id;
    });
  }

  /**
   * Release a single-beneficiary vault's full balance to the caller.
   */
  async claimVault(caller: Identity, vaultId: VaultId, tokenId: TokenId): Promise<Payout> {
    return this._locks.run(vaultId, async () => {
      const vault = this._requireVault(vaultId);
      this._requireUnclaimed(vault);
      this._requireUnlocked(vault);
      if (vault.beneficiary !== caller) {
        throw new VaultError("NOT_BENEFICIARY", `Caller is not the beneficiary of vault ${String(vaultId)}`);
      }

      const token = this._store.getToken(tokenId);
      if (token === undefined) {
        throw new VaultError("TOKEN_NOT_FOUND", `Token ${String(tokenId)} not found`);
      }
      if (!token.active) {
        throw new VaultError("TOKEN_INACTIVE", `Token ${String(tokenId)} is no longer active`);
      }
      if (token.vaultId !== vaultId) {
        throw new VaultError(
          "TOKEN_VAULT_MISMATCH",
          `Token ${String(tokenId)} is bound to vault ${String(token.vaultId)}`,
        );
      }
      if (token.beneficiary !== caller) {
        throw new VaultError("TOKEN_OWNER_MISMATCH", `Token ${String(tokenId)} is bound to another identity`);
      }

      const correlationId = randomUUID();
      const payout: Payout = { beneficiary: caller, amount: vault.balance };
      await this._move(
        [{ direction: "release", party: caller, amount: payout.amount }],
        `claim:${String(vaultId)}:${correlationId}`,
      );

      this._store.putVault(this._terminated(vault));
      this._store.putToken({ ...token, active: false });
      this._emit(vaultId, caller, correlationId, "release", [
        {
          type: VAULT_EVENTS.CLAIMED,
          payload: {
            vaultId,
            beneficiary: caller,
            amount: payout.amount.amount,
            currency: payout.amount.currency,
            tokenId,
          },
        },
      ]);
      return payout;
    });
  }

  /**
   * Split a multi-beneficiary vault across its shares. Anyone may trigger
   * it once the vault is unlocked. The truncation remainder stays in
   * escrow and is added to `unallocatedRemainder`.
   */
  async claimMultiBeneficiaryVault(caller: Identity, vaultId: VaultId): Promise<MultiClaimResult> {
    return this._locks.run(vaultId, async () => {
      const vault = this._requireVault(vaultId);
      this._requireUnclaimed(vault);
      this._requireUnlocked(vault);
      const shares = this._store.getShares(vaultId);
      if (vault.beneficiary !== null || shares.length === 0) {
        throw new VaultError(
          "NOT_MULTI_BENEFICIARY_VAULT",
          `Vault ${String(vaultId)} is not a multi-beneficiary vault`,
        );
      }

      const { payouts, remainder } = computePayouts(vault.balance, shares);
      const transfers: ValueTransfer[] = payouts
        .filter((p) => toUnits(p.amount) > 0n)
        .map((p) => ({ direction: "release" as const, party: p.beneficiary, amount: p.amount }));

      const correlationId = randomUUID();
      if (transfers.length > 0) {
        await this._move(transfers, `claim-multi:${String(vaultId)}:${correlationId}`);
      }

      this._store.putVault(this._terminated(vault));
      this._store.addUnallocated(toUnits(remainder));
      this._emit(
        vaultId,
        caller,
        correlationId,
        "release",
        payouts.map((p) => ({
          type: VAULT_EVENTS.CLAIMED,
          payload: {
            vaultId,
            beneficiary: p.beneficiary,
            amount: p.amount.amount,
            currency: p.amount.currency,
            tokenId: null,
          },
        })),
      );
      return { vaultId, payouts, remainder };
    });
  }

  /**
   * Return the full balance to the owner before the unlock time.
   *
   * The time check is the decision point: a withdrawal validated before
   * `unlockTime` completes even if the backend resolves after it. The
   * vault lock keeps a claim from starting until it has.
   */
  async emergencyWithdraw(caller: Identity, vaultId: VaultId): Promise<Payout> {
    return this._locks.run(vaultId, async () => {
      const vault = this._requireOwnedUnclaimed(caller, vaultId);
      if (this._clock.now() >= vault.unlockTime) {
        throw new VaultError(
          "VAULT_UNLOCKED",
          `Vault ${String(vaultId)} is unlocked; use the claim path`,
        );
      }

      const correlationId = randomUUID();
      const payout: Payout = { beneficiary: caller, amount: vault.balance };
      await this._move(
        [{ direction: "release", party: caller, amount: payout.amount }],
        `withdraw:${String(vaultId)}:${correlationId}`,
      );

      this._store.putVault(this._terminated(vault));
      this._emit(vaultId, caller, correlationId, "release", [
        {
          type: VAULT_EVENTS.EMERGENCY_WITHDRAW,
          payload: {
            vaultId,
            owner: caller,
            amount: payout.amount.amount,
            currency: payout.amount.currency,
          },
        },
      ]);
      return payout;
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Heartbeat Monitor
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Enable (or re-arm) proof-of-life tracking; the clock starts now.
   */
  async enableHeartbeat(caller: Identity, vaultId: VaultId, interval: number): Promise<Vault> {
    return this._locks.run(vaultId, async () => {
      const vault = this._requireOwnedUnclaimed(caller, vaultId);
      if (!isValidHeartbeatInterval(interval)) {
        throw new VaultError("INVALID_INTERVAL", `Heartbeat interval ${String(interval)}s is out of range`);
      }

      const now = this._clock.now();
      const updated: Vault = {
        ...vault,
        heartbeatEnabled: true,
        heartbeatInterval: interval,
        lastHeartbeatAt: now,
      };
      this._store.putVault(updated);
      this._emit(vaultId, caller, randomUUID(), "heartbeat", [
        { type: VAULT_EVENTS.HEARTBEAT_ENABLED, payload: { vaultId, interval, at: now } },
      ]);
      return updated;
    });
  }

  async recordHeartbeat(caller: Identity, vaultId: VaultId): Promise<Vault> {
    return this._locks.run(vaultId, async () => {
      const vault = this._requireOwnedUnclaimed(caller, vaultId);
      if (!vault.heartbeatEnabled) {
        throw new VaultError("HEARTBEAT_NOT_ENABLED", `Heartbeat is not enabled for vault ${String(vaultId)}`);
      }

      const now = this._clock.now();
      const updated: Vault = { ...vault, lastHeartbeatAt: now };
      this._store.putVault(updated);
      this._emit(vaultId, caller, randomUUID(), "heartbeat", [
        { type: VAULT_EVENTS.HEARTBEAT_RECORDED, payload: { vaultId, at: now } },
      ]);
      return updated;
    });
  }

  isHeartbeatOverdue(vaultId: VaultId): boolean {
    return isOverdue(this._requireVault(vaultId), this._clock.now());
  }

  getHeartbeatStatus(vaultId: VaultId): HeartbeatStatus {
    return heartbeatStatus(this._requireVault(vaultId), this._clock.now());
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  getVaultDetails(vaultId: VaultId): Vault {
    return this._requireVault(vaultId);
  }

  getVaultStatus(vaultId: VaultId): VaultStatus {
    const vault = this._requireVault(vaultId);
    const now = this._clock.now();
    const locked = now < vault.unlockTime;
    return {
      vaultId,
      claimed: vault.claimed,
      locked,
      claimable: !vault.claimed && !locked,
      secondsUntilUnlock: Math.max(0, vault.unlockTime - now),
      heartbeatOverdue: isOverdue(vault, now),
    };
  }

  /** Ids of vaults created by `owner`, in creation order. */
  getOwnerVaults(owner: Identity): readonly VaultId[] {
    return this._store.ownerVaultIds(owner);
  }

  /**
   * Ids of vaults `beneficiary` currently stands to receive, ascending.
   * Index entries left behind by beneficiary changes are dropped.
   */
  getBeneficiaryVaults(beneficiary: Identity): readonly VaultId[] {
    const current = new Set<VaultId>();
    for (const id of this._store.beneficiaryVaultIds(beneficiary)) {
      const vault = this._store.getVault(id);
      if (vault === undefined) continue;
      const listed =
        vault.beneficiary === null
          ? this._store.getShares(id).some((s) => s.beneficiary === beneficiary)
          : vault.beneficiary === beneficiary;
      if (listed) current.add(id);
    }
    return [...current].sort((a, b) => a - b);
  }

  /** Recorded shares, in the order supplied; empty for single-beneficiary vaults. */
  getVaultBeneficiaries(vaultId: VaultId): readonly BeneficiaryShare[] {
    this._requireVault(vaultId);
    return this._store.getShares(vaultId);
  }

  getTokenDetails(tokenId: TokenId): InheritanceToken {
    const token = this._store.getToken(tokenId);
    if (token === undefined) {
      throw new VaultError("TOKEN_NOT_FOUND", `Token ${String(tokenId)} not found`);
    }
    return token;
  }

  getContractStats(): VaultStats {
    const vaults = this._store.listVaults();
    let escrowed = zeroMoney(this.currency, this.decimals);
    let claimed = 0;
    for (const vault of vaults) {
      if (vault.claimed) {
        claimed++;
      } else {
        escrowed = addMoney(escrowed, vault.balance);
      }
    }
    return {
      totalVaults: vaults.length,
      totalTokens: this._store.countTokens(),
      totalEscrowed: escrowed,
      activeVaults: vaults.length - claimed,
      claimedVaults: claimed,
      unallocatedRemainder: toMoney(this._store.unallocatedUnits(), this.currency, this.decimals),
    };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Snapshot (persistence)
  // ───────────────────────────────────────────────────────────────────────

  snapshot(): VaultLedgerSnapshot {
    return {
      version: 1,
      currency: this.currency,
      decimals: this.decimals,
      state: this._store.snapshot(),
      savedAt: new Date(this._clock.now() * 1000).toISOString(),
    };
  }

  /**
   * Rebuild a ledger from a snapshot into a fresh InMemoryVaultStore.
   */
  static fromSnapshot(
    snapshot: VaultLedgerSnapshot,
    options: Omit<VaultLedgerOptions, "store" | "currency" | "decimals">,
  ): VaultLedger {
    return new VaultLedger({
      ...options,
      currency: snapshot.currency,
      decimals: snapshot.decimals,
      store: InMemoryVaultStore.fromSnapshot(snapshot.state),
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internal
  // ───────────────────────────────────────────────────────────────────────

  private _insertVault(
    owner: Identity,
    beneficiary: Identity | null,
    unlockTime: UnixSeconds,
    deposit: Money,
  ): Vault {
    const now = this._clock.now();
    const vault: Vault = {
      id: this._store.allocateVaultId(),
      owner,
      beneficiary,
      balance: deposit,
      unlockTime,
      claimed: false,
      heartbeatEnabled: false,
      heartbeatInterval: 0,
      lastHeartbeatAt: 0,
      note: "",
      createdAt: now,
    };
    this._store.putVault(vault);
    this._store.indexOwner(owner, vault.id);
    return vault;
  }

  private _terminated(vault: Vault): Vault {
    return { ...vault, claimed: true, balance: zeroMoney(this.currency, this.decimals) };
  }

  private _parseDeposit(amount: string): Money {
    let units: bigint;
    try {
      units = parseAmount(amount, this.decimals);
    } catch (err) {
      throw new VaultError("INVALID_AMOUNT", `Invalid amount "${amount}"`, { cause: err });
    }
    if (units <= 0n) {
      throw new VaultError("INVALID_AMOUNT", `Amount must be positive, got "${amount}"`);
    }
    return toMoney(units, this.currency, this.decimals);
  }

  private _requireFutureUnlock(unlockTime: UnixSeconds): void {
    if (!Number.isSafeInteger(unlockTime) || unlockTime <= this._clock.now()) {
      throw new VaultError("INVALID_UNLOCK_TIME", "Unlock time must be a future unix timestamp");
    }
  }

  private _requireVault(vaultId: VaultId): Vault {
    const vault = this._store.getVault(vaultId);
    if (vault === undefined) {
      throw new VaultError("VAULT_NOT_FOUND", `Vault ${String(vaultId)} not found`);
    }
    return vault;
  }

  private _requireUnclaimed(vault: Vault): void {
    if (vault.claimed) {
      throw new VaultError("ALREADY_CLAIMED", `Vault ${String(vault.id)} is already claimed`);
    }
  }

  private _requireUnlocked(vault: Vault): void {
    if (this._clock.now() < vault.unlockTime) {
      throw new VaultError(
        "STILL_LOCKED",
        `Vault ${String(vault.id)} is locked until ${String(vault.unlockTime)}`,
      );
    }
  }

  private _requireBeneficiary(beneficiary: Identity): void {
    if (!isIdentity(beneficiary)) {
      throw new VaultError("INVALID_BENEFICIARY", "Beneficiary must be a valid identity");
    }
    if (this._backend.isReserved(beneficiary)) {
      throw new VaultError("INVALID_BENEFICIARY", `"${beneficiary}" is a reserved account`);
    }
  }

  private _requireOwnedUnclaimed(caller: Identity, vaultId: VaultId): Vault {
    const vault = this._requireVault(vaultId);
    if (vault.owner !== caller) {
      throw new VaultError("NOT_OWNER", `Caller does not own vault ${String(vaultId)}`);
    }
    this._requireUnclaimed(vault);
    return vault;
  }

  private async _move(transfers: readonly ValueTransfer[], reference: string): Promise<void> {
    try {
      await this._backend.transfer(transfers, reference);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new VaultError("VALUE_TRANSFER_FAILED", `Value transfer failed: ${reason}`, { cause: err });
    }
  }

  private _emit(
    vaultId: VaultId,
    actor: Identity,
    correlationId: string,
    source: EventSource,
    facts: readonly VaultFact[],
  ): void {
    const streamId = vaultStreamId(vaultId);
    const timestamp = new Date(this._clock.now() * 1000).toISOString();
    try {
      this.events.append(
        streamId,
        facts.map((fact) => ({
          type: fact.type,
          metadata: { eventId: randomUUID(), timestamp, actor, correlationId, source },
          payload: fact.payload,
        })),
        { expectedVersion: this.events.streamVersion(streamId) },
      );
    } catch (err) {
      this._factFailed(err, streamId);
    }
  }

  private _factFailed(error: unknown, streamId: string): void {
    this._factFailures += 1;
    this._onFactError?.(error, streamId);
  }
}
