/**
 * VaultService — Composition root for the domain packages.
 *
 * Route handlers reach the vault ledger, the value ledger and the fact
 * log through this service. One instance backs the whole process.
 */

import { randomUUID } from "node:crypto";
import pino from "pino";
import type { Logger } from "pino";
import { LedgerError, ValueLedger, parseAmount, toMoney } from "@keepsake/ledger";
import type { LedgerTransaction } from "@keepsake/ledger";
import { InMemoryEventStore, JsonlEventStore, vaultStreamId } from "@keepsake/event-store";
import type {
  EventStoreIntegrityResult,
  ReadAllOptions,
  ReadOptions,
  StoredEvent,
  Subscription,
} from "@keepsake/event-store";
import {
  DEFAULT_ESCROW_ACCOUNT,
  LedgerTransferBackend,
  VaultLedger,
  systemClock,
} from "@keepsake/vault";
import type { Clock } from "@keepsake/vault";
import type { Identity, Money } from "@keepsake/types";
import { readStateFile, writeStateFile } from "./state-file.js";

// =============================================================================
// Configuration
// =============================================================================

export interface VaultServiceConfig {
  readonly currency: string;
  readonly decimals: number;
  /** Default: "escrow" */
  readonly escrowAccount?: string | undefined;
  /** Append facts to this JSONL file. In-memory only when unset. */
  readonly eventLogPath?: string | undefined;
  /** Restore vault and value state from this file, and save it there. */
  readonly statePath?: string | undefined;
  readonly clock?: Clock | undefined;
  /** Default: a silent pino logger */
  readonly logger?: Logger | undefined;
}

export interface AccountBalanceView {
  readonly identity: Identity;
  readonly balance: Money;
}

export interface CreditResult extends AccountBalanceView {
  readonly reference: string;
}

// =============================================================================
// Service
// =============================================================================

export class VaultService {
  readonly values: ValueLedger;
  readonly backend: LedgerTransferBackend;
  readonly eventStore: InMemoryEventStore;
  readonly vaults: VaultLedger;

  private readonly _statePath: string | undefined;
  private readonly _clock: Clock;
  private readonly _logger: Logger;
  private readonly _factLog: Subscription;
  private _ready = false;

  constructor(config: VaultServiceConfig) {
    this._clock = config.clock ?? systemClock;
    this._logger = config.logger ?? pino({ level: "silent" });

    const onSubscriberError = (error: unknown, event: StoredEvent): void => {
      this._logger.error(
        { err: error, eventId: event.event.metadata.eventId, streamId: event.streamId },
        "Fact subscriber failed",
      );
    };
    const now = (): Date => new Date(this._clock.now() * 1000);

    this.eventStore =
      config.eventLogPath !== undefined
        ? new JsonlEventStore({ filePath: config.eventLogPath, now, onSubscriberError })
        : new InMemoryEventStore({ now, onSubscriberError });

    this._statePath = config.statePath;
    const saved = config.statePath !== undefined ? readStateFile(config.statePath) : undefined;
    if (
      saved !== undefined &&
      (saved.vaults.currency !== config.currency ||
        saved.vaults.decimals !== config.decimals ||
        saved.values.currency !== config.currency ||
        saved.values.decimals !== config.decimals)
    ) {
      throw new Error(
        `State file is denominated in ${saved.vaults.currency}/${String(saved.vaults.decimals)}, ` +
          `configured currency is ${config.currency}/${String(config.decimals)}`,
      );
    }

    // A fact stream for the next vault id means facts were committed after
    // the state was saved; allocating that id again would mix two vaults.
    const nextVaultId = saved?.vaults.state.nextVaultId ?? 1;
    if (this.eventStore.streamExists(vaultStreamId(nextVaultId))) {
      throw new Error(
        `Fact log already holds ${vaultStreamId(nextVaultId)}; it is ahead of the saved state`,
      );
    }

    this.values =
      saved !== undefined
        ? ValueLedger.fromSnapshot(saved.values)
        : new ValueLedger(config.currency, config.decimals);
    this.backend = new LedgerTransferBackend(
      this.values,
      config.escrowAccount ?? DEFAULT_ESCROW_ACCOUNT,
    );
    const onFactError = (error: unknown, streamId: string): void => {
      this._logger.error({ err: error, streamId }, "Fact delivery failed");
    };
    const ledgerOptions = {
      backend: this.backend,
      events: this.eventStore,
      clock: this._clock,
      onFactError,
    };
    this.vaults =
      saved !== undefined
        ? VaultLedger.fromSnapshot(saved.vaults, ledgerOptions)
        : new VaultLedger({ ...ledgerOptions, currency: config.currency, decimals: config.decimals });

    this._factLog = this.eventStore.subscribeAll((stored) => {
      this._logger.debug(
        {
          type: stored.event.type,
          streamId: stored.streamId,
          version: stored.version,
          globalPosition: stored.globalPosition,
          actor: stored.event.metadata.actor,
        },
        "Fact committed",
      );
    });

    this._ready = true;
  }

  // ─── Accounts ──────────────────────────────────────────────────────

  /**
   * Issue value into an identity's external balance.
   *
   * @throws LedgerError on a malformed, non-positive or over-precise amount,
   *   or when `identity` is the escrow account
   */
  credit(identity: Identity, amount: string): CreditResult {
    if (this.backend.isReserved(identity)) {
      throw new LedgerError("INVALID_ACCOUNT", `Cannot credit reserved account "${identity}"`);
    }
    const units = parseAmount(amount, this.values.decimals);
    const reference = `credit:${identity}:${randomUUID()}`;
    this.values.issue(
      identity,
      toMoney(units, this.values.currency, this.values.decimals),
      reference,
      new Date(this._clock.now() * 1000).toISOString(),
    );
    this._logger.info({ identity, amount, reference }, "Account credited");
    return { identity, balance: this.values.balanceOf(identity), reference };
  }

  balanceOf(identity: Identity): AccountBalanceView {
    return { identity, balance: this.values.balanceOf(identity) };
  }

  accountTransactions(identity: Identity): readonly LedgerTransaction[] {
    return this.values.getTransactions({ accountId: identity });
  }

  // ─── Events ────────────────────────────────────────────────────────

  readAllEvents(options?: ReadAllOptions): readonly StoredEvent[] {
    return this.eventStore.readAll(options);
  }

  readStreamEvents(streamId: string, options?: ReadOptions): readonly StoredEvent[] {
    return this.eventStore.read(streamId, options);
  }

  verifyEventStore(): EventStoreIntegrityResult {
    return this.eventStore.verifyIntegrity();
  }

  // ─── State ─────────────────────────────────────────────────────────

  /**
   * Write vault and value state to the configured state file.
   *
   * @returns false when no state file is configured
   */
  saveState(): boolean {
    if (this._statePath === undefined) {
      return false;
    }
    writeStateFile(this._statePath, {
      version: 1,
      vaults: this.vaults.snapshot(),
      values: this.values.snapshot(),
    });
    this._logger.info({ path: this._statePath }, "State saved");
    return true;
  }

  // ─── Lifecycle ─────────────────────────────────────────────────────

  isReady(): boolean {
    return this._ready;
  }

  stop(): void {
    this._factLog.unsubscribe();
    this._ready = false;
  }
}
