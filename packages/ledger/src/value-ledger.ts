/**
 * @keepsake/ledger — Value ledger.
 *
 * Append-only record of value held by identities and by the escrow
 * account. Every write is a transaction that commits all of its
 * movements or none of them. There is NO update() or delete().
 *
 * API surface:
 * - issue() — Bring new value into an account from outside the system
 * - transfer() — Move value between accounts atomically
 * - balanceOf() / getBalances() — Current balances
 * - getTransactions() — Query committed transactions
 * - snapshot() / fromSnapshot() — Persistence
 */

import type { Money } from "@keepsake/types";
import { assertSameCurrency, toMoney, toUnits, validateMoney } from "./money-math.js";
import type {
  AccountBalance,
  LedgerTransaction,
  TransactionFilter,
  ValueLedgerSnapshot,
  ValueMovement,
} from "./types.js";
import { LedgerError } from "./types.js";

/** Pseudo-account that is the source of issued value. Never holds a balance. */
export const ISSUER_ACCOUNT = "@issuer";

export class ValueLedger {
  readonly currency: string;
  readonly decimals: number;

  private readonly _balances = new Map<string, bigint>();
  private readonly _transactions: LedgerTransaction[] = [];
  private readonly _references = new Set<string>();

  constructor(currency: string, decimals: number) {
    this.currency = currency;
    this.decimals = decimals;
  }

  // ─── Writes ──────────────────────────────────────────────────────────

  /**
   * Credit an account with value from outside the system.
   */
  issue(accountId: string, amount: Money, reference: string, timestamp?: string): LedgerTransaction {
    const movement: ValueMovement = { from: ISSUER_ACCOUNT, to: accountId, amount };
    this._validateReference(reference);
    this._validateAccount(accountId);
    const units = this._validateAmount(movement);

    const tx: LedgerTransaction = {
      reference,
      kind: "issue",
      movements: [movement],
      timestamp: timestamp ?? new Date().toISOString(),
    };
    this._balances.set(accountId, this._units(accountId) + units);
    this._record(tx);
    return tx;
  }

  /**
   * Move value between accounts.
   *
   * Validation rules (fail-closed — all must pass before anything moves):
   * 1. At least one movement
   * 2. Reference is unused
   * 3. Account IDs are non-empty, distinct per movement, never the issuer
   * 4. Amounts are valid, positive, in the ledger currency
   * 5. No source account goes negative, counting the whole batch
   */
  transfer(
    movements: readonly ValueMovement[],
    reference: string,
    timestamp?: string,
  ): LedgerTransaction {
    if (movements.length === 0) {
      throw new LedgerError("EMPTY_TRANSACTION", "Cannot commit an empty set of movements");
    }
    this._validateReference(reference);

    const projected = new Map<string, bigint>();
    const projectedUnits = (accountId: string): bigint =>
      projected.get(accountId) ?? this._units(accountId);

    for (const movement of movements) {
      this._validateAccount(movement.from);
      this._validateAccount(movement.to);
      if (movement.from === movement.to) {
        throw new LedgerError("INVALID_ACCOUNT", `Cannot move value from "${movement.from}" to itself`);
      }
      const units = this._validateAmount(movement);

      const remaining = projectedUnits(movement.from) - units;
      if (remaining < 0n) {
        throw new LedgerError(
          "INSUFFICIENT_FUNDS",
          `Account "${movement.from}" cannot cover ${movement.amount.amount} ${this.currency}`,
        );
      }
      projected.set(movement.from, remaining);
      projected.set(movement.to, projectedUnits(movement.to) + units);
    }

    const tx: LedgerTransaction = {
      reference,
      kind: "transfer",
      movements: [...movements],
      timestamp: timestamp ?? new Date().toISOString(),
    };
    for (const [accountId, units] of projected) {
      this._balances.set(accountId, units);
    }
    this._record(tx);
    return tx;
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  balanceOf(accountId: string): Money {
    return toMoney(this._units(accountId), this.currency, this.decimals);
  }

  getBalances(): readonly AccountBalance[] {
    return [...this._balances.keys()].sort().map((accountId) => ({
      accountId,
      balance: this.balanceOf(accountId),
    }));
  }

  /**
   * Total value ever issued into the ledger. Always equals the sum of
   * all balances.
   */
  totalIssued(): Money {
    let total = 0n;
    for (const tx of this._transactions) {
      if (tx.kind === "issue") {
        for (const m of tx.movements) total += toUnits(m.amount);
      }
    }
    return toMoney(total, this.currency, this.decimals);
  }

  getTransactions(filter?: TransactionFilter): readonly LedgerTransaction[] {
    if (filter === undefined) {
      return [...this._transactions];
    }
    return this._transactions.filter((tx) => {
      if (filter.reference !== undefined && tx.reference !== filter.reference) return false;
      if (filter.kind !== undefined && tx.kind !== filter.kind) return false;
      if (
        filter.accountId !== undefined &&
        !tx.movements.some((m) => m.from === filter.accountId || m.to === filter.accountId)
      ) {
        return false;
      }
      return true;
    });
  }

  get transactionCount(): number {
    return this._transactions.length;
  }

  // ─── Snapshot ────────────────────────────────────────────────────────

  snapshot(): ValueLedgerSnapshot {
    return {
      version: 1,
      currency: this.currency,
      decimals: this.decimals,
      transactions: [...this._transactions],
      createdAt: new Date().toISOString(),
    };
  }

  /**
   * Restore a ledger by replaying every transaction with full validation.
   */
  static fromSnapshot(snapshot: ValueLedgerSnapshot): ValueLedger {
    const ledger = new ValueLedger(snapshot.currency, snapshot.decimals);
    for (const tx of snapshot.transactions) {
      if (tx.kind === "issue") {
        for (const m of tx.movements) {
          ledger.issue(m.to, m.amount, tx.reference, tx.timestamp);
        }
      } else {
        ledger.transfer(tx.movements, tx.reference, tx.timestamp);
      }
    }
    return ledger;
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private _units(accountId: string): bigint {
    return this._balances.get(accountId) ?? 0n;
  }

  private _record(tx: LedgerTransaction): void {
    this._transactions.push(tx);
    this._references.add(tx.reference);
  }

  private _validateReference(reference: string): void {
    if (this._references.has(reference)) {
      throw new LedgerError("DUPLICATE_REFERENCE", `Reference already committed: "${reference}"`);
    }
  }

  private _validateAccount(accountId: string): void {
    if (accountId.length === 0 || accountId === ISSUER_ACCOUNT) {
      throw new LedgerError("INVALID_ACCOUNT", `Invalid account ID: "${accountId}"`);
    }
  }

  private _validateAmount(movement: ValueMovement): bigint {
    validateMoney(movement.amount);
    assertSameCurrency(movement.amount, {
      amount: "0",
      currency: this.currency,
      decimals: this.decimals,
    });
    const units = toUnits(movement.amount);
    if (units <= 0n) {
      throw new LedgerError(
        "INVALID_AMOUNT",
        `Movement amounts must be positive, got "${movement.amount.amount}"`,
      );
    }
    return units;
  }
}
