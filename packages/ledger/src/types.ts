/**
 * @keepsake/ledger — Types for the value ledger.
 *
 * Rules:
 * - All types are readonly
 * - Recorded transactions are never modified
 * - Fail-closed: invalid movements throw, never silently succeed
 */

import type { Money } from "@keepsake/types";

// ─── Movements ───────────────────────────────────────────────────────────

/**
 * A single movement of value between two accounts.
 */
export interface ValueMovement {
  readonly from: string;
  readonly to: string;
  readonly amount: Money;
}

/** How a transaction entered the ledger. */
export type TransactionKind = "issue" | "transfer";

/**
 * A committed, all-or-nothing group of movements.
 * Issuance transactions have a single movement whose `from` is ISSUER_ACCOUNT.
 */
export interface LedgerTransaction {
  readonly reference: string;
  readonly kind: TransactionKind;
  readonly movements: readonly ValueMovement[];
  readonly timestamp: string;
}

/**
 * Balance of one account.
 */
export interface AccountBalance {
  readonly accountId: string;
  readonly balance: Money;
}

/**
 * Filter criteria for querying transactions.
 */
export interface TransactionFilter {
  readonly accountId?: string | undefined;
  readonly reference?: string | undefined;
  readonly kind?: TransactionKind | undefined;
}

// ─── Snapshot ────────────────────────────────────────────────────────────

/**
 * Serializable snapshot of the value ledger.
 * Balances are derived by replaying transactions.
 */
export interface ValueLedgerSnapshot {
  readonly version: 1;
  readonly currency: string;
  readonly decimals: number;
  readonly transactions: readonly LedgerTransaction[];
  readonly createdAt: string;
}

// ─── Errors ──────────────────────────────────────────────────────────────

export type LedgerErrorCode =
  | "INVALID_AMOUNT"
  | "INVALID_MONEY"
  | "INVALID_ACCOUNT"
  | "CURRENCY_MISMATCH"
  | "INSUFFICIENT_FUNDS"
  | "EMPTY_TRANSACTION"
  | "DUPLICATE_REFERENCE";

/**
 * Structured error from the ledger engine.
 * Always thrown — never returns error codes silently.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}
