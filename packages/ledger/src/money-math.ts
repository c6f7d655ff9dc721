/**
 * @keepsake/ledger — Deterministic monetary arithmetic.
 *
 * Money travels as decimal strings and is computed on as bigint units
 * (`amount × 10^decimals`). Floats never touch an amount, and every
 * binary operation requires matching currency and decimals.
 */

import type { Money } from "@keepsake/types";
import { LedgerError } from "./types.js";

const AMOUNT_PATTERN = /^(-?)(\d+)(?:\.(\d+))?$/;

// ─── Scaling ─────────────────────────────────────────────────────────────

/**
 * Decimal string → scaled units. `"100.50"` at 2 decimals is `10050n`.
 * More fractional digits than `decimals` is an error, never a rounding.
 */
export function parseAmount(amount: string, decimals: number): bigint {
  const match = AMOUNT_PATTERN.exec(amount.trim());
  if (match === null) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount format: "${amount}"`);
  }
  const [, sign = "", whole = "0", fraction = ""] = match;

  if (fraction.length > decimals) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount "${amount.trim()}" has ${String(fraction.length)} decimal places, but currency allows ${String(decimals)}`,
    );
  }

  const units = BigInt(whole) * 10n ** BigInt(decimals) + BigInt(fraction.padEnd(decimals, "0") || "0");
  return sign === "-" ? -units : units;
}

/** Scaled units → decimal string, always with exactly `decimals` places. */
export function formatAmount(scaled: bigint, decimals: number): string {
  const magnitude = scaled < 0n ? -scaled : scaled;
  const base = 10n ** BigInt(decimals);
  const whole = (magnitude / base).toString();
  const body =
    decimals === 0
      ? whole
      : `${whole}.${(magnitude % base).toString().padStart(decimals, "0")}`;
  return scaled < 0n ? `-${body}` : body;
}

export function toMoney(scaled: bigint, currency: string, decimals: number): Money {
  return { amount: formatAmount(scaled, decimals), currency, decimals };
}

export function toUnits(money: Money): bigint {
  return parseAmount(money.amount, money.decimals);
}

// ─── Validation ──────────────────────────────────────────────────────────

/** @throws LedgerError `INVALID_MONEY` or `INVALID_AMOUNT` */
export function validateMoney(money: Money): void {
  if (money.currency.trim().length === 0) {
    throw new LedgerError("INVALID_MONEY", "Money currency must be a non-empty string");
  }
  if (!Number.isInteger(money.decimals) || money.decimals < 0) {
    throw new LedgerError(
      "INVALID_MONEY",
      `Money decimals must be a non-negative integer, got: ${String(money.decimals)}`,
    );
  }
  parseAmount(money.amount, money.decimals);
}

export function assertSameCurrency(a: Money, b: Money): void {
  if (a.currency !== b.currency) {
    throw new LedgerError(
      "CURRENCY_MISMATCH",
      `Cannot operate on different currencies: "${a.currency}" vs "${b.currency}"`,
    );
  }
  if (a.decimals !== b.decimals) {
    throw new LedgerError(
      "CURRENCY_MISMATCH",
      `Decimal mismatch for currency "${a.currency}": ${String(a.decimals)} vs ${String(b.decimals)}`,
    );
  }
}

// ─── Arithmetic ──────────────────────────────────────────────────────────

function combine(a: Money, b: Money, op: (x: bigint, y: bigint) => bigint): Money {
  assertSameCurrency(a, b);
  return toMoney(op(toUnits(a), toUnits(b)), a.currency, a.decimals);
}

export function addMoney(a: Money, b: Money): Money {
  return combine(a, b, (x, y) => x + y);
}

export function subtractMoney(a: Money, b: Money): Money {
  return combine(a, b, (x, y) => x - y);
}

/**
 * `floor(money × percentage / 100)` in units. The truncated remainder
 * is the caller's to account for.
 */
export function percentOf(money: Money, percentage: number): Money {
  if (!Number.isInteger(percentage) || percentage < 0 || percentage > 100) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Percentage must be an integer in 0..100, got ${String(percentage)}`,
    );
  }
  return toMoney((toUnits(money) * BigInt(percentage)) / 100n, money.currency, money.decimals);
}

export function isZero(money: Money): boolean {
  return toUnits(money) === 0n;
}

export function isPositive(money: Money): boolean {
  return toUnits(money) > 0n;
}

export function zeroMoney(currency: string, decimals: number): Money {
  return toMoney(0n, currency, decimals);
}

export function compareMoney(a: Money, b: Money): -1 | 0 | 1 {
  assertSameCurrency(a, b);
  const diff = toUnits(a) - toUnits(b);
  return diff === 0n ? 0 : diff < 0n ? -1 : 1;
}
