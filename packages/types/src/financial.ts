/**
 * Financial Types
 *
 * Core financial primitives for deterministic accounting.
 *
 * Rules:
 * - All amounts are strings to avoid floating-point errors
 * - Currency is always explicit
 * - Keepsake moves exactly one fungible unit per deployment; the
 *   currency field exists so that mismatches are caught, not converted
 */

/**
 * Currency identifier (e.g., "ETH", "XRP").
 */
export type Currency = string;

/**
 * A precise monetary amount.
 * String representation to avoid IEEE 754 floating-point issues.
 */
export interface Money {
  /** String representation of the amount (e.g., "100.50", "1000000") */
  readonly amount: string;

  /** Currency symbol or identifier */
  readonly currency: Currency;

  /**
   * Number of decimal places for this currency.
   * ETH = 18 (wei), XRP = 6 (drops).
   */
  readonly decimals: number;
}

/**
 * Seconds since the Unix epoch. All lock and heartbeat deadlines use it.
 */
export type UnixSeconds = number;
