/**
 * Beneficiary shares — validation and payout arithmetic.
 *
 * Each share receives `floor(total × percentage / 100)` on scaled units.
 * The truncation remainder is not redistributed.
 */

import type { Identity, Money } from "@keepsake/types";
import { percentOf, toMoney, toUnits } from "@keepsake/ledger";
import { isIdentity } from "@keepsake/types";
import { VaultError } from "./errors.js";
import type { BeneficiaryShare, Payout, VaultId } from "./types.js";

export const TOTAL_PERCENTAGE = 100;

/**
 * Validate parallel beneficiary/percentage lists.
 *
 * Order: EMPTY_BENEFICIARY_LIST, ARITY_MISMATCH, INVALID_BENEFICIARY,
 * INVALID_PERCENTAGE, PERCENTAGE_SUM_INVALID. A beneficiary for which
 * `isReserved` holds is invalid.
 */
export function validateShares(
  beneficiaries: readonly unknown[],
  percentages: readonly unknown[],
  isReserved: (identity: Identity) => boolean = () => false,
): { readonly beneficiaries: readonly Identity[]; readonly percentages: readonly number[] } {
  if (beneficiaries.length === 0) {
    throw new VaultError("EMPTY_BENEFICIARY_LIST", "At least one beneficiary is required");
  }
  if (beneficiaries.length !== percentages.length) {
    throw new VaultError(
      "ARITY_MISMATCH",
      `Got ${String(beneficiaries.length)} beneficiaries but ${String(percentages.length)} percentages`,
    );
  }

  const ids: Identity[] = [];
  for (const [i, b] of beneficiaries.entries()) {
    if (!isIdentity(b) || isReserved(b)) {
      throw new VaultError("INVALID_BENEFICIARY", `Beneficiary at index ${String(i)} is not a valid identity`);
    }
    ids.push(b);
  }

  const pcts: number[] = [];
  for (const [i, p] of percentages.entries()) {
    if (typeof p !== "number" || !Number.isInteger(p) || p < 1 || p > TOTAL_PERCENTAGE) {
      throw new VaultError(
        "INVALID_PERCENTAGE",
        `Percentage at index ${String(i)} must be an integer in 1..${String(TOTAL_PERCENTAGE)}`,
      );
    }
    pcts.push(p);
  }

  const sum = pcts.reduce((a, b) => a + b, 0);
  if (sum !== TOTAL_PERCENTAGE) {
    throw new VaultError(
      "PERCENTAGE_SUM_INVALID",
      `Percentages sum to ${String(sum)}, expected ${String(TOTAL_PERCENTAGE)}`,
    );
  }

  return { beneficiaries: ids, percentages: pcts };
}

export function buildShares(
  vaultId: VaultId,
  beneficiaries: readonly Identity[],
  percentages: readonly number[],
): readonly BeneficiaryShare[] {
  return beneficiaries.map((beneficiary, i) => ({
    vaultId,
    beneficiary,
    percentage: percentages[i] ?? 0,
  }));
}

/**
 * Split a balance across shares, in share order.
 */
export function computePayouts(
  total: Money,
  shares: readonly BeneficiaryShare[],
): { readonly payouts: readonly Payout[]; readonly remainder: Money } {
  const payouts = shares.map((share) => ({
    beneficiary: share.beneficiary,
    amount: percentOf(total, share.percentage),
    percentage: share.percentage,
  }));
  const paid = payouts.reduce((acc, p) => acc + toUnits(p.amount), 0n);
  const remainder = toMoney(toUnits(total) - paid, total.currency, total.decimals);
  return { payouts, remainder };
}
