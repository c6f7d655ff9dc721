/**
 * Value transfer backend — where escrowed value actually moves.
 *
 * The ledger only calls the backend after every precondition holds,
 * and commits its own state only after the backend resolves.
 */

import type { Identity, Money } from "@keepsake/types";
import { ISSUER_ACCOUNT } from "@keepsake/ledger";
import type { ValueLedger, ValueMovement } from "@keepsake/ledger";

/**
 * - deposit: party → escrow
 * - release: escrow → party
 */
export type TransferDirection = "deposit" | "release";

export interface ValueTransfer {
  readonly direction: TransferDirection;
  readonly party: Identity;
  readonly amount: Money;
}

export interface ValueTransferBackend {
  /**
   * Move every transfer or none of them. Rejects on failure.
   *
   * @param reference Unique per call; backends may use it for deduplication
   */
  transfer(transfers: readonly ValueTransfer[], reference: string): Promise<void>;

  /** Accounts the backend keeps for itself; they can never receive a release. */
  isReserved(identity: Identity): boolean;
}

export const DEFAULT_ESCROW_ACCOUNT = "escrow";

/**
 * Backend over the in-process ValueLedger, holding escrow in one account.
 */
export class LedgerTransferBackend implements ValueTransferBackend {
  readonly escrowAccount: string;
  private readonly _ledger: ValueLedger;

  constructor(ledger: ValueLedger, escrowAccount: string = DEFAULT_ESCROW_ACCOUNT) {
    this._ledger = ledger;
    this.escrowAccount = escrowAccount;
  }

  async transfer(transfers: readonly ValueTransfer[], reference: string): Promise<void> {
    const movements: ValueMovement[] = transfers.map((t) =>
      t.direction === "deposit"
        ? { from: t.party, to: this.escrowAccount, amount: t.amount }
        : { from: this.escrowAccount, to: t.party, amount: t.amount },
    );
    this._ledger.transfer(movements, reference);
  }

  isReserved(identity: Identity): boolean {
    return identity === this.escrowAccount || identity === ISSUER_ACCOUNT;
  }

  escrowBalance(): Money {
    return this._ledger.balanceOf(this.escrowAccount);
  }
}
