/**
 * Shared fixtures for @keepsake/vault tests.
 */

import { ValueLedger, parseAmount, toMoney } from "@keepsake/ledger";
import { InMemoryEventStore } from "@keepsake/event-store";
import { ManualClock } from "../src/clock.js";
import { VaultError } from "../src/errors.js";
import { LedgerTransferBackend } from "../src/transfer.js";
import type { ValueTransfer, ValueTransferBackend } from "../src/transfer.js";
import { VaultLedger } from "../src/vault-ledger.js";

export const START = 1_700_000_000;
export const DAY = 86_400;

/**
 * Backend that can hold a transfer until released, or fail the next one.
 */
export class GatedBackend implements ValueTransferBackend {
  holdNext = false;
  failNext: Error | undefined;
  readonly calls: { readonly transfers: readonly ValueTransfer[]; readonly reference: string }[] = [];

  private readonly _inner: ValueTransferBackend;
  private _gates: (() => void)[] = [];

  constructor(inner: ValueTransferBackend) {
    this._inner = inner;
  }

  async transfer(transfers: readonly ValueTransfer[], reference: string): Promise<void> {
    this.calls.push({ transfers, reference });
    const failure = this.failNext;
    if (failure !== undefined) {
      this.failNext = undefined;
      throw failure;
    }
    if (this.holdNext) {
      this.holdNext = false;
      await new Promise<void>((resolve) => {
        this._gates.push(resolve);
      });
    }
    await this._inner.transfer(transfers, reference);
  }

  isReserved(identity: string): boolean {
    return this._inner.isReserved(identity);
  }

  get pending(): number {
    return this._gates.length;
  }

  releaseAll(): void {
    const gates = this._gates;
    this._gates = [];
    for (const open of gates) open();
  }
}

export interface Harness {
  readonly ledger: VaultLedger;
  readonly values: ValueLedger;
  readonly backend: GatedBackend;
  readonly escrow: LedgerTransferBackend;
  readonly events: InMemoryEventStore;
  readonly clock: ManualClock;
  /** Balance of an account in the value ledger, as a decimal string */
  balance(account: string): string;
}

export function createHarness(options?: {
  readonly decimals?: number;
  readonly funded?: Readonly<Record<string, string>>;
}): Harness {
  const decimals = options?.decimals ?? 0;
  const values = new ValueLedger("ETH", decimals);
  for (const [who, amount] of Object.entries(options?.funded ?? { alice: "1000", bob: "1000" })) {
    values.issue(who, toMoney(parseAmount(amount, decimals), "ETH", decimals), `seed-${who}`);
  }

  const escrow = new LedgerTransferBackend(values);
  const backend = new GatedBackend(escrow);
  const events = new InMemoryEventStore();
  const clock = new ManualClock(START);
  const ledger = new VaultLedger({ currency: "ETH", decimals, backend, events, clock });

  return {
    ledger,
    values,
    backend,
    escrow,
    events,
    clock,
    balance: (account) => values.balanceOf(account).amount,
  };
}

/**
 * Code of the VaultError a promise rejects with.
 */
export async function codeOf(promise: Promise<unknown>): Promise<string> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof VaultError) return err.code;
    throw err;
  }
  throw new Error("expected a VaultError");
}
