/**
 * @keepsake/ledger — In-process value ledger.
 *
 * Holds the external balances of identities and the escrow account
 * that backs every vault. All monetary arithmetic uses bigint.
 *
 * Design rules:
 * - All types are readonly
 * - Transactions are immutable once committed
 * - Fail-closed: invalid movements throw, never silently succeed
 * - Zero runtime dependencies beyond @keepsake/types
 */

export { ValueLedger, ISSUER_ACCOUNT } from "./value-ledger.js";

export {
  parseAmount,
  formatAmount,
  toMoney,
  toUnits,
  validateMoney,
  assertSameCurrency,
  addMoney,
  subtractMoney,
  percentOf,
  isZero,
  isPositive,
  zeroMoney,
  compareMoney,
} from "./money-math.js";

export type {
  ValueMovement,
  TransactionKind,
  LedgerTransaction,
  AccountBalance,
  TransactionFilter,
  ValueLedgerSnapshot,
  LedgerErrorCode,
} from "./types.js";

export { LedgerError } from "./types.js";
