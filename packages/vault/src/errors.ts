/**
 * Vault errors.
 *
 * Every precondition failure is a distinct code. Codes are grouped into
 * categories that the transport maps to its own status vocabulary.
 */

export type VaultErrorCode =
  // validation
  | "INVALID_AMOUNT"
  | "INVALID_BENEFICIARY"
  | "INVALID_UNLOCK_TIME"
  | "ARITY_MISMATCH"
  | "EMPTY_BENEFICIARY_LIST"
  | "PERCENTAGE_SUM_INVALID"
  | "INVALID_PERCENTAGE"
  | "TIME_NOT_LATER"
  | "INVALID_INTERVAL"
  // authorization
  | "NOT_OWNER"
  | "NOT_BENEFICIARY"
  | "TOKEN_OWNER_MISMATCH"
  // state
  | "VAULT_NOT_FOUND"
  | "TOKEN_NOT_FOUND"
  | "ALREADY_CLAIMED"
  | "STILL_LOCKED"
  | "VAULT_UNLOCKED"
  | "TOKEN_INACTIVE"
  | "TOKEN_VAULT_MISMATCH"
  | "HEARTBEAT_NOT_ENABLED"
  | "NOT_MULTI_BENEFICIARY_VAULT"
  | "CANNOT_UPDATE_MULTI_BENEFICIARY_VAULT"
  // transfer
  | "VALUE_TRANSFER_FAILED";

export type VaultErrorCategory = "validation" | "authorization" | "state" | "transfer";

const CATEGORIES: Readonly<Record<VaultErrorCode, VaultErrorCategory>> = {
  INVALID_AMOUNT: "validation",
  INVALID_BENEFICIARY: "validation",
  INVALID_UNLOCK_TIME: "validation",
  ARITY_MISMATCH: "validation",
  EMPTY_BENEFICIARY_LIST: "validation",
  PERCENTAGE_SUM_INVALID: "validation",
  INVALID_PERCENTAGE: "validation",
  TIME_NOT_LATER: "validation",
  INVALID_INTERVAL: "validation",
  NOT_OWNER: "authorization",
  NOT_BENEFICIARY: "authorization",
  TOKEN_OWNER_MISMATCH: "authorization",
  VAULT_NOT_FOUND: "state",
  TOKEN_NOT_FOUND: "state",
  ALREADY_CLAIMED: "state",
  STILL_LOCKED: "state",
  VAULT_UNLOCKED: "state",
  TOKEN_INACTIVE: "state",
  TOKEN_VAULT_MISMATCH: "state",
  HEARTBEAT_NOT_ENABLED: "state",
  NOT_MULTI_BENEFICIARY_VAULT: "state",
  CANNOT_UPDATE_MULTI_BENEFICIARY_VAULT: "state",
  VALUE_TRANSFER_FAILED: "transfer",
};

export function categoryOf(code: VaultErrorCode): VaultErrorCategory {
  return CATEGORIES[code];
}

export class VaultError extends Error {
  public readonly code: VaultErrorCode;
  public readonly category: VaultErrorCategory;

  constructor(code: VaultErrorCode, message: string, options?: { readonly cause?: unknown }) {
    super(message, options);
    this.name = "VaultError";
    this.code = code;
    this.category = categoryOf(code);
  }
}
