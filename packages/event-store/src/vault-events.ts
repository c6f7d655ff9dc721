/**
 * @keepsake/event-store — Vault fact definitions.
 *
 * The catalog of facts emitted by the vault ledger, one stream per vault
 * (`vault-<id>`).
 *
 * Naming convention: `vault.<action>`
 *
 * Amounts are decimal strings in the ledger currency; timestamps are
 * unix seconds.
 */

// =============================================================================
// Fact types
// =============================================================================

export const VAULT_EVENTS = {
  CREATED: "vault.created",
  MULTI_BENEFICIARY_CREATED: "vault.multi_beneficiary_created",
  TOKEN_MINTED: "vault.token_minted",
  CLAIMED: "vault.claimed",
  EMERGENCY_WITHDRAW: "vault.emergency_withdraw",
  EXTENDED: "vault.extended",
  BENEFICIARY_UPDATED: "vault.beneficiary_updated",
  HEARTBEAT_ENABLED: "vault.heartbeat_enabled",
  HEARTBEAT_RECORDED: "vault.heartbeat_recorded",
  FUNDED: "vault.funded",
  MESSAGE_UPDATED: "vault.message_updated",
} as const;

export type VaultEventType = (typeof VAULT_EVENTS)[keyof typeof VAULT_EVENTS];

const VAULT_EVENT_TYPES = new Set<string>(Object.values(VAULT_EVENTS));

export function isVaultEventType(type: string): type is VaultEventType {
  return VAULT_EVENT_TYPES.has(type);
}

/** Stream holding every fact about one vault. */
export function vaultStreamId(vaultId: number): string {
  return `vault-${String(vaultId)}`;
}

// =============================================================================
// Payloads
// =============================================================================
//
// Declared as type aliases so they are assignable to the store's
// `Record<string, unknown>` payload slot.

export type VaultCreatedPayload = {
  readonly vaultId: number;
  readonly owner: string;
  readonly beneficiary: string;
  readonly unlockTime: number;
  readonly amount: string;
  readonly currency: string;
};

export type MultiBeneficiaryVaultCreatedPayload = {
  readonly vaultId: number;
  readonly owner: string;
  readonly beneficiaries: readonly string[];
  readonly percentages: readonly number[];
  readonly unlockTime: number;
  readonly amount: string;
  readonly currency: string;
};

export type TokenMintedPayload = {
  readonly tokenId: number;
  readonly vaultId: number;
  /** `null` when minted on a multi-beneficiary vault */
  readonly beneficiary: string | null;
};

export type VaultClaimedPayload = {
  readonly vaultId: number;
  readonly beneficiary: string;
  readonly amount: string;
  readonly currency: string;
  /** Token presented, or `null` for a multi-beneficiary release */
  readonly tokenId: number | null;
};

export type EmergencyWithdrawPayload = {
  readonly vaultId: number;
  readonly owner: string;
  readonly amount: string;
  readonly currency: string;
};

export type VaultExtendedPayload = {
  readonly vaultId: number;
  readonly previousUnlockTime: number;
  readonly newUnlockTime: number;
};

export type BeneficiaryUpdatedPayload = {
  readonly vaultId: number;
  readonly previousBeneficiary: string;
  readonly newBeneficiary: string;
};

export type HeartbeatEnabledPayload = {
  readonly vaultId: number;
  readonly interval: number;
  readonly at: number;
};

export type HeartbeatRecordedPayload = {
  readonly vaultId: number;
  readonly at: number;
};

export type VaultFundedPayload = {
  readonly vaultId: number;
  readonly amount: string;
  readonly currency: string;
  readonly newBalance: string;
};

export type MessageUpdatedPayload = {
  readonly vaultId: number;
  readonly note: string;
};

/**
 * Payload shape for each fact type.
 */
export interface VaultEventPayloads {
  readonly "vault.created": VaultCreatedPayload;
  readonly "vault.multi_beneficiary_created": MultiBeneficiaryVaultCreatedPayload;
  readonly "vault.token_minted": TokenMintedPayload;
  readonly "vault.claimed": VaultClaimedPayload;
  readonly "vault.emergency_withdraw": EmergencyWithdrawPayload;
  readonly "vault.extended": VaultExtendedPayload;
  readonly "vault.beneficiary_updated": BeneficiaryUpdatedPayload;
  readonly "vault.heartbeat_enabled": HeartbeatEnabledPayload;
  readonly "vault.heartbeat_recorded": HeartbeatRecordedPayload;
  readonly "vault.funded": VaultFundedPayload;
  readonly "vault.message_updated": MessageUpdatedPayload;
}

/** A fact type paired with its payload. */
export type VaultFact = {
  [K in VaultEventType]: { readonly type: K; readonly payload: VaultEventPayloads[K] };
}[VaultEventType];
