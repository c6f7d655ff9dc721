/**
 * State file — vault and value ledger snapshots on disk.
 *
 * The file is one JSON document, rewritten whole on every save through
 * a temporary file and a rename. Loading validates the document with
 * Zod before anything is restored.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { z } from "zod";
import type { ValueLedgerSnapshot } from "@keepsake/ledger";
import type { VaultLedgerSnapshot } from "@keepsake/vault";

// =============================================================================
// Schema
// =============================================================================

const MoneySchema = z.object({
  amount: z.string(),
  currency: z.string(),
  decimals: z.number().int().min(0),
});

const VaultSchema = z.object({
  id: z.number().int().min(1),
  owner: z.string(),
  beneficiary: z.string().nullable(),
  balance: MoneySchema,
  unlockTime: z.number().int(),
  claimed: z.boolean(),
  heartbeatEnabled: z.boolean(),
  heartbeatInterval: z.number().int().min(0),
  lastHeartbeatAt: z.number().int(),
  note: z.string(),
  createdAt: z.number().int(),
});

const TokenSchema = z.object({
  id: z.number().int().min(1),
  vaultId: z.number().int().min(1),
  beneficiary: z.string().nullable(),
  active: z.boolean(),
  mintedAt: z.number().int(),
});

const ShareSchema = z.object({
  vaultId: z.number().int().min(1),
  beneficiary: z.string(),
  percentage: z.number().int().min(1).max(100),
});

const IndexSchema = z.array(z.tuple([z.string(), z.array(z.number().int().min(1))]));

const VaultLedgerSnapshotSchema = z.object({
  version: z.literal(1),
  currency: z.string(),
  decimals: z.number().int().min(0),
  state: z.object({
    vaults: z.array(VaultSchema),
    tokens: z.array(TokenSchema),
    shares: z.array(z.tuple([z.number().int().min(1), z.array(ShareSchema)])),
    ownerIndex: IndexSchema,
    beneficiaryIndex: IndexSchema,
    nextVaultId: z.number().int().min(1),
    nextTokenId: z.number().int().min(1),
    unallocatedUnits: z.string().regex(/^\d+$/),
  }),
  savedAt: z.string(),
});

const ValueLedgerSnapshotSchema = z.object({
  version: z.literal(1),
  currency: z.string(),
  decimals: z.number().int().min(0),
  transactions: z.array(
    z.object({
      reference: z.string(),
      kind: z.enum(["issue", "transfer"]),
      movements: z.array(z.object({ from: z.string(), to: z.string(), amount: MoneySchema })),
      timestamp: z.string(),
    }),
  ),
  createdAt: z.string(),
});

export const StateFileSchema = z.object({
  version: z.literal(1),
  vaults: VaultLedgerSnapshotSchema,
  values: ValueLedgerSnapshotSchema,
});

export interface SavedState {
  readonly version: 1;
  readonly vaults: VaultLedgerSnapshot;
  readonly values: ValueLedgerSnapshot;
}

// =============================================================================
// I/O
// =============================================================================

/**
 * Read and validate a state file.
 *
 * @returns undefined when the file does not exist
 * @throws {z.ZodError} if the document does not match the schema
 * @throws {SyntaxError} if the file is not JSON
 */
export function readStateFile(path: string): SavedState | undefined {
  if (!existsSync(path)) {
    return undefined;
  }
  const parsed: unknown = JSON.parse(readFileSync(path, "utf-8"));
  return StateFileSchema.parse(parsed);
}

export function writeStateFile(path: string, state: SavedState): void {
  mkdirSync(dirname(path), { recursive: true });
  const tmp = `${path}.tmp`;
  writeFileSync(tmp, JSON.stringify(state, null, 2) + "\n", "utf-8");
  renameSync(tmp, path);
}
