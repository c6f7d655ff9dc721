/**
 * Request DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 * Amounts travel as decimal strings in the configured currency;
 * times are unix seconds.
 */

import { z } from "zod";
import { MAX_IDENTITY_LENGTH } from "@keepsake/types";

// =============================================================================
// Shared Schemas
// =============================================================================

export const IdentitySchema = z.string().min(1).max(MAX_IDENTITY_LENGTH);

/** Decimal amount, e.g. "1.5". Range and precision are checked by the domain. */
export const AmountSchema = z.string().min(1).max(96);

export const UnixSecondsSchema = z.number().int().nonnegative();

/** Numeric path parameter (vault and token ids) */
export const IdParamSchema = z.coerce.number().int().min(1);

export const PaginationQuerySchema = z.object({
  cursor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

// =============================================================================
// Vault DTOs
// =============================================================================

export const CreateVaultSchema = z.object({
  beneficiary: IdentitySchema,
  unlockTime: UnixSecondsSchema,
  amount: AmountSchema,
});

export type CreateVaultDto = z.infer<typeof CreateVaultSchema>;

export const CreateMultiBeneficiaryVaultSchema = z.object({
  beneficiaries: z.array(IdentitySchema),
  percentages: z.array(z.number().int()),
  unlockTime: UnixSecondsSchema,
  amount: AmountSchema,
});

export type CreateMultiBeneficiaryVaultDto = z.infer<typeof CreateMultiBeneficiaryVaultSchema>;

export const AddFundsSchema = z.object({
  amount: AmountSchema,
});

export type AddFundsDto = z.infer<typeof AddFundsSchema>;

export const ExtendVaultSchema = z.object({
  unlockTime: UnixSecondsSchema,
});

export type ExtendVaultDto = z.infer<typeof ExtendVaultSchema>;

export const UpdateBeneficiarySchema = z.object({
  beneficiary: IdentitySchema,
});

export type UpdateBeneficiaryDto = z.infer<typeof UpdateBeneficiarySchema>;

export const SetMessageSchema = z.object({
  note: z.string().max(4096),
});

export type SetMessageDto = z.infer<typeof SetMessageSchema>;

export const ClaimVaultSchema = z.object({
  tokenId: z.number().int().min(1),
});

export type ClaimVaultDto = z.infer<typeof ClaimVaultSchema>;

export const EnableHeartbeatSchema = z.object({
  interval: z.number().int().positive(),
});

export type EnableHeartbeatDto = z.infer<typeof EnableHeartbeatSchema>;

// =============================================================================
// Account DTOs
// =============================================================================

export const CreditAccountSchema = z.object({
  amount: AmountSchema,
});

export type CreditAccountDto = z.infer<typeof CreditAccountSchema>;

// =============================================================================
// Event DTOs
// =============================================================================

export const ListEventsQuerySchema = PaginationQuerySchema.extend({
  afterPosition: z.coerce.number().int().min(0).optional(),
});

export type ListEventsQuery = z.infer<typeof ListEventsQuerySchema>;

export const ListStreamEventsQuerySchema = PaginationQuerySchema.extend({
  afterVersion: z.coerce.number().int().min(0).optional(),
});

export type ListStreamEventsQuery = z.infer<typeof ListStreamEventsQuerySchema>;
