/**
 * Type barrel — re-exports all public types from @keepsake/node.
 */

// DTOs
export {
  IdentitySchema,
  AmountSchema,
  UnixSecondsSchema,
  IdParamSchema,
  PaginationQuerySchema,
  CreateVaultSchema,
  CreateMultiBeneficiaryVaultSchema,
  AddFundsSchema,
  ExtendVaultSchema,
  UpdateBeneficiarySchema,
  SetMessageSchema,
  ClaimVaultSchema,
  EnableHeartbeatSchema,
  CreditAccountSchema,
  ListEventsQuerySchema,
  ListStreamEventsQuerySchema,
} from "./dto.js";
export type {
  CreateVaultDto,
  CreateMultiBeneficiaryVaultDto,
  AddFundsDto,
  ExtendVaultDto,
  UpdateBeneficiaryDto,
  SetMessageDto,
  ClaimVaultDto,
  EnableHeartbeatDto,
  CreditAccountDto,
  ListEventsQuery,
  ListStreamEventsQuery,
} from "./dto.js";

// Error
export { createErrorEnvelope, ApiError } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// Pagination
export { encodeCursor, decodeCursor, paginate } from "./pagination.js";
export type {
  PaginationQuery,
  PaginationMeta,
  PaginatedResponse,
} from "./pagination.js";

// Auth
export { ROLE_PERMISSIONS, hasPermission, isRole } from "./auth.js";
export type { Role, Permission, AuthContext, ApiKeyRecord } from "./auth.js";

// App env
export type { AppEnv } from "./api-contract.js";
