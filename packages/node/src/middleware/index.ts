/**
 * Middleware barrel — re-exports all middleware.
 */

export { createErrorHandler, formatZodIssues } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { parseBody } from "./validate.js";
export {
  idempotencyMiddleware,
  InMemoryIdempotencyStore,
  IDEMPOTENCY_HEADER,
  IDEMPOTENT_REPLAY_HEADER,
} from "./idempotency.js";
export type { IdempotencyStore, CachedResponse } from "./idempotency.js";
export {
  authMiddleware,
  callerHeaderMiddleware,
  requireCallerForWrites,
  requirePermission,
  API_KEY_HEADER,
  CALLER_ID_HEADER,
} from "./auth.js";
export type { AuthConfig } from "./auth.js";
