/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Maps domain errors (VaultError, LedgerError, EventStoreError) and
 * request validation failures to HTTP status codes.
 */

import type { Context } from "hono";
import { HTTPException } from "hono/http-exception";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { ZodError } from "zod";
import { VaultError } from "@keepsake/vault";
import type { VaultErrorCategory, VaultErrorCode } from "@keepsake/vault";
import { LedgerError } from "@keepsake/ledger";
import type { LedgerErrorCode } from "@keepsake/ledger";
import { EventStoreError } from "@keepsake/event-store";
import type { EventStoreErrorCode } from "@keepsake/event-store";
import { ApiError, createErrorEnvelope } from "../types/error.js";
import type { ErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

const VAULT_CATEGORY_STATUS: Record<VaultErrorCategory, ContentfulStatusCode> = {
  validation: 400,
  authorization: 403,
  state: 409,
  transfer: 502,
};

/** State errors that mean "no such record" rather than a conflict */
const VAULT_NOT_FOUND_CODES: ReadonlySet<VaultErrorCode> = new Set([
  "VAULT_NOT_FOUND",
  "TOKEN_NOT_FOUND",
]);

const LEDGER_STATUS: Record<LedgerErrorCode, ContentfulStatusCode> = {
  INVALID_AMOUNT: 400,
  INVALID_MONEY: 400,
  INVALID_ACCOUNT: 400,
  CURRENCY_MISMATCH: 400,
  EMPTY_TRANSACTION: 400,
  INSUFFICIENT_FUNDS: 409,
  DUPLICATE_REFERENCE: 409,
};

const EVENT_STORE_STATUS: Record<EventStoreErrorCode, ContentfulStatusCode> = {
  CONCURRENCY_CONFLICT: 409,
  INVALID_STREAM_ID: 400,
  EMPTY_APPEND: 400,
  INVALID_VERSION: 400,
};

interface MappedError {
  readonly status: ContentfulStatusCode;
  readonly envelope: ErrorEnvelope;
}

function mapError(err: Error): MappedError {
  if (err instanceof VaultError) {
    const status = VAULT_NOT_FOUND_CODES.has(err.code)
      ? 404
      : VAULT_CATEGORY_STATUS[err.category];
    return { status, envelope: createErrorEnvelope(err.code, err.message) };
  }
  if (err instanceof LedgerError) {
    return {
      status: LEDGER_STATUS[err.code],
      envelope: createErrorEnvelope(err.code, err.message),
    };
  }
  if (err instanceof EventStoreError) {
    return {
      status: EVENT_STORE_STATUS[err.code],
      envelope: createErrorEnvelope(err.code, err.message),
    };
  }
  if (err instanceof ApiError) {
    return {
      status: err.status,
      envelope: createErrorEnvelope(err.code, err.message, err.details),
    };
  }
  if (err instanceof ZodError) {
    return {
      status: 400,
      envelope: createErrorEnvelope("VALIDATION_ERROR", "Request validation failed", {
        issues: formatZodIssues(err),
      }),
    };
  }
  // Don't leak internal details
  return {
    status: 500,
    envelope: createErrorEnvelope("INTERNAL_ERROR", "Internal server error"),
  };
}

export function formatZodIssues(
  error: ZodError,
): readonly { path: string; message: string }[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Create the global error handler, registered as Hono's onError handler.
 *
 * @param onUnexpected - Receives errors that map to 500
 */
export function createErrorHandler(
  onUnexpected?: (err: Error, c: Context) => void,
): (err: Error, c: Context) => Response {
  return (err, c) => {
    if (err instanceof HTTPException) {
      return err.getResponse();
    }
    const { status, envelope } = mapError(err);
    if (status === 500 && onUnexpected !== undefined) {
      onUnexpected(err, c);
    }
    return c.json(envelope, status);
  };
}
