/**
 * Caller resolution middleware.
 *
 * Secured mode: the X-Api-Key header is looked up in the configured key
 * registry and the caller acts as the key's identity and role.
 *
 * Unsecured mode (development, tests): the X-Caller-Id header names the
 * caller, who acts with the admin role. Without the header the request
 * is anonymous and may only read.
 *
 * On success, sets `c.set("auth", authContext)`.
 */

import type { Context, MiddlewareHandler } from "hono";
import { isIdentity } from "@keepsake/types";
import type { AppEnv } from "../types/api-contract.js";
import type { ApiKeyRecord, Permission } from "../types/auth.js";
import { hasPermission } from "../types/auth.js";
import { createErrorEnvelope } from "../types/error.js";
import type { ApiErrorCode } from "../types/error.js";

export const API_KEY_HEADER = "X-Api-Key";
export const CALLER_ID_HEADER = "X-Caller-Id";

const READ_METHODS = new Set(["GET", "HEAD"]);

function deny(
  c: Context<AppEnv>,
  status: 400 | 401 | 403,
  code: ApiErrorCode,
  message: string,
): Response {
  return c.json(createErrorEnvelope(code, message), status);
}

// =============================================================================
// Secured Mode
// =============================================================================

export interface AuthConfig {
  readonly apiKeys: ReadonlyMap<string, ApiKeyRecord>;
}

export function authMiddleware(config: AuthConfig): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const presented = c.req.header(API_KEY_HEADER);
    if (presented === undefined) {
      return deny(c, 401, "UNAUTHORIZED", "Authentication required");
    }
    const record = config.apiKeys.get(presented);
    if (record === undefined) {
      return deny(c, 401, "UNAUTHORIZED", "Invalid API key");
    }
    c.set("auth", { type: "api-key", identity: record.identity, role: record.role });
    return next();
  };
}

// =============================================================================
// Unsecured Mode
// =============================================================================

export function callerHeaderMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const claimed = c.req.header(CALLER_ID_HEADER);
    if (claimed !== undefined && !isIdentity(claimed)) {
      return deny(c, 400, "VALIDATION_ERROR", `Invalid ${CALLER_ID_HEADER} header`);
    }
    c.set(
      "auth",
      claimed === undefined
        ? { type: "anonymous", identity: "", role: "member" }
        : { type: "caller-header", identity: claimed, role: "admin" },
    );
    return next();
  };
}

// =============================================================================
// Guards
// =============================================================================

/** Anonymous callers may read but not mutate. */
export function requireCallerForWrites(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    if (!READ_METHODS.has(c.req.method) && c.get("auth").type === "anonymous") {
      return deny(c, 401, "UNAUTHORIZED", `Caller identity required (${CALLER_ID_HEADER})`);
    }
    return next();
  };
}

export function requirePermission(
  permission: Permission,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const { role } = c.get("auth");
    if (!hasPermission(role, permission)) {
      return deny(c, 403, "FORBIDDEN", `Role '${role}' lacks '${permission}' permission`);
    }
    return next();
  };
}
