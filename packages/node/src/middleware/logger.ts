/**
 * Request logging middleware.
 *
 * Reports one entry per request through the supplied sink; main.ts
 * forwards entries to pino.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { AuthContext } from "../types/auth.js";

export interface RequestLogEntry {
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
  readonly requestId: string;
  /** Empty for anonymous or rejected callers */
  readonly caller: string;
}

export function loggerMiddleware(
  log: (entry: RequestLogEntry) => void,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = Date.now();

    await next();

    // Unset on routes outside /api
    const auth: AuthContext | undefined = c.get("auth");
    log({
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Date.now() - start,
      requestId: c.get("requestId"),
      caller: auth === undefined ? "" : auth.identity,
    });
  };
}
