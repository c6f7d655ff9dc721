/**
 * Idempotency middleware.
 *
 * A POST carrying `Idempotency-Key` is executed once per caller, route and
 * key. Repeats within the TTL get the stored response back, marked with
 * `X-Idempotent-Replay: true`. Failed responses (status >= 400) are not
 * stored, so a client may retry them under the same key.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export const IDEMPOTENCY_HEADER = "Idempotency-Key";
export const IDEMPOTENT_REPLAY_HEADER = "X-Idempotent-Replay";

// =============================================================================
// Store
// =============================================================================

export interface CachedResponse {
  readonly status: number;
  readonly body: string;
  readonly headers: Readonly<Record<string, string>>;
}

export interface IdempotencyStore {
  get(key: string): CachedResponse | undefined;
  /** Store `response` under `key` until the store's TTL runs out. */
  set(key: string, response: CachedResponse): void;
}

interface Entry {
  readonly response: CachedResponse;
  readonly expiresAt: number;
}

export class InMemoryIdempotencyStore implements IdempotencyStore {
  private readonly _entries = new Map<string, Entry>();

  constructor(
    private readonly _ttlMs: number = 86_400_000,
    private readonly _now: () => number = Date.now,
  ) {}

  get(key: string): CachedResponse | undefined {
    const entry = this._entries.get(key);
    if (entry === undefined) {
      return undefined;
    }
    if (this._now() > entry.expiresAt) {
      this._entries.delete(key);
      return undefined;
    }
    return entry.response;
  }

  set(key: string, response: CachedResponse): void {
    this._entries.set(key, { response, expiresAt: this._now() + this._ttlMs });
  }

  get size(): number {
    return this._entries.size;
  }

  clear(): void {
    this._entries.clear();
  }
}

// =============================================================================
// Middleware
// =============================================================================

async function capture(res: Response): Promise<CachedResponse> {
  const copy = res.clone();
  return {
    status: copy.status,
    body: await copy.text(),
    headers: Object.fromEntries(copy.headers.entries()),
  };
}

/** Reads `auth`, so it is mounted after the auth or caller middleware. */
export function idempotencyMiddleware(
  store: IdempotencyStore,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const key = c.req.header(IDEMPOTENCY_HEADER);
    if (c.req.method !== "POST" || key === undefined) {
      return next();
    }

    const scope = [c.get("auth").identity, c.req.path, key].join("\u0000");
    const hit = store.get(scope);
    if (hit !== undefined) {
      const headers = new Headers(hit.headers);
      headers.set(IDEMPOTENT_REPLAY_HEADER, "true");
      return new Response(hit.body, { status: hit.status, headers });
    }

    await next();

    if (c.res.status < 400) {
      store.set(scope, await capture(c.res));
    }
  };
}
