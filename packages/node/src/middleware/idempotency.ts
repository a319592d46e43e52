/**
 * Idempotency middleware.
 *
 * Replays the stored response for a repeated POST carrying the same
 * Idempotency-Key from the same account, so a retried claim or create
 * does not run twice. Keys are scoped per account: two callers may use
 * the same key independently. Only successful responses are stored.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

// =============================================================================
// Store
// =============================================================================

export interface CachedResponse {
  readonly status: number;
  readonly body: string;
  readonly contentType: string | null;
  readonly cachedAt: number;
}

export interface IdempotencyStore {
  get(key: string): CachedResponse | undefined;
  set(key: string, response: CachedResponse): void;
}

export class InMemoryIdempotencyStore implements IdempotencyStore {
  private readonly _cache = new Map<string, CachedResponse>();

  constructor(
    private readonly _ttlMs: number = 86400000,
    private readonly _now: () => number = Date.now,
  ) {}

  get(key: string): CachedResponse | undefined {
    const entry = this._cache.get(key);
    if (entry === undefined) {
      return undefined;
    }
    if (this._now() - entry.cachedAt > this._ttlMs) {
      this._cache.delete(key);
      return undefined;
    }
    return entry;
  }

  set(key: string, response: CachedResponse): void {
    this._cache.set(key, response);
  }

  get size(): number {
    return this._cache.size;
  }
}

// =============================================================================
// Middleware
// =============================================================================

export const IDEMPOTENCY_HEADER = "Idempotency-Key";
export const REPLAY_HEADER = "X-Idempotent-Replay";

/** Must run after the auth middleware. */
export function idempotencyMiddleware(
  store: IdempotencyStore,
  now: () => number = Date.now,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    if (c.req.method !== "POST") {
      return next();
    }

    const idempotencyKey = c.req.header(IDEMPOTENCY_HEADER);
    if (idempotencyKey === undefined || idempotencyKey === "") {
      return next();
    }
    const scopedKey = `${c.get("auth").account}\u0000${c.req.path}\u0000${idempotencyKey}`;

    const cached = store.get(scopedKey);
    if (cached !== undefined) {
      return new Response(cached.body, {
        status: cached.status,
        headers: {
          ...(cached.contentType !== null ? { "Content-Type": cached.contentType } : {}),
          [REPLAY_HEADER]: "true",
        },
      });
    }

    await next();

    if (c.res.status < 400) {
      const response = c.res.clone();
      store.set(scopedKey, {
        status: response.status,
        body: await response.text(),
        contentType: response.headers.get("Content-Type"),
        cachedAt: now(),
      });
    }
  };
}
