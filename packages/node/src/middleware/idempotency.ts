/**
 * Idempotency middleware.
 *
 * A POST carrying an `Idempotency-Key` header is executed once per
 * calling account and key. A repeat of the same request (method, path
 * and body) within the TTL gets the stored response back with
 * `X-Idempotent-Replay: true`. The same key on a different request is
 * rejected with 422, and a repeat that arrives while the first is still
 * running is rejected with 409. Failed responses are not stored, so the
 * key can be retried.
 */

import { createHash } from "node:crypto";
import type { Context, MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";
import { ACCOUNT_HEADER } from "./caller.js";

export const IDEMPOTENCY_HEADER = "Idempotency-Key";
export const REPLAY_HEADER = "X-Idempotent-Replay";

export interface CachedResponse {
  /** sha256 of method, path and body of the request that produced it */
  readonly fingerprint: string;
  readonly status: number;
  readonly body: string;
  readonly headers: Record<string, string>;
  readonly cachedAt: number;
}

export interface IdempotencyStore {
  get(key: string): CachedResponse | undefined;
  set(key: string, response: CachedResponse): void;
}

export class InMemoryIdempotencyStore implements IdempotencyStore {
  private readonly _entries = new Map<string, CachedResponse>();

  constructor(
    private readonly _ttlMs: number = 86_400_000,
    private readonly _now: () => number = Date.now,
  ) {}

  get(key: string): CachedResponse | undefined {
    const entry = this._entries.get(key);
    if (entry !== undefined && this._expired(entry)) {
      this._entries.delete(key);
      return undefined;
    }
    return entry;
  }

  /** Stores the response and drops every entry past its TTL. */
  set(key: string, response: CachedResponse): void {
    for (const [existingKey, entry] of this._entries) {
      if (this._expired(entry)) {
        this._entries.delete(existingKey);
      }
    }
    this._entries.set(key, response);
  }

  get size(): number {
    return this._entries.size;
  }

  private _expired(entry: CachedResponse): boolean {
    return this._now() - entry.cachedAt > this._ttlMs;
  }
}

async function fingerprintOf(c: Context<AppEnv>): Promise<string> {
  const body = await c.req.raw.clone().text();
  return createHash("sha256")
    .update(`${c.req.method} ${c.req.path}\n${body}`)
    .digest("hex");
}

function replay(cached: CachedResponse): Response {
  const headers = new Headers(cached.headers);
  headers.set(REPLAY_HEADER, "true");
  return new Response(cached.body, { status: cached.status, headers });
}

async function capture(
  res: Response,
  fingerprint: string,
  cachedAt: number,
): Promise<CachedResponse> {
  const copy = res.clone();
  return {
    fingerprint,
    status: copy.status,
    body: await copy.text(),
    headers: Object.fromEntries(copy.headers.entries()),
    cachedAt,
  };
}

export function idempotencyMiddleware(
  store: IdempotencyStore,
  now: () => number = Date.now,
): MiddlewareHandler<AppEnv> {
  /** Scoped keys whose first request has not finished yet */
  const inFlight = new Set<string>();

  return async (c, next) => {
    const key = c.req.header(IDEMPOTENCY_HEADER);
    if (c.req.method !== "POST" || key === undefined) {
      return next();
    }

    const account = c.req.header(ACCOUNT_HEADER)?.trim() ?? "";
    const scopedKey = `${account}:${key}`;

    // Reserved before the first await so a concurrent duplicate sees it.
    if (inFlight.has(scopedKey)) {
      return c.json(
        createErrorEnvelope(
          "IDEMPOTENCY_IN_PROGRESS",
          `A request with ${IDEMPOTENCY_HEADER} "${key}" is still in progress`,
        ),
        409,
      );
    }
    inFlight.add(scopedKey);

    try {
      const fingerprint = await fingerprintOf(c);

      const cached = store.get(scopedKey);
      if (cached !== undefined) {
        if (cached.fingerprint !== fingerprint) {
          return c.json(
            createErrorEnvelope(
              "IDEMPOTENCY_KEY_REUSED",
              `${IDEMPOTENCY_HEADER} "${key}" was already used for a different request`,
            ),
            422,
          );
        }
        return replay(cached);
      }

      await next();

      if (c.res.status < 400) {
        store.set(scopedKey, await capture(c.res, fingerprint, now()));
      }
    } finally {
      inFlight.delete(scopedKey);
    }
  };
}
