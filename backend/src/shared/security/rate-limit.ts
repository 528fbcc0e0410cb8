/**
 * src/shared/security/rate-limit.ts
 *
 * WHY:
 * - Per (client address, limiter class) budgets: login 5/60s, register 3/60s, ...
 *   (see rate-limit.classes.ts).
 * - Memory must stay bounded under traffic from any number of distinct addresses.
 *
 * HOW TO USE:
 * - const limiter = new RateLimiter({ capacity: 10_000, classes: config.rateLimit.classes })
 * - limiter.allow(emailKey, 'recovery_email')      // boolean, for flows that must answer 200
 * - limiter.consume('203.0.113.7', 'login')        // decision incl. remaining / retry-after
 * - limiter.hitOrThrow('203.0.113.7', 'login')     // throws RateLimitError when over
 *
 * ALGORITHM:
 * - Sliding window: each entry keeps the timestamps of accepted hits. Hits older than the
 *   window are pruned; a request is allowed iff the remaining count is below the class
 *   maximum, and only then recorded.
 * - Entries live in an LRU map capped at `capacity`. A new key beyond the cap evicts the
 *   least-recently-used key, whether or not its window has expired.
 *
 * CONCURRENCY:
 * - consume() is synchronous. On the Node event loop nothing can interleave between the
 *   read and the write of an entry, so no per-key lock is needed.
 * - State is process-local. Several instances each keep their own budget (known limitation).
 *
 * DISABLING:
 * - Pass `disabled: true` to accept everything (decided in di.ts, never here).
 */

import { LRUCache } from 'lru-cache';

import { LIMITER_CLASSES, type LimiterClass, type LimiterClassTable } from './rate-limit.classes';

export class RateLimitError extends Error {
  constructor(
    public readonly key: string,
    public readonly limit: number,
    public readonly windowSeconds: number,
    public readonly retryAfterSeconds: number,
  ) {
    super('Rate limit exceeded');
    this.name = 'RateLimitError';
  }
}

export type RateLimitDecision = Readonly<{
  allowed: boolean;
  limit: number;
  remaining: number;
  retryAfterSeconds: number;
}>;

export type RateLimiterOptions = Readonly<{
  capacity: number;
  classes: LimiterClassTable;
  disabled?: boolean;
  /** Epoch millis. Injected by tests. */
  now?: () => number;
}>;

type WindowEntry = { hits: number[] };

/** Addresses we could not resolve share one key, so they get a tighter budget. */
export const UNKNOWN_CLIENT_MAX_REQUESTS = 10;
const UNKNOWN_CLIENT_KEYS: ReadonlySet<string> = new Set(['', 'unknown', '0.0.0.0']);

export class RateLimiter {
  private readonly entries: LRUCache<string, WindowEntry>;
  private readonly now: () => number;

  constructor(private readonly opts: RateLimiterOptions) {
    this.now = opts.now ?? Date.now;
    this.entries = new LRUCache<string, WindowEntry>({ max: opts.capacity });
  }

  /** Number of tracked (class, client) keys. Never exceeds capacity. */
  get size(): number {
    return this.entries.size;
  }

  /** Silent variant: the caller skips its side effect instead of answering 429. */
  allow(clientKey: string, limiterClass: LimiterClass): boolean {
    return this.consume(clientKey, limiterClass).allowed;
  }

  consume(clientKey: string, limiterClass: LimiterClass): RateLimitDecision {
    const { windowSeconds, maxRequests } = this.opts.classes[limiterClass];
    const limit = UNKNOWN_CLIENT_KEYS.has(clientKey)
      ? Math.min(maxRequests, UNKNOWN_CLIENT_MAX_REQUESTS)
      : maxRequests;

    if (this.opts.disabled) {
      return { allowed: true, limit, remaining: limit, retryAfterSeconds: 0 };
    }

    const key = entryKey(clientKey, limiterClass);
    const now = this.now();
    const windowMs = windowSeconds * 1000;

    const entry = this.entries.get(key) ?? { hits: [] };
    pruneOlderThan(entry, now - windowMs);

    if (entry.hits.length >= limit) {
      // Touch the entry: an active offender should be the last one evicted.
      this.entries.set(key, entry);
      const oldest = entry.hits[0] ?? now;
      const retryAfterSeconds = Math.max(1, Math.ceil((oldest + windowMs - now) / 1000));
      return { allowed: false, limit, remaining: 0, retryAfterSeconds };
    }

    entry.hits.push(now);
    this.entries.set(key, entry);

    return {
      allowed: true,
      limit,
      remaining: limit - entry.hits.length,
      retryAfterSeconds: 0,
    };
  }

  hitOrThrow(clientKey: string, limiterClass: LimiterClass): RateLimitDecision {
    const decision = this.consume(clientKey, limiterClass);
    if (!decision.allowed) {
      throw new RateLimitError(
        entryKey(clientKey, limiterClass),
        decision.limit,
        this.opts.classes[limiterClass].windowSeconds,
        decision.retryAfterSeconds,
      );
    }
    return decision;
  }

  /** Forget a client's budget for one class, or for every class. */
  evict(clientKey: string, limiterClass?: LimiterClass): void {
    const classes = limiterClass ? [limiterClass] : LIMITER_CLASSES;
    for (const cls of classes) this.entries.delete(entryKey(clientKey, cls));
  }
}

function entryKey(clientKey: string, limiterClass: LimiterClass): string {
  return `${limiterClass}:${clientKey}`;
}

function pruneOlderThan(entry: WindowEntry, cutoff: number): void {
  let live = 0;
  while (live < entry.hits.length && (entry.hits[live] ?? cutoff) <= cutoff) live += 1;
  if (live > 0) entry.hits.splice(0, live);
}
