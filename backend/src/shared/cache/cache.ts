/**
 * src/shared/cache/cache.ts
 *
 * WHY:
 * - Short-lived security state (lockout counters, OTPs, revocations, rate windows,
 *   permission sets) must be fast, shared across instances, and self-expiring.
 * - We depend on an abstraction so tests can use an in-memory implementation.
 *
 * RULES:
 * - Every read-modify-write below is atomic per key. Redis runs them as single
 *   commands or server-side scripts; InMemCache runs them in one synchronous step.
 * - No key prefixes here: callers own their key layout.
 */

export interface CacheSetOptions {
  ttlSeconds?: number;
}

export type SlidingWindowInput = {
  nowMs: number;
  windowMs: number;
  limit: number;
};

export type SlidingWindowHit = {
  allowed: boolean;
  /** Events inside the window after this hit (the hit is counted only when allowed). */
  count: number;
  /** Oldest timestamp still inside the window, or null when the window is empty. */
  oldestMs: number | null;
};

export interface Cache {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, opts?: CacheSetOptions): Promise<void>;
  del(key: string): Promise<void>;

  /**
   * Atomically increment a counter. The TTL is applied only when the key has
   * none yet (first increment), so later increments never extend the window.
   * Returns the new value.
   */
  incr(key: string, opts?: { ttlSeconds?: number }): Promise<number>;

  /**
   * SET NX. Returns true when this call created the key.
   */
  setIfAbsent(key: string, value: string, opts?: CacheSetOptions): Promise<boolean>;

  /**
   * Remaining lifetime in whole seconds, or null when the key is missing or has no expiry.
   */
  ttl(key: string): Promise<number | null>;

  /**
   * Deletes the key only if it still holds `expected`. Returns true when deleted.
   */
  compareAndDelete(key: string, expected: string): Promise<boolean>;

  /**
   * Prune entries older than `nowMs - windowMs`, count, and record `nowMs`
   * if the count is below `limit`, as one atomic step.
   */
  slidingWindowHit(key: string, input: SlidingWindowInput): Promise<SlidingWindowHit>;
}
