/**
 * src/shared/cache/inmem-cache.ts
 *
 * WHY:
 * - Allows tests (and local dev if Redis is down) to run without external infra.
 * - Each method completes synchronously before resolving, which gives the same
 *   per-key atomicity the Redis scripts give.
 *
 * HOW TO USE:
 * - const cache = new InMemCache()
 * - const cache = new InMemCache({ now: () => clock.now() })  // tests that move time
 */

import type { Cache, CacheSetOptions, SlidingWindowHit, SlidingWindowInput } from './cache';

type StringEntry = { value: string; expiresAtMs: number | null };
type WindowEntry = { timestamps: number[]; expiresAtMs: number };

export class InMemCache implements Cache {
  private readonly store = new Map<string, StringEntry>();
  private readonly windows = new Map<string, WindowEntry>();
  private readonly clock: () => number;

  constructor(opts?: { now?: () => number }) {
    this.clock = opts?.now ?? Date.now;
  }

  private now(): number {
    return this.clock();
  }

  private getEntry(key: string): StringEntry | null {
    const entry = this.store.get(key);
    if (!entry) return null;

    if (entry.expiresAtMs !== null && entry.expiresAtMs <= this.now()) {
      this.store.delete(key);
      return null;
    }

    return entry;
  }

  private expiryFor(opts?: CacheSetOptions): number | null {
    return opts?.ttlSeconds ? this.now() + opts.ttlSeconds * 1000 : null;
  }

  get(key: string): Promise<string | null> {
    const entry = this.getEntry(key);
    return Promise.resolve(entry ? entry.value : null);
  }

  set(key: string, value: string, opts?: CacheSetOptions): Promise<void> {
    this.store.set(key, { value, expiresAtMs: this.expiryFor(opts) });
    return Promise.resolve();
  }

  del(key: string): Promise<void> {
    this.store.delete(key);
    this.windows.delete(key);
    return Promise.resolve();
  }

  incr(key: string, opts?: { ttlSeconds?: number }): Promise<number> {
    const entry = this.getEntry(key);
    const next = entry ? Number(entry.value) + 1 : 1;

    const expiresAtMs = entry?.expiresAtMs ?? this.expiryFor(opts);
    this.store.set(key, { value: String(next), expiresAtMs });

    return Promise.resolve(next);
  }

  setIfAbsent(key: string, value: string, opts?: CacheSetOptions): Promise<boolean> {
    if (this.getEntry(key)) return Promise.resolve(false);

    this.store.set(key, { value, expiresAtMs: this.expiryFor(opts) });
    return Promise.resolve(true);
  }

  ttl(key: string): Promise<number | null> {
    const entry = this.getEntry(key);
    if (!entry || entry.expiresAtMs === null) return Promise.resolve(null);

    return Promise.resolve(Math.ceil((entry.expiresAtMs - this.now()) / 1000));
  }

  compareAndDelete(key: string, expected: string): Promise<boolean> {
    const entry = this.getEntry(key);
    if (!entry || entry.value !== expected) return Promise.resolve(false);

    this.store.delete(key);
    return Promise.resolve(true);
  }

  slidingWindowHit(key: string, input: SlidingWindowInput): Promise<SlidingWindowHit> {
    const existing = this.windows.get(key);
    const live = existing && existing.expiresAtMs > this.now() ? existing.timestamps : [];

    const windowStart = input.nowMs - input.windowMs;
    const timestamps = live.filter((ts) => ts > windowStart);

    const allowed = timestamps.length < input.limit;
    if (allowed) timestamps.push(input.nowMs);

    this.windows.set(key, { timestamps, expiresAtMs: this.now() + input.windowMs });

    return Promise.resolve({
      allowed,
      count: timestamps.length,
      oldestMs: timestamps[0] ?? null,
    });
  }
}
