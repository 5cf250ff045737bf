/**
 * src/shared/security/rate-limit.ts
 *
 * WHY:
 * - Sliding-window throttling for abuse protection and sensitive flows:
 *   - IP scope: global limiter (every request)
 *   - identifier scope: OTP send/verify, forgot-password (per email key)
 *   - endpoint scope: login, refresh, reset-password (per IP + route)
 * - Depends only on Cache (DIP); Redis runs the window as one Lua script.
 *
 * HOW TO USE:
 * - const limiter = new RateLimiter(cache, { prefix: 'rl' })
 * - const r = await limiter.checkIp('1.2.3.4', { limit: 100, windowSeconds: 60 })
 * - await limiter.hitOrThrow(RateLimiter.endpointKey(ip, 'login'), rule)
 * - const ok = await limiter.hitOrSkip(RateLimiter.identifierKey('forgot', emailKey), rule)
 *
 * TWO MODES:
 * - hitOrThrow: throws RateLimitError when the window is full (429 flows).
 * - hitOrSkip: returns false instead (silent anti-enumeration flows).
 *
 * FAILURE MODE:
 * - failOpen=true: a cache outage lets the request through (logged). Used only by
 *   the global IP limiter. Flow limiters fail closed (error propagates).
 */

import type { Cache, SlidingWindowHit } from '../cache/cache';
import type { Logger } from '../logger/logger';

export type RateLimitRule = {
  limit: number;
  windowSeconds: number;
};

export type RateLimitResult = {
  allowed: boolean;
  limit: number;
  remaining: number;
  resetAt: Date;
  retryAfterSeconds: number;
};

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

export type RateLimiterOptions = {
  prefix?: string;
  disabled?: boolean;
  failOpen?: boolean;
  logger?: Logger;
  clock?: () => number;
};

export class RateLimiter {
  private readonly clock: () => number;

  constructor(
    private readonly cache: Cache,
    private readonly opts: RateLimiterOptions = {},
  ) {
    this.clock = opts.clock ?? Date.now;
  }

  static ipKey(ip: string): string {
    return `ip:${ip}`;
  }

  static identifierKey(scope: string, identifier: string): string {
    return `id:${scope}:${identifier}`;
  }

  static endpointKey(ip: string, endpoint: string): string {
    return `endpoint:${endpoint}:${ip}`;
  }

  private buildKey(key: string): string {
    return this.opts.prefix ? `${this.opts.prefix}:${key}` : key;
  }

  async check(key: string, rule: RateLimitRule): Promise<RateLimitResult> {
    const nowMs = this.clock();
    const windowMs = rule.windowSeconds * 1000;

    if (this.opts.disabled) {
      return {
        allowed: true,
        limit: rule.limit,
        remaining: rule.limit,
        resetAt: new Date(nowMs + windowMs),
        retryAfterSeconds: 0,
      };
    }

    const fullKey = this.buildKey(key);

    let hit: SlidingWindowHit;
    try {
      hit = await this.cache.slidingWindowHit(fullKey, { nowMs, windowMs, limit: rule.limit });
    } catch (err) {
      if (!this.opts.failOpen) throw err;

      this.opts.logger?.warn('rate_limit.store_unavailable', {
        flow: 'rate-limit',
        key: fullKey,
        message: err instanceof Error ? err.message : String(err),
      });
      return {
        allowed: true,
        limit: rule.limit,
        remaining: rule.limit,
        resetAt: new Date(nowMs + windowMs),
        retryAfterSeconds: 0,
      };
    }

    const resetAtMs = (hit.oldestMs ?? nowMs) + windowMs;

    return {
      allowed: hit.allowed,
      limit: rule.limit,
      remaining: Math.max(0, rule.limit - hit.count),
      resetAt: new Date(resetAtMs),
      retryAfterSeconds: hit.allowed ? 0 : Math.max(1, Math.ceil((resetAtMs - nowMs) / 1000)),
    };
  }

  checkIp(ip: string, rule: RateLimitRule): Promise<RateLimitResult> {
    return this.check(RateLimiter.ipKey(ip), rule);
  }

  checkIdentifier(scope: string, identifier: string, rule: RateLimitRule): Promise<RateLimitResult> {
    return this.check(RateLimiter.identifierKey(scope, identifier), rule);
  }

  checkEndpoint(ip: string, endpoint: string, rule: RateLimitRule): Promise<RateLimitResult> {
    return this.check(RateLimiter.endpointKey(ip, endpoint), rule);
  }

  async hitOrThrow(key: string, rule: RateLimitRule): Promise<RateLimitResult> {
    const result = await this.check(key, rule);
    if (!result.allowed) {
      throw new RateLimitError(
        this.buildKey(key),
        rule.limit,
        rule.windowSeconds,
        result.retryAfterSeconds,
      );
    }
    return result;
  }

  async hitOrSkip(key: string, rule: RateLimitRule): Promise<boolean> {
    const result = await this.check(key, rule);
    return result.allowed;
  }
}
