/**
 * src/shared/security/login-attempt-governor.ts
 *
 * WHY:
 * - Consecutive failed sign-ins per identifier (email key or IP) lock that
 *   identifier for a fixed duration.
 *
 * STATE:
 * - Clear -> Accumulating -> Locked -> Clear, held in one self-expiring counter:
 *   login_attempts:<identifier>, TTL = lockout duration, seeded on the first failure.
 * - Locked is a read-only threshold check (count >= max); further failures never
 *   extend or reset the window.
 *
 * RULES:
 * - recordFailure() is a critical write: cache errors propagate (fail closed).
 */

import type { Cache } from '../cache/cache';

export type LockStatus = {
  locked: boolean;
  attempts: number;
  retryAfterSeconds: number;
};

export class LoginAttemptGovernor {
  constructor(
    private readonly cache: Cache,
    private readonly opts: {
      maxAttempts: number;
      lockoutSeconds: number;
    },
  ) {}

  get maxAttempts(): number {
    return this.opts.maxAttempts;
  }

  get lockoutSeconds(): number {
    return this.opts.lockoutSeconds;
  }

  private key(identifier: string): string {
    return `login_attempts:${identifier}`;
  }

  async recordFailure(identifier: string): Promise<number> {
    return this.cache.incr(this.key(identifier), { ttlSeconds: this.opts.lockoutSeconds });
  }

  async isLocked(identifier: string): Promise<LockStatus> {
    const key = this.key(identifier);
    const raw = await this.cache.get(key);
    const attempts = raw === null ? 0 : Number(raw);

    if (!Number.isFinite(attempts) || attempts < this.opts.maxAttempts) {
      return { locked: false, attempts: Number.isFinite(attempts) ? attempts : 0, retryAfterSeconds: 0 };
    }

    const ttl = await this.cache.ttl(key);
    return {
      locked: true,
      attempts,
      retryAfterSeconds: ttl !== null && ttl > 0 ? ttl : this.opts.lockoutSeconds,
    };
  }

  async clear(identifier: string): Promise<void> {
    await this.cache.del(this.key(identifier));
  }
}
