/**
 * src/shared/security/otp-engine.ts
 *
 * WHY:
 * - Short-lived numeric codes for step-up verification (two-factor login,
 *   email verification), stored only as a keyed hash in the shared cache.
 *
 * KEYS:
 * - otp:<purpose>:<identityId>            -> {"codeHash","expiresAt"}   TTL = code lifetime
 * - otp:<purpose>:<identityId>:attempts   -> mismatch counter           TTL = remaining lifetime
 *   The purpose is part of the key, so a code issued for one purpose can never
 *   satisfy a check for another.
 *
 * RULES:
 * - At most one live code per (identity, purpose): issue() overwrites and resets attempts.
 * - The plaintext code leaves this class only inside the dispatch message.
 * - A match is consumed with compare-and-delete; of two concurrent correct
 *   submissions exactly one gets 'ok'.
 * - Reaching maxAttempts mismatches force-deletes the code.
 */

import { z } from 'zod';
import type { Cache } from '../cache/cache';
import type { Queue, OtpPurpose } from '../messaging/queue';
import type { KeyedHasher } from './keyed-hasher';
import { generateNumericCode } from './token';

export type OtpVerifyOutcome = 'ok' | 'expired' | 'invalid';

export type OtpEngineOptions = {
  length: number;
  ttlSeconds: number;
  maxAttempts: number;
};

const StoredOtpSchema = z.object({
  codeHash: z.string().min(1),
  expiresAt: z.number().int(),
});

type StoredOtp = z.infer<typeof StoredOtpSchema>;

function parseStored(raw: string): StoredOtp | null {
  try {
    const parsed = StoredOtpSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

export class OtpEngine {
  private readonly clock: () => number;

  constructor(
    private readonly deps: {
      cache: Cache;
      hasher: KeyedHasher;
      queue: Queue;
      clock?: () => number;
    },
    private readonly opts: OtpEngineOptions,
  ) {
    this.clock = deps.clock ?? Date.now;
  }

  static key(purpose: OtpPurpose, identityId: string): string {
    return `otp:${purpose}:${identityId}`;
  }

  private static attemptsKey(purpose: OtpPurpose, identityId: string): string {
    return `${OtpEngine.key(purpose, identityId)}:attempts`;
  }

  async issue(params: {
    identityId: string;
    email: string;
    purpose: OtpPurpose;
  }): Promise<{ expiresAt: Date }> {
    const code = generateNumericCode(this.opts.length);
    const expiresAt = this.clock() + this.opts.ttlSeconds * 1000;

    const entry: StoredOtp = { codeHash: this.deps.hasher.hash(code), expiresAt };

    await this.deps.cache.del(OtpEngine.attemptsKey(params.purpose, params.identityId));
    await this.deps.cache.set(OtpEngine.key(params.purpose, params.identityId), JSON.stringify(entry), {
      ttlSeconds: this.opts.ttlSeconds,
    });

    await this.deps.queue.enqueue({
      type: 'auth.otp-code',
      identityId: params.identityId,
      email: params.email,
      purpose: params.purpose,
      code,
      expiresAt: new Date(expiresAt).toISOString(),
    });

    return { expiresAt: new Date(expiresAt) };
  }

  async verify(params: {
    identityId: string;
    purpose: OtpPurpose;
    code: string;
  }): Promise<OtpVerifyOutcome> {
    const key = OtpEngine.key(params.purpose, params.identityId);
    const attemptsKey = OtpEngine.attemptsKey(params.purpose, params.identityId);

    const raw = await this.deps.cache.get(key);
    if (raw === null) return 'expired';

    const stored = parseStored(raw);
    const now = this.clock();

    if (!stored || stored.expiresAt <= now) {
      await this.deps.cache.compareAndDelete(key, raw);
      return 'expired';
    }

    if (this.deps.hasher.matches(params.code, stored.codeHash)) {
      const consumed = await this.deps.cache.compareAndDelete(key, raw);
      if (!consumed) return 'expired';

      await this.deps.cache.del(attemptsKey);
      return 'ok';
    }

    const remainingSeconds = Math.max(1, Math.ceil((stored.expiresAt - now) / 1000));
    const attempts = await this.deps.cache.incr(attemptsKey, { ttlSeconds: remainingSeconds });

    if (attempts >= this.opts.maxAttempts) {
      await this.deps.cache.compareAndDelete(key, raw);
      await this.deps.cache.del(attemptsKey);
    }

    return 'invalid';
  }
}
