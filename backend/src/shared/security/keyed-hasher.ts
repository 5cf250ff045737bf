/**
 * src/shared/security/keyed-hasher.ts
 *
 * WHY:
 * - OTP codes carry ~20 bits of entropy. A plain SHA-256 of a 6-digit code falls
 *   to a 10^6 brute force the moment the cache contents leak.
 * - HMAC-SHA256(code, OTP_HMAC_KEY) adds a server-side pepper: the stored hash is
 *   useless without the key from the environment.
 *
 * RULES:
 * - Deterministic: same (input, key) -> same output.
 * - matches() compares in constant time.
 * - No I/O. No business logic.
 */

import { createHmac, timingSafeEqual } from 'node:crypto';

export interface KeyedHasher {
  hash(value: string): string;
  matches(value: string, expectedHash: string): boolean;
}

export class HmacSha256KeyedHasher implements KeyedHasher {
  private readonly key: string;

  constructor(key: string) {
    if (key.length < 32) {
      throw new Error(
        `HmacSha256KeyedHasher: key must be at least 32 characters. Got ${key.length}.`,
      );
    }
    this.key = key;
  }

  /** Lowercase hex HMAC-SHA256. */
  hash(value: string): string {
    return createHmac('sha256', this.key).update(value).digest('hex');
  }

  matches(value: string, expectedHash: string): boolean {
    const actual = Buffer.from(this.hash(value), 'hex');
    const expected = Buffer.from(expectedHash, 'hex');
    return actual.length === expected.length && timingSafeEqual(actual, expected);
  }
}
