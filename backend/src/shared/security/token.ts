/**
 * backend/src/shared/security/token.ts
 *
 * WHY:
 * - Random secrets (reset tokens, OTP codes) must come from the CSPRNG only.
 *
 * HOW TO USE:
 * - const token = generateSecureToken()       // URL-safe, for email links
 * - const code = generateNumericCode(6)       // zero-padded, e.g. "004217"
 */

import { randomBytes, randomInt } from 'node:crypto';

export function generateSecureToken(bytes: number = 32): string {
  // URL-safe base64 (no + / =)
  return randomBytes(bytes).toString('base64url');
}

export function generateNumericCode(length: number): string {
  if (!Number.isInteger(length) || length < 4 || length > 10) {
    throw new Error(`generateNumericCode: length must be 4..10, got ${length}`);
  }
  // randomInt is uniform over [0, max) and capped at 2^48, which covers 10 digits.
  return String(randomInt(0, 10 ** length)).padStart(length, '0');
}
