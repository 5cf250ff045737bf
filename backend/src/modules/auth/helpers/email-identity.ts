/**
 * backend/src/modules/auth/helpers/email-identity.ts
 *
 * WHY:
 * - emailDomain() and the hashed email key are used for PII-minimized logging,
 *   lockout identifiers and rate-limit keys in every auth flow.
 * - Keeping them in one place prevents drift (a key computed on a differently
 *   normalized email would split one person's counters in two).
 *
 * RULES:
 * - Pure functions.
 * - Never throw.
 */

import type { TokenHasher } from '../../../shared/security/token-hasher';

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

export function emailDomain(email: string): string {
  const at = email.lastIndexOf('@');
  return at >= 0 ? email.slice(at + 1) : '';
}

/** SHA-256 of the normalized email. Safe for logs, audit metadata and cache keys. */
export function emailKey(hasher: TokenHasher, email: string): string {
  return hasher.hash(normalizeEmail(email));
}

/** Governor identifier for an email. */
export function emailLockId(key: string): string {
  return `email:${key}`;
}

/** Governor identifier for a client IP. */
export function ipLockId(ip: string): string {
  return `ip:${ip}`;
}
