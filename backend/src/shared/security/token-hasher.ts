/**
 * backend/src/shared/security/token-hasher.ts
 *
 * WHY:
 * - We never store raw reset tokens, and never put raw emails into cache keys or logs.
 * - We store/use only a hash (SHA-256) so a leak doesn't expose usable values.
 *
 * HOW TO USE:
 * - Generate raw token -> hash it -> store hash in DB
 * - When user presents token -> hash -> compare with stored hash
 * - emailKey = hasher.hash(email.toLowerCase()) for rate-limit / lockout keys
 */

export interface TokenHasher {
  hash(rawToken: string): string;
}
