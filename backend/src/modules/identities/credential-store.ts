/**
 * src/modules/identities/credential-store.ts
 *
 * WHY:
 * - The narrow seam between the auth flows and the relational store: read identity
 *   by email/id, durable failure + lockout state, password hash updates, and
 *   single-use password reset tokens.
 * - KyselyCredentialStore (dal/) is the Postgres implementation; tests use an
 *   in-memory one.
 *
 * RULES:
 * - Emails are normalized to lower-case by the implementation.
 * - No AppError, no policy decisions: flows decide, the store records.
 */

import type { IdentityWithHash, PasswordResetToken } from './identity.types';

export interface CredentialStore {
  findByEmail(email: string): Promise<IdentityWithHash | undefined>;
  findById(identityId: string): Promise<IdentityWithHash | undefined>;

  /**
   * Increments failed_login_attempts. When `lockUntil` is given, also stamps the
   * durable lockout. Returns the new durable counter.
   */
  recordFailedLogin(params: {
    identityId: string;
    lockUntil: Date | null;
    at: Date;
  }): Promise<number>;

  /** Resets failure state and stamps last login. Not consistency-critical. */
  recordSuccessfulLogin(params: { identityId: string; ip: string; at: Date }): Promise<void>;

  updatePasswordHash(params: {
    identityId: string;
    passwordHash: string;
    changedAt: Date;
  }): Promise<void>;

  /** Cost upgrade only: same password, so password_changed_at is left alone. */
  upgradePasswordHash(params: { identityId: string; passwordHash: string; at: Date }): Promise<void>;

  markEmailVerified(params: { identityId: string; at: Date }): Promise<void>;

  insertPasswordResetToken(params: {
    identityId: string;
    tokenHash: string;
    expiresAt: Date;
  }): Promise<void>;

  invalidateActiveResetTokens(params: { identityId: string; at: Date }): Promise<void>;

  findValidResetToken(params: { tokenHash: string; now: Date }): Promise<PasswordResetToken | undefined>;

  /**
   * Consumes the token (only if still unused), sets the new hash, clears the durable
   * lockout and voids every other active token for the identity, in one transaction.
   * Returns false when the token was already consumed by a concurrent request.
   */
  completePasswordReset(params: {
    tokenHash: string;
    identityId: string;
    passwordHash: string;
    at: Date;
  }): Promise<boolean>;
}
