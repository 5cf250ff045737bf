/**
 * src/modules/identities/identity.types.ts
 *
 * WHY:
 * - Domain shapes for credential/lockout state. DB rows never leave the DAL.
 *
 * RULES:
 * - IdentityWithHash is for the auth flows only; never serialize it to a response.
 */

import type { IdentityStatus } from '../../shared/db/db.schema';

export type { IdentityStatus };

export type Identity = {
  id: string;
  email: string;
  phone: string | null;
  status: IdentityStatus;
  twoFactorEnabled: boolean;
  failedLoginAttempts: number;
  lockedUntil: Date | null;
  passwordChangedAt: Date | null;
  emailVerifiedAt: Date | null;
  lastLoginAt: Date | null;
};

export type IdentityWithHash = Identity & {
  passwordHash: string;
};

export type PasswordResetToken = {
  id: string;
  identityId: string;
  expiresAt: Date;
};

/** Public projection returned by login / currentIdentity. */
export type IdentitySummary = {
  id: string;
  email: string;
  phone: string | null;
  status: IdentityStatus;
  twoFactorEnabled: boolean;
  roles: string[];
  permissions: string[];
};
