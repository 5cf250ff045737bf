/**
 * src/modules/auth/auth.types.ts
 *
 * WHY:
 * - Response shapes for sign-in flows.
 * - login() returns either a token pair or a two-factor challenge; the
 *   discriminant is `status`.
 *
 * RULES:
 * - Never include passwords, hashes or OTP codes in response types.
 * - Dates cross the wire as ISO strings.
 */

import type { IdentitySummary } from '../identities/identity.types';

export type TokenPairResponse = {
  accessToken: string;
  refreshToken: string;
  tokenType: 'Bearer';
  expiresAt: string;
  refreshExpiresAt: string;
  sessionId: string;
};

export type AuthenticatedResult = {
  status: 'AUTHENTICATED';
  tokens: TokenPairResponse;
  identity: IdentitySummary;
};

export type TwoFactorChallenge = {
  status: 'TWO_FACTOR_REQUIRED';
  email: string;
  expiresAt: string;
};

export type LoginResult = AuthenticatedResult | TwoFactorChallenge;
