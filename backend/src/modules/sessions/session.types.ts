/**
 * src/modules/sessions/session.types.ts
 */

export type SessionRecord = {
  /** Same value as the `sid` claim of the token pair. */
  id: string;
  identityId: string;
  issuedAt: Date;
  /** Refresh-token expiry: the session cannot outlive it. */
  expiresAt: Date;
  clientFingerprint: string;
  userAgent: string | null;
  ip: string | null;
  revokedAt: Date | null;
};

export type SessionClient = {
  ip: string;
  userAgent: string | null;
  acceptLanguage: string | null;
};

/** Public projection for GET /auth/sessions. */
export type SessionView = {
  id: string;
  issuedAt: string;
  expiresAt: string;
  userAgent: string | null;
  ip: string | null;
  current: boolean;
};
