/**
 * backend/src/shared/http/auth-context.ts
 *
 * WHY:
 * - Authentication and authorization are separate concepts.
 * - The token middleware (shared/session/token-auth.middleware.ts) fills this in
 *   from a validated, non-revoked access token plus the resolved permission set.
 * - Before that (or with no/bad token), identity fields are null.
 *
 * HOW IT WORKS:
 * 1. registerAuthContext() sets an empty context on every request.
 * 2. Token middleware overwrites it, or records why authentication failed.
 * 3. Route gates (require-auth-context.ts) turn the recorded failure into the
 *    matching error (TokenExpired / TokenInvalid / SessionRevoked).
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';

export type AuthFailure = 'TOKEN_EXPIRED' | 'TOKEN_INVALID' | 'SESSION_REVOKED';

export type AuthContext = {
  identityId: string | null;
  email: string | null;
  sessionId: string | null;
  roles: string[];
  permissions: string[];

  /** `iat` of the access token, in seconds. Bounds the refresh lifetime on logout. */
  tokenIssuedAt: number | null;

  failure: AuthFailure | null;
};

declare module 'fastify' {
  interface FastifyRequest {
    authContext: AuthContext;
  }
}

export function emptyAuthContext(): AuthContext {
  return {
    identityId: null,
    email: null,
    sessionId: null,
    roles: [],
    permissions: [],
    tokenIssuedAt: null,
    failure: null,
  };
}

export function registerAuthContext(app: FastifyInstance) {
  // Decorate so Fastify knows the property exists; the hook below assigns the real value.
  app.decorateRequest('authContext', null as unknown as AuthContext);

  app.addHook('onRequest', (req: FastifyRequest, _reply, done) => {
    req.authContext = emptyAuthContext();
    done();
  });
}
