/**
 * src/shared/session/token-auth.middleware.ts
 *
 * WHY:
 * - Turns `Authorization: Bearer <access token>` into req.authContext.
 * - Order per request: signature/expiry/type -> revocation list -> permission set.
 *
 * RULES:
 * - Never throws for a bad/expired/revoked token: it records the failure and lets
 *   the route gate decide (public routes stay reachable with a stale token).
 * - A revocation-list read error DOES propagate: that check fails closed.
 * - Permission resolution is injected (it lives in the access module) and
 *   degrades to the store on its own.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import type { TokenService, TokenClaims } from '../security/token-service';
import { TokenValidationError } from '../security/token-service';
import type { RevocationList } from './revocation-list';

export type ResolvedAccess = {
  roles: string[];
  permissions: string[];
};

export type TokenAuthDeps = {
  tokenService: TokenService;
  revocationList: RevocationList;
  resolveAccess: (identityId: string) => Promise<ResolvedAccess>;
};

export function extractBearerToken(header: string | undefined): string | null | undefined {
  if (header === undefined) return undefined;

  const match = /^Bearer\s+(\S+)$/i.exec(header.trim());
  return match?.[1] ?? null;
}

export async function authenticateRequest(req: FastifyRequest, deps: TokenAuthDeps): Promise<void> {
  const token = extractBearerToken(req.headers.authorization);
  if (token === undefined) return;

  if (token === null) {
    req.authContext.failure = 'TOKEN_INVALID';
    return;
  }

  let claims: TokenClaims;
  try {
    claims = deps.tokenService.validate(token, 'access');
  } catch (err) {
    if (!(err instanceof TokenValidationError)) throw err;
    req.authContext.failure = err.reason === 'expired' ? 'TOKEN_EXPIRED' : 'TOKEN_INVALID';
    return;
  }

  if (await deps.revocationList.isRevoked(claims.sid)) {
    req.authContext.failure = 'SESSION_REVOKED';
    return;
  }

  const access = await deps.resolveAccess(claims.sub);

  req.authContext = {
    identityId: claims.sub,
    email: claims.email,
    sessionId: claims.sid,
    roles: access.roles,
    permissions: access.permissions,
    tokenIssuedAt: claims.iat,
    failure: null,
  };
}

export function registerTokenAuthentication(app: FastifyInstance, deps: TokenAuthDeps) {
  app.addHook('onRequest', async (req) => {
    await authenticateRequest(req, deps);
  });
}
