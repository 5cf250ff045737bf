/**
 * backend/src/modules/auth/flows/refresh/refresh-flow.ts
 *
 * WHY:
 * - Rotate-and-revoke: every successful refresh retires the presented session id
 *   and returns a pair with a new one, so a used refresh token cannot be replayed.
 *
 * ORDER:
 *  1. endpoint rate limit
 *  2. validate as a refresh token (an access token never passes)
 *  3. revocation list
 *  4. identity still exists and is active
 *  5. password not changed after the token was issued
 *  6. mint, deadline check, store the new session
 *  7. exclusive revoke of the old sid (last write)
 *
 * RULES:
 * - The exclusive revoke is set-if-absent: of two concurrent refreshes with the
 *   same token exactly one wins; the loser gets SESSION_REVOKED and its new
 *   session is discarded.
 * - A deadline that fires during the revoke rolls the rotation back: the old session
 *   is reinstated and the new one discarded.
 * - Revocation errors propagate (fail closed).
 */

import { AuditWriter } from '../../../../shared/audit/audit.writer';
import type { ClientInfo } from '../../../../shared/http/client-info';
import { RateLimiter } from '../../../../shared/security/rate-limit';
import { SecurityErrors } from '../../../../shared/security/security.errors';
import { TokenValidationError, type TokenClaims } from '../../../../shared/security/token-service';

import { auditTokenRefreshed } from '../../auth.audit';
import { AUTH_ENDPOINTS } from '../../auth.constants';
import type { AuthDeps } from '../../auth.deps';
import type { AuthenticatedResult } from '../../auth.types';
import { buildLoginResult } from '../../helpers/build-login-result';
import { issueSession } from '../../helpers/issue-session';

export type RefreshParams = {
  refreshToken: string;
  client: ClientInfo;
};

function validateRefreshToken(deps: AuthDeps, token: string): TokenClaims {
  try {
    return deps.tokenService.validate(token, 'refresh');
  } catch (err) {
    if (err instanceof TokenValidationError) {
      throw err.reason === 'expired' ? SecurityErrors.tokenExpired() : SecurityErrors.tokenInvalid();
    }
    throw err;
  }
}

export async function refreshFlow(
  deps: AuthDeps,
  params: RefreshParams,
  signal: AbortSignal,
): Promise<AuthenticatedResult> {
  const { client } = params;

  await deps.rateLimiter.hitOrThrow(
    RateLimiter.endpointKey(client.ip, AUTH_ENDPOINTS.refresh),
    deps.policy.rateLimits.refresh,
  );

  const claims = validateRefreshToken(deps, params.refreshToken);

  if (await deps.sessionRegistry.isRevoked(claims.sid)) {
    deps.logger.warn('auth.refresh.revoked_session', {
      flow: 'auth.refresh',
      requestId: client.requestId,
      identityId: claims.sub,
      sessionId: claims.sid,
    });
    throw SecurityErrors.sessionRevoked();
  }

  const identity = await deps.credentialStore.findById(claims.sub);
  if (!identity || identity.status !== 'active') {
    throw SecurityErrors.sessionRevoked();
  }

  if (
    identity.passwordChangedAt &&
    Math.floor(identity.passwordChangedAt.getTime() / 1000) > claims.iat
  ) {
    throw SecurityErrors.sessionRevoked();
  }

  const previousExpiry = new Date(claims.exp * 1000);

  const { pair, access } = await issueSession(deps, { identity, client, signal });

  const won = await deps.sessionRegistry.revoke(claims.sid, previousExpiry);
  if (!won) {
    await deps.sessionRegistry.discard(pair.sessionId, pair.refreshExpiresAt);
    throw SecurityErrors.sessionRevoked();
  }

  if (signal.aborted) {
    await deps.sessionRegistry.reinstate(claims.sid);
    await deps.sessionRegistry.discard(pair.sessionId, pair.refreshExpiresAt);
    signal.throwIfAborted();
  }

  await auditTokenRefreshed(
    new AuditWriter(deps.auditRepo, {
      userId: identity.id,
      requestId: client.requestId,
      ip: client.ip,
      userAgent: client.userAgent,
    }),
    { previousSessionId: claims.sid, sessionId: pair.sessionId },
  );

  deps.logger.info('auth.refresh.success', {
    flow: 'auth.refresh',
    requestId: client.requestId,
    identityId: identity.id,
    previousSessionId: claims.sid,
    sessionId: pair.sessionId,
  });

  return buildLoginResult({ pair, identity, access });
}
