/**
 * backend/src/modules/auth/flows/logout/logout-flow.ts
 *
 * WHY:
 * - Ends the caller's session: its sid goes on the revocation list for the rest
 *   of the refresh lifetime, so both tokens of the pair stop working at once.
 *
 * RULES:
 * - Idempotent: logging out an already-revoked session is not an error.
 * - Permission cache for the identity is evicted as part of logout.
 */

import { AuditWriter } from '../../../../shared/audit/audit.writer';
import type { ClientInfo } from '../../../../shared/http/client-info';
import type { CurrentIdentity } from '../../../../shared/http/require-auth-context';
import { auditLogout } from '../../auth.audit';
import type { AuthDeps } from '../../auth.deps';

export async function logoutFlow(
  deps: AuthDeps,
  params: { identity: CurrentIdentity; client: ClientInfo },
  signal: AbortSignal,
): Promise<void> {
  const { identity, client } = params;

  const refreshExpiresAt = new Date(deps.tokenService.refreshExpiryFor(identity.tokenIssuedAt) * 1000);

  signal.throwIfAborted();

  await deps.sessionRegistry.revoke(identity.sessionId, refreshExpiresAt);
  await deps.permissionResolver.invalidate(identity.id);

  await auditLogout(
    new AuditWriter(deps.auditRepo, {
      userId: identity.id,
      requestId: client.requestId,
      ip: client.ip,
      userAgent: client.userAgent,
    }),
    { sessionId: identity.sessionId },
  );

  deps.logger.info('auth.logout', {
    flow: 'auth.logout',
    requestId: client.requestId,
    identityId: identity.id,
    sessionId: identity.sessionId,
  });
}
