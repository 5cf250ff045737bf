/**
 * src/modules/auth/helpers/issue-session.ts
 *
 * WHY:
 * - "Resolve access -> mint pair -> persist session" is the tail of login,
 *   two-factor verification and refresh.
 *
 * RULES:
 * - Minting is side-effect free, so it runs before the deadline check.
 * - signal.throwIfAborted() guards the insert; a deadline that fires while the insert
 *   is in flight discards the new session, so a timed-out request never leaves one behind.
 */

import type { TokenPair } from '../../../shared/security/token-service';
import type { PermissionSet } from '../../access/access.types';
import type { Identity } from '../../identities/identity.types';
import type { SessionClient } from '../../sessions/session.types';
import type { AuthDeps } from '../auth.deps';

export type IssuedSession = {
  pair: TokenPair;
  access: PermissionSet;
};

export async function issueSession(
  deps: Pick<AuthDeps, 'permissionResolver' | 'tokenService' | 'sessionRegistry'>,
  params: {
    identity: Identity;
    client: SessionClient;
    signal: AbortSignal;
  },
): Promise<IssuedSession> {
  const { identity, client, signal } = params;

  const access = await deps.permissionResolver.resolve(identity.id);

  const pair = deps.tokenService.issuePair({
    identityId: identity.id,
    email: identity.email,
    roles: access.roles,
    permissions: access.permissions,
  });

  signal.throwIfAborted();

  await deps.sessionRegistry.storeSession(identity.id, pair, client);

  if (signal.aborted) {
    await deps.sessionRegistry.discard(pair.sessionId, pair.refreshExpiresAt);
    signal.throwIfAborted();
  }

  return { pair, access };
}
