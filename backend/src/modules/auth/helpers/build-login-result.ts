/**
 * src/modules/auth/helpers/build-login-result.ts
 *
 * WHY:
 * - The AUTHENTICATED response is built identically by login, two-factor
 *   verification and refresh.
 *
 * RULES:
 * - Pure function. No I/O.
 * - Dates become ISO strings here, nowhere else.
 */

import type { PermissionSet } from '../../access/access.types';
import type { Identity, IdentitySummary } from '../../identities/identity.types';
import type { TokenPair } from '../../../shared/security/token-service';
import type { AuthenticatedResult } from '../auth.types';

export function toIdentitySummary(identity: Identity, access: PermissionSet): IdentitySummary {
  return {
    id: identity.id,
    email: identity.email,
    phone: identity.phone,
    status: identity.status,
    twoFactorEnabled: identity.twoFactorEnabled,
    roles: access.roles,
    permissions: access.permissions,
  };
}

export function buildLoginResult(params: {
  pair: TokenPair;
  identity: Identity;
  access: PermissionSet;
}): AuthenticatedResult {
  const { pair, identity, access } = params;

  return {
    status: 'AUTHENTICATED',
    tokens: {
      accessToken: pair.accessToken,
      refreshToken: pair.refreshToken,
      tokenType: pair.tokenType,
      expiresAt: pair.expiresAt.toISOString(),
      refreshExpiresAt: pair.refreshExpiresAt.toISOString(),
      sessionId: pair.sessionId,
    },
    identity: toIdentitySummary(identity, access),
  };
}
