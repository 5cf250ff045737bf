/**
 * src/modules/auth/helpers/end-all-sessions.ts
 *
 * WHY:
 * - A password change or reset must end every live session of the identity and
 *   drop its cached permission set; both flows share this tail.
 *
 * RULES:
 * - Revocation and cache eviction are critical writes: errors propagate.
 */

import type { AuthDeps } from '../auth.deps';

export async function endAllSessions(
  deps: Pick<AuthDeps, 'sessionRegistry' | 'permissionResolver'>,
  identityId: string,
): Promise<number> {
  const revoked = await deps.sessionRegistry.revokeAllForIdentity(identityId);
  await deps.permissionResolver.invalidate(identityId);
  return revoked;
}
