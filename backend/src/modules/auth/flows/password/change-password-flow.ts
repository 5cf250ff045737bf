/**
 * backend/src/modules/auth/flows/password/change-password-flow.ts
 *
 * WHY:
 * - Authenticated password change. Proving the current password is a sign-in
 *   attempt in disguise, so it goes through the same email governor as login.
 *
 * RULES:
 * - Strength policy runs first (pure validation, no side effects).
 * - A wrong current password is counted before it is reported.
 * - Every live session (the caller's included) is revoked afterwards; the
 *   caller signs in again with the new password.
 */

import { AuditWriter } from '../../../../shared/audit/audit.writer';
import type { ClientInfo } from '../../../../shared/http/client-info';
import type { CurrentIdentity } from '../../../../shared/http/require-auth-context';
import { validatePassword } from '../../../../shared/security/password-policy';
import { SecurityErrors } from '../../../../shared/security/security.errors';

import { auditPasswordChanged } from '../../auth.audit';
import type { AuthDeps } from '../../auth.deps';
import { AuthErrors } from '../../auth.errors';
import { endAllSessions } from '../../helpers/end-all-sessions';
import { emailKey, emailLockId } from '../../helpers/email-identity';

export type ChangePasswordParams = {
  identity: CurrentIdentity;
  currentPassword: string;
  newPassword: string;
  client: ClientInfo;
};

export async function changePasswordFlow(
  deps: AuthDeps,
  params: ChangePasswordParams,
  signal: AbortSignal,
): Promise<{ revokedSessions: number }> {
  const { client } = params;

  const policy = validatePassword(params.newPassword, { minLength: deps.policy.passwordMinLength });
  if (!policy.ok) throw AuthErrors.weakPassword(policy.violations);

  const identity = await deps.credentialStore.findById(params.identity.id);
  if (!identity) throw SecurityErrors.sessionRevoked();

  const lockId = emailLockId(emailKey(deps.tokenHasher, identity.email));

  const lock = await deps.emailGovernor.isLocked(lockId);
  if (lock.locked) throw AuthErrors.accountLocked(lock.retryAfterSeconds);

  const currentValid = await deps.passwordHasher.verify(params.currentPassword, identity.passwordHash);
  if (!currentValid) {
    await deps.emailGovernor.recordFailure(lockId);
    throw AuthErrors.invalidCredentials();
  }

  const passwordHash = await deps.passwordHasher.hash(params.newPassword);

  signal.throwIfAborted();

  await deps.credentialStore.updatePasswordHash({
    identityId: identity.id,
    passwordHash,
    changedAt: new Date(deps.clock()),
  });

  const revokedSessions = await endAllSessions(deps, identity.id);
  await deps.emailGovernor.clear(lockId);

  await auditPasswordChanged(
    new AuditWriter(deps.auditRepo, {
      userId: identity.id,
      requestId: client.requestId,
      ip: client.ip,
      userAgent: client.userAgent,
    }),
    { revokedSessions },
  );

  deps.logger.info('auth.password.changed', {
    flow: 'auth.password.change',
    requestId: client.requestId,
    identityId: identity.id,
    revokedSessions,
  });

  return { revokedSessions };
}
