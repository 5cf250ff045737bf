/**
 * backend/src/modules/auth/flows/password-reset/reset-password-flow.ts
 *
 * WHY:
 * - Deep module for consuming a password reset token and setting a new password.
 *
 * RULES:
 * - Rate limit by IP (hard 429).
 * - Token is one-time use; invalid, expired and used tokens return the same error.
 * - Every live session of the identity is revoked after a successful reset, and
 *   the email lockout counter is cleared (the owner proved control of the inbox).
 */

import { AuditWriter } from '../../../../shared/audit/audit.writer';
import type { ClientInfo } from '../../../../shared/http/client-info';
import { validatePassword } from '../../../../shared/security/password-policy';
import { RateLimiter } from '../../../../shared/security/rate-limit';

import { auditPasswordResetCompleted } from '../../auth.audit';
import { AUTH_ENDPOINTS, AUTH_RATE_LIMITS } from '../../auth.constants';
import type { AuthDeps } from '../../auth.deps';
import { AuthErrors } from '../../auth.errors';
import { endAllSessions } from '../../helpers/end-all-sessions';
import { emailKey, emailLockId } from '../../helpers/email-identity';

export type ResetPasswordParams = {
  token: string;
  newPassword: string;
  client: ClientInfo;
};

export async function resetPasswordFlow(
  deps: AuthDeps,
  params: ResetPasswordParams,
  signal: AbortSignal,
): Promise<void> {
  const { client } = params;

  await deps.rateLimiter.hitOrThrow(
    RateLimiter.endpointKey(client.ip, AUTH_ENDPOINTS.resetPassword),
    AUTH_RATE_LIMITS.resetPassword.perIp,
  );

  const policy = validatePassword(params.newPassword, { minLength: deps.policy.passwordMinLength });
  if (!policy.ok) throw AuthErrors.weakPassword(policy.violations);

  const tokenHash = deps.tokenHasher.hash(params.token);
  const now = new Date(deps.clock());

  const resetToken = await deps.credentialStore.findValidResetToken({ tokenHash, now });
  if (!resetToken) throw AuthErrors.resetTokenInvalid();

  const identity = await deps.credentialStore.findById(resetToken.identityId);
  if (!identity) throw AuthErrors.resetTokenInvalid();

  const passwordHash = await deps.passwordHasher.hash(params.newPassword);

  signal.throwIfAborted();

  const consumed = await deps.credentialStore.completePasswordReset({
    tokenHash,
    identityId: identity.id,
    passwordHash,
    at: now,
  });
  if (!consumed) throw AuthErrors.resetTokenInvalid();

  const revokedSessions = await endAllSessions(deps, identity.id);
  await deps.emailGovernor.clear(emailLockId(emailKey(deps.tokenHasher, identity.email)));

  await auditPasswordResetCompleted(
    new AuditWriter(deps.auditRepo, {
      userId: identity.id,
      requestId: client.requestId,
      ip: client.ip,
      userAgent: client.userAgent,
    }),
    { revokedSessions },
  );

  deps.logger.info('auth.password_reset.completed', {
    flow: 'auth.password_reset',
    requestId: client.requestId,
    identityId: identity.id,
    revokedSessions,
  });
}
