/**
 * backend/src/modules/auth/flows/password-reset/request-password-reset-flow.ts
 *
 * WHY:
 * - Deep module for the "forgot password" use-case.
 * - Anti-enumeration: the caller always gets the same answer.
 *
 * RULES:
 * - Always returns void (controller returns 200 regardless).
 * - Silent rate-limit path is audited.
 * - Unknown and inactive identities are silent but audited.
 * - Only the token hash is stored; the raw token travels in the queued email only.
 */

import { AuditWriter } from '../../../../shared/audit/audit.writer';
import type { ClientInfo } from '../../../../shared/http/client-info';
import { RateLimiter } from '../../../../shared/security/rate-limit';
import { generateSecureToken } from '../../../../shared/security/token';

import { auditPasswordResetRequested } from '../../auth.audit';
import { AUTH_IDENTIFIER_SCOPES, AUTH_RATE_LIMITS } from '../../auth.constants';
import type { AuthDeps } from '../../auth.deps';
import { emailDomain, emailKey, normalizeEmail } from '../../helpers/email-identity';

export type RequestPasswordResetParams = {
  email: string;
  client: ClientInfo;
};

export async function requestPasswordResetFlow(
  deps: AuthDeps,
  params: RequestPasswordResetParams,
): Promise<void> {
  const { client } = params;
  const email = normalizeEmail(params.email);
  const key = emailKey(deps.tokenHasher, email);

  const audit = new AuditWriter(deps.auditRepo, {
    requestId: client.requestId,
    ip: client.ip,
    userAgent: client.userAgent,
  });

  // ── 1. Silent rate limit ─────────────────────────────────
  const withinLimit = await deps.rateLimiter.hitOrSkip(
    RateLimiter.identifierKey(AUTH_IDENTIFIER_SCOPES.forgotPassword, key),
    AUTH_RATE_LIMITS.forgotPassword.perEmail,
  );

  if (!withinLimit) {
    await auditPasswordResetRequested(audit, { outcome: 'rate_limited' });
    return;
  }

  // ── 2. Find identity ─────────────────────────────────────
  const identity = await deps.credentialStore.findByEmail(email);
  if (!identity) {
    await auditPasswordResetRequested(audit, { outcome: 'user_not_found' });
    return;
  }

  const withUser = audit.withContext({ userId: identity.id });

  if (identity.status !== 'active') {
    await auditPasswordResetRequested(withUser, { outcome: 'inactive' });
    return;
  }

  // ── 3. One live token per identity ───────────────────────
  const now = deps.clock();
  await deps.credentialStore.invalidateActiveResetTokens({ identityId: identity.id, at: new Date(now) });

  const rawToken = generateSecureToken();
  const expiresAt = new Date(now + deps.policy.resetTtlSeconds * 1000);

  await deps.credentialStore.insertPasswordResetToken({
    identityId: identity.id,
    tokenHash: deps.tokenHasher.hash(rawToken),
    expiresAt,
  });

  // ── 4. Enqueue reset email ───────────────────────────────
  await deps.queue.enqueue({
    type: 'auth.reset-password-email',
    identityId: identity.id,
    email: identity.email,
    resetToken: rawToken,
    expiresAt: expiresAt.toISOString(),
  });

  await auditPasswordResetRequested(withUser, { outcome: 'sent' });

  deps.logger.info('auth.password_reset.requested', {
    flow: 'auth.password_reset',
    requestId: client.requestId,
    emailDomain: emailDomain(email),
    emailKey: key,
  });
}
