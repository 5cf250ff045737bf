/**
 * backend/src/modules/auth/flows/two-factor/verify-two-factor-flow.ts
 *
 * WHY:
 * - Completes a login that returned TWO_FACTOR_REQUIRED: a correct code for the
 *   `two_factor` purpose yields the token pair.
 *
 * RULES:
 * - Throttled per email key before any lookup.
 * - Unknown email, two-factor disabled and "no live code" all read as OTP_EXPIRED,
 *   so the endpoint says nothing about which emails exist.
 * - Codes are single-use and purpose-scoped (OtpEngine owns that).
 */

import { AuditWriter } from '../../../../shared/audit/audit.writer';
import type { ClientInfo } from '../../../../shared/http/client-info';
import { RateLimiter } from '../../../../shared/security/rate-limit';

import {
  auditLoginSuccess,
  auditTwoFactorFailed,
  auditTwoFactorVerified,
} from '../../auth.audit';
import { AUTH_IDENTIFIER_SCOPES } from '../../auth.constants';
import type { AuthDeps } from '../../auth.deps';
import { AuthErrors } from '../../auth.errors';
import type { AuthenticatedResult } from '../../auth.types';
import { buildLoginResult } from '../../helpers/build-login-result';
import { emailKey, normalizeEmail } from '../../helpers/email-identity';
import { issueSession } from '../../helpers/issue-session';

export type VerifyTwoFactorParams = {
  email: string;
  code: string;
  client: ClientInfo;
};

export async function verifyTwoFactorFlow(
  deps: AuthDeps,
  params: VerifyTwoFactorParams,
  signal: AbortSignal,
): Promise<AuthenticatedResult> {
  const { client } = params;
  const email = normalizeEmail(params.email);
  const key = emailKey(deps.tokenHasher, email);

  await deps.rateLimiter.hitOrThrow(
    RateLimiter.identifierKey(AUTH_IDENTIFIER_SCOPES.twoFactorVerify, key),
    deps.policy.rateLimits.otpVerify,
  );

  let audit = new AuditWriter(deps.auditRepo, {
    requestId: client.requestId,
    ip: client.ip,
    userAgent: client.userAgent,
  });

  const identity = await deps.credentialStore.findByEmail(email);
  if (!identity || !identity.twoFactorEnabled) {
    await auditTwoFactorFailed(audit, { outcome: 'expired' });
    throw AuthErrors.otpExpired();
  }

  audit = audit.withContext({ userId: identity.id });

  const outcome = await deps.otpEngine.verify({
    identityId: identity.id,
    purpose: 'two_factor',
    code: params.code,
  });

  if (outcome !== 'ok') {
    deps.logger.warn('auth.two_factor.failed', {
      flow: 'auth.two_factor',
      requestId: client.requestId,
      identityId: identity.id,
      outcome,
    });
    await auditTwoFactorFailed(audit, { outcome });
    throw outcome === 'expired' ? AuthErrors.otpExpired() : AuthErrors.otpInvalid();
  }

  if (identity.status !== 'active') {
    throw AuthErrors.accountInactive();
  }

  const { pair, access } = await issueSession(deps, { identity, client, signal });

  try {
    await deps.credentialStore.recordSuccessfulLogin({
      identityId: identity.id,
      ip: client.ip,
      at: new Date(deps.clock()),
    });
  } catch (err) {
    deps.logger.warn('auth.two_factor.record_success_failed', {
      flow: 'auth.two_factor',
      message: err instanceof Error ? err.message : String(err),
    });
  }

  await auditTwoFactorVerified(audit, { sessionId: pair.sessionId });
  await auditLoginSuccess(audit, { sessionId: pair.sessionId, twoFactor: true });

  deps.logger.info('auth.two_factor.verified', {
    flow: 'auth.two_factor',
    requestId: client.requestId,
    identityId: identity.id,
    sessionId: pair.sessionId,
  });

  return buildLoginResult({ pair, identity, access });
}
