/**
 * backend/src/modules/auth/flows/otp/verify-otp-flow.ts
 *
 * WHY:
 * - Consumes an email-verification code and stamps email_verified_at.
 *
 * RULES:
 * - Throttled per email key (hard 429).
 * - Unknown email reads as OTP_EXPIRED (nothing live to check against).
 */

import { AuditWriter } from '../../../../shared/audit/audit.writer';
import type { ClientInfo } from '../../../../shared/http/client-info';
import { RateLimiter } from '../../../../shared/security/rate-limit';

import { auditOtpFailed, auditOtpVerified } from '../../auth.audit';
import { AUTH_IDENTIFIER_SCOPES, type PublicOtpPurpose } from '../../auth.constants';
import type { AuthDeps } from '../../auth.deps';
import { AuthErrors } from '../../auth.errors';
import { emailKey, normalizeEmail } from '../../helpers/email-identity';

export type VerifyOtpParams = {
  email: string;
  purpose: PublicOtpPurpose;
  code: string;
  client: ClientInfo;
};

export async function verifyOtpFlow(deps: AuthDeps, params: VerifyOtpParams): Promise<void> {
  const { client } = params;
  const email = normalizeEmail(params.email);
  const key = emailKey(deps.tokenHasher, email);

  await deps.rateLimiter.hitOrThrow(
    RateLimiter.identifierKey(AUTH_IDENTIFIER_SCOPES.otpVerify, key),
    deps.policy.rateLimits.otpVerify,
  );

  const identity = await deps.credentialStore.findByEmail(email);
  if (!identity) throw AuthErrors.otpExpired();

  const audit = new AuditWriter(deps.auditRepo, {
    userId: identity.id,
    requestId: client.requestId,
    ip: client.ip,
    userAgent: client.userAgent,
  });

  const outcome = await deps.otpEngine.verify({
    identityId: identity.id,
    purpose: params.purpose,
    code: params.code,
  });

  if (outcome !== 'ok') {
    await auditOtpFailed(audit, { purpose: params.purpose, outcome });
    throw outcome === 'expired' ? AuthErrors.otpExpired() : AuthErrors.otpInvalid();
  }

  await deps.credentialStore.markEmailVerified({ identityId: identity.id, at: new Date(deps.clock()) });
  await auditOtpVerified(audit, { purpose: params.purpose });

  deps.logger.info('auth.otp.verified', {
    flow: 'auth.otp',
    requestId: client.requestId,
    identityId: identity.id,
    purpose: params.purpose,
  });
}
