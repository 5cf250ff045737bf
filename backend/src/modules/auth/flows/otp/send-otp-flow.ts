/**
 * backend/src/modules/auth/flows/otp/send-otp-flow.ts
 *
 * WHY:
 * - Public "send me a code" endpoint for email verification.
 *
 * RULES:
 * - Throttled per email key (hard 429) before any lookup.
 * - Unknown or inactive identities get the same silent success as real ones.
 * - Only public purposes reach this flow; two-factor codes are issued by login.
 */

import { AuditWriter } from '../../../../shared/audit/audit.writer';
import type { ClientInfo } from '../../../../shared/http/client-info';
import { RateLimiter } from '../../../../shared/security/rate-limit';

import { auditOtpSent } from '../../auth.audit';
import { AUTH_IDENTIFIER_SCOPES, type PublicOtpPurpose } from '../../auth.constants';
import type { AuthDeps } from '../../auth.deps';
import { emailKey, normalizeEmail } from '../../helpers/email-identity';

export type SendOtpParams = {
  email: string;
  purpose: PublicOtpPurpose;
  client: ClientInfo;
};

export async function sendOtpFlow(deps: AuthDeps, params: SendOtpParams): Promise<void> {
  const { client } = params;
  const email = normalizeEmail(params.email);
  const key = emailKey(deps.tokenHasher, email);

  await deps.rateLimiter.hitOrThrow(
    RateLimiter.identifierKey(AUTH_IDENTIFIER_SCOPES.otpSend, key),
    deps.policy.rateLimits.otpSend,
  );

  const identity = await deps.credentialStore.findByEmail(email);
  if (!identity || identity.status !== 'active') {
    deps.logger.info('auth.otp.send_skipped', {
      flow: 'auth.otp',
      requestId: client.requestId,
      emailKey: key,
    });
    return;
  }

  await deps.otpEngine.issue({
    identityId: identity.id,
    email: identity.email,
    purpose: params.purpose,
  });

  await auditOtpSent(
    new AuditWriter(deps.auditRepo, {
      userId: identity.id,
      requestId: client.requestId,
      ip: client.ip,
      userAgent: client.userAgent,
    }),
    { purpose: params.purpose },
  );
}
