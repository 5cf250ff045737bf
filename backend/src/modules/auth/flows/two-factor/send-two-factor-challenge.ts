/**
 * backend/src/modules/auth/flows/two-factor/send-two-factor-challenge.ts
 *
 * WHY:
 * - Second half of a password login for identities with two-factor enabled:
 *   issue a purpose-scoped OTP and hand the caller a challenge instead of tokens.
 *
 * RULES:
 * - The code goes to the queue only; the response carries the expiry, never the code.
 * - Nothing is issued or dispatched once the request deadline has passed.
 */

import type { AuditWriter } from '../../../../shared/audit/audit.writer';
import type { Identity } from '../../../identities/identity.types';
import { auditTwoFactorChallengeSent } from '../../auth.audit';
import type { AuthDeps } from '../../auth.deps';
import type { TwoFactorChallenge } from '../../auth.types';

export async function sendTwoFactorChallenge(
  deps: Pick<AuthDeps, 'otpEngine'>,
  params: { identity: Identity; audit: AuditWriter; signal: AbortSignal },
): Promise<TwoFactorChallenge> {
  const { identity } = params;

  params.signal.throwIfAborted();

  const { expiresAt } = await deps.otpEngine.issue({
    identityId: identity.id,
    email: identity.email,
    purpose: 'two_factor',
  });

  await auditTwoFactorChallengeSent(params.audit);

  return {
    status: 'TWO_FACTOR_REQUIRED',
    email: identity.email,
    expiresAt: expiresAt.toISOString(),
  };
}
