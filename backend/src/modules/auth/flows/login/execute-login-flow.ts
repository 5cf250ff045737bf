/**
 * backend/src/modules/auth/flows/login/execute-login-flow.ts
 *
 * WHY:
 * - "Flow" = deep module for one end-to-end use-case.
 * - Login owns the ordering that makes brute force expensive and enumeration
 *   impossible: throttle, lockout check, constant-work lookup, record failure
 *   before reporting it.
 *
 * ORDER:
 *  1. endpoint rate limit (per IP)
 *  2. governor lock check (email key, then IP)
 *  3. lookup; unknown identity runs the timing equalizer
 *  4. password verify; failure is recorded (cache + durable) then reported
 *  5. durable locked_until
 *  6. status must be active
 *  7. clear the email and IP counters
 *  8. two-factor challenge, or tokens + session
 *
 * RULES:
 * - No HTTP concerns here (controller handles that).
 * - Unknown email and wrong password produce the same error and the same work.
 * - Failure writes (counters) are critical: their errors propagate.
 * - last_login and hash upgrades are best-effort and only logged on failure.
 */

import { AuditWriter } from '../../../../shared/audit/audit.writer';
import type { ClientInfo } from '../../../../shared/http/client-info';
import { RateLimiter } from '../../../../shared/security/rate-limit';
import type { IdentityWithHash } from '../../../identities/identity.types';

import { auditLoginFailed, auditLoginLocked, auditLoginSuccess } from '../../auth.audit';
import { AUTH_ENDPOINTS } from '../../auth.constants';
import type { AuthDeps } from '../../auth.deps';
import { AuthErrors } from '../../auth.errors';
import type { LoginResult } from '../../auth.types';
import { buildLoginResult } from '../../helpers/build-login-result';
import {
  emailDomain,
  emailKey,
  emailLockId,
  ipLockId,
  normalizeEmail,
} from '../../helpers/email-identity';
import { issueSession } from '../../helpers/issue-session';
import { sendTwoFactorChallenge } from '../two-factor/send-two-factor-challenge';

export type LoginParams = {
  email: string;
  password: string;
  client: ClientInfo;
};

type LoginContext = {
  email: string;
  emailKey: string;
  emailLockId: string;
  ipLockId: string;
  audit: AuditWriter;
  requestId: string;
};

async function assertNotLocked(deps: AuthDeps, ctx: LoginContext): Promise<void> {
  const byEmail = await deps.emailGovernor.isLocked(ctx.emailLockId);
  const status = byEmail.locked ? byEmail : await deps.ipGovernor.isLocked(ctx.ipLockId);
  if (!status.locked) return;

  const scope = byEmail.locked ? 'email' : 'ip';

  deps.logger.warn('auth.login.locked', {
    flow: 'auth.login',
    requestId: ctx.requestId,
    emailKey: ctx.emailKey,
    scope,
    retryAfterSeconds: status.retryAfterSeconds,
  });

  await auditLoginLocked(ctx.audit, {
    emailKey: ctx.emailKey,
    scope,
    retryAfterSeconds: status.retryAfterSeconds,
  });

  throw AuthErrors.accountLocked(status.retryAfterSeconds);
}

async function recordFailure(
  deps: AuthDeps,
  ctx: LoginContext,
  identity: IdentityWithHash | undefined,
  reason: 'unknown_identity' | 'wrong_password',
): Promise<void> {
  const attempts = await deps.emailGovernor.recordFailure(ctx.emailLockId);
  await deps.ipGovernor.recordFailure(ctx.ipLockId);

  let audit = ctx.audit;

  if (identity) {
    const now = deps.clock();
    const lockUntil =
      attempts >= deps.emailGovernor.maxAttempts
        ? new Date(now + deps.emailGovernor.lockoutSeconds * 1000)
        : null;

    await deps.credentialStore.recordFailedLogin({
      identityId: identity.id,
      lockUntil,
      at: new Date(now),
    });

    audit = audit.withContext({ userId: identity.id });
  }

  deps.logger.warn('auth.login.failed', {
    flow: 'auth.login',
    requestId: ctx.requestId,
    emailDomain: emailDomain(ctx.email),
    emailKey: ctx.emailKey,
    reason,
    attempts,
  });

  await auditLoginFailed(audit, { emailKey: ctx.emailKey, reason, attempts });
}

async function bestEffort(deps: AuthDeps, event: string, work: () => Promise<void>): Promise<void> {
  try {
    await work();
  } catch (err) {
    deps.logger.warn(event, {
      flow: 'auth.login',
      message: err instanceof Error ? err.message : String(err),
    });
  }
}

export async function executeLoginFlow(
  deps: AuthDeps,
  params: LoginParams,
  signal: AbortSignal,
): Promise<LoginResult> {
  const { client } = params;
  const email = normalizeEmail(params.email);
  const key = emailKey(deps.tokenHasher, email);

  const ctx: LoginContext = {
    email,
    emailKey: key,
    emailLockId: emailLockId(key),
    ipLockId: ipLockId(client.ip),
    requestId: client.requestId,
    audit: new AuditWriter(deps.auditRepo, {
      requestId: client.requestId,
      ip: client.ip,
      userAgent: client.userAgent,
    }),
  };

  deps.logger.info('auth.login.start', {
    flow: 'auth.login',
    requestId: client.requestId,
    emailDomain: emailDomain(email),
    emailKey: key,
  });

  await deps.rateLimiter.hitOrThrow(
    RateLimiter.endpointKey(client.ip, AUTH_ENDPOINTS.login),
    deps.policy.rateLimits.login,
  );

  await assertNotLocked(deps, ctx);

  const identity = await deps.credentialStore.findByEmail(email);
  if (!identity) {
    await deps.passwordHasher.equalizeTiming(params.password);
    await recordFailure(deps, ctx, undefined, 'unknown_identity');
    throw AuthErrors.invalidCredentials();
  }

  const passwordValid = await deps.passwordHasher.verify(params.password, identity.passwordHash);
  if (!passwordValid) {
    await recordFailure(deps, ctx, identity, 'wrong_password');
    throw AuthErrors.invalidCredentials();
  }

  const audit = ctx.audit.withContext({ userId: identity.id });
  const now = deps.clock();

  if (identity.lockedUntil && identity.lockedUntil.getTime() > now) {
    const retryAfterSeconds = Math.ceil((identity.lockedUntil.getTime() - now) / 1000);
    await auditLoginLocked(audit, { emailKey: key, scope: 'account', retryAfterSeconds });
    throw AuthErrors.accountLocked(retryAfterSeconds);
  }

  if (identity.status !== 'active') {
    await auditLoginFailed(audit, { emailKey: key, reason: 'inactive' });
    throw AuthErrors.accountInactive();
  }

  await deps.emailGovernor.clear(ctx.emailLockId);
  await deps.ipGovernor.clear(ctx.ipLockId);

  if (identity.twoFactorEnabled) {
    const challenge = await sendTwoFactorChallenge(deps, { identity, audit, signal });

    deps.logger.info('auth.login.two_factor_required', {
      flow: 'auth.login',
      requestId: client.requestId,
      identityId: identity.id,
    });

    return challenge;
  }

  const { pair, access } = await issueSession(deps, { identity, client, signal });

  await bestEffort(deps, 'auth.login.record_success_failed', () =>
    deps.credentialStore.recordSuccessfulLogin({
      identityId: identity.id,
      ip: client.ip,
      at: new Date(now),
    }),
  );

  if (deps.passwordHasher.needsRehash(identity.passwordHash)) {
    await bestEffort(deps, 'auth.login.rehash_failed', async () => {
      const passwordHash = await deps.passwordHasher.hash(params.password);
      await deps.credentialStore.upgradePasswordHash({
        identityId: identity.id,
        passwordHash,
        at: new Date(now),
      });
    });
  }

  await auditLoginSuccess(audit, { sessionId: pair.sessionId, twoFactor: false });

  deps.logger.info('auth.login.success', {
    flow: 'auth.login',
    requestId: client.requestId,
    identityId: identity.id,
    sessionId: pair.sessionId,
  });

  return buildLoginResult({ pair, identity, access });
}
