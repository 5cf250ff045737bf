/**
 * src/modules/auth/auth.deps.ts
 *
 * WHY:
 * - Every auth flow takes the same dependency bag. Declaring it once keeps the
 *   service, the flows and the tests in agreement about what is injected.
 *
 * RULES:
 * - Interfaces and collaborators only. No config object: the policy slice is
 *   copied out of AppConfig by the module factory.
 */

import type { RateRule } from '../../app/config';
import type { AuditRepo } from '../../shared/audit/audit.repo';
import type { Logger } from '../../shared/logger/logger';
import type { Queue } from '../../shared/messaging/queue';
import type { LoginAttemptGovernor } from '../../shared/security/login-attempt-governor';
import type { OtpEngine } from '../../shared/security/otp-engine';
import type { PasswordHasher } from '../../shared/security/password-hasher';
import type { RateLimiter } from '../../shared/security/rate-limit';
import type { TokenHasher } from '../../shared/security/token-hasher';
import type { TokenService } from '../../shared/security/token-service';
import type { PermissionResolver } from '../access/permission-resolver';
import type { CredentialStore } from '../identities/credential-store';
import type { SessionRegistry } from '../sessions/session-registry';

export type AuthPolicy = {
  passwordMinLength: number;
  resetTtlSeconds: number;
  rateLimits: {
    login: RateRule;
    refresh: RateRule;
    otpSend: RateRule;
    otpVerify: RateRule;
  };
};

export type AuthDeps = {
  credentialStore: CredentialStore;
  passwordHasher: PasswordHasher;
  tokenHasher: TokenHasher;
  tokenService: TokenService;
  otpEngine: OtpEngine;

  /** Consecutive failures per email key. */
  emailGovernor: LoginAttemptGovernor;
  /** Consecutive failures per client IP (higher threshold). */
  ipGovernor: LoginAttemptGovernor;

  rateLimiter: RateLimiter;
  sessionRegistry: SessionRegistry;
  permissionResolver: PermissionResolver;
  auditRepo: AuditRepo;
  queue: Queue;
  logger: Logger;
  policy: AuthPolicy;
  clock: () => number;
};
