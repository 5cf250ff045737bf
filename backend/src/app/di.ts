/**
 * src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for the whole app.
 * - Creates infra clients ONCE (db, redis) and shares them safely.
 * - Infra is a separate seam (AppInfra): production wires Postgres + Redis,
 *   tests wire in-memory stores and InMemCache behind the same interfaces.
 *
 * RULES:
 * - No business logic here.
 * - No HTTP logic here.
 * - Every tunable comes from AppConfig; nothing below reads process.env.
 */

import type { AppConfig } from './config';
import { createDb, type Db } from '../shared/db/db';

import { RedisCache } from '../shared/cache/redis-cache';
import type { Cache } from '../shared/cache/cache';

import { RateLimiter } from '../shared/security/rate-limit';
import type { TokenHasher } from '../shared/security/token-hasher';
import { Sha256TokenHasher } from '../shared/security/sha256-token-hasher';

import type { PasswordHasher } from '../shared/security/password-hasher';
import { BcryptPasswordHasher } from '../shared/security/bcrypt-password-hasher';

import { HmacSha256KeyedHasher } from '../shared/security/keyed-hasher';
import { OtpEngine } from '../shared/security/otp-engine';
import { LoginAttemptGovernor } from '../shared/security/login-attempt-governor';
import { TokenService } from '../shared/security/token-service';

import { logger } from '../shared/logger/logger';
import type { Logger } from '../shared/logger/logger';

import { KyselyAuditRepo, type AuditRepo } from '../shared/audit/audit.repo';
import { RevocationList } from '../shared/session/revocation-list';

import { InMemQueue } from '../shared/messaging/inmem-queue';
import type { Queue } from '../shared/messaging/queue';

import type { CredentialStore } from '../modules/identities/credential-store';
import { KyselyCredentialStore } from '../modules/identities/dal/identity.repo';

import type { AccessStore } from '../modules/access/access-store';
import { KyselyAccessStore } from '../modules/access/dal/access.repo';
import { createAccessModule, type AccessModule } from '../modules/access/access.module';

import type { SessionRepo } from '../modules/sessions/session.repo';
import { KyselySessionRepo } from '../modules/sessions/dal/session.repo';
import { createSessionModule, type SessionModule } from '../modules/sessions/session.module';

import { createAuthModule, type AuthModule } from '../modules/auth/auth.module';

// ── Infra seam ────────────────────────────────────────────────

export type AppInfra = {
  /** Present only when backed by Postgres (dev seed needs it). */
  db: Db | null;
  cache: Cache;
  credentialStore: CredentialStore;
  accessStore: AccessStore;
  sessionRepo: SessionRepo;
  auditRepo: AuditRepo;
  queue: Queue;
  /** Milliseconds since epoch; tests pin it. */
  clock?: () => number;
  close: () => Promise<void>;
};

export async function createInfra(config: AppConfig): Promise<AppInfra> {
  const db = createDb(config.databaseUrl);

  // Redis is mandatory (dev + prod)
  const redis = await RedisCache.connect(config.redisUrl);

  return {
    db,
    cache: redis,
    credentialStore: new KyselyCredentialStore(db),
    accessStore: new KyselyAccessStore(db),
    sessionRepo: new KyselySessionRepo(db),
    auditRepo: new KyselyAuditRepo(db),

    // In-process queue; swap for a mail/SMS transport adapter here.
    queue: new InMemQueue(),

    close: async () => {
      await redis.close();
      await db.destroy();
    },
  };
}

// ── Dependency graph ──────────────────────────────────────────

export type AppDeps = {
  db: Db | null;
  cache: Cache;
  logger: Logger;

  /** Flow limiter (login, refresh, OTP, reset). Fails closed. */
  rateLimiter: RateLimiter;
  /** Global per-IP limiter. Fails open. */
  ipRateLimiter: RateLimiter;

  tokenHasher: TokenHasher;
  passwordHasher: PasswordHasher;
  tokenService: TokenService;
  revocationList: RevocationList;
  otpEngine: OtpEngine;

  auditRepo: AuditRepo;
  queue: Queue;

  // modules
  access: AccessModule;
  sessions: SessionModule;
  auth: AuthModule;

  // lifecycle
  close: () => Promise<void>;
};

export function buildDeps(config: AppConfig, infra: AppInfra): AppDeps {
  const clock = infra.clock ?? Date.now;

  const tokenHasher: TokenHasher = new Sha256TokenHasher();
  const passwordHasher: PasswordHasher = new BcryptPasswordHasher({
    cost: config.password.bcryptCost,
  });

  const rateLimiter = new RateLimiter(infra.cache, { prefix: 'rl', logger, clock });
  const ipRateLimiter = new RateLimiter(infra.cache, {
    prefix: 'rl',
    failOpen: true,
    logger,
    clock,
  });

  const tokenService = new TokenService({
    accessSecret: config.jwt.accessSecret,
    refreshSecret: config.jwt.refreshSecret,
    accessTtlSeconds: config.jwt.accessTtlSeconds,
    refreshTtlSeconds: config.jwt.refreshTtlSeconds,
    issuer: config.jwt.issuer,
    audience: config.jwt.audience,
    clockToleranceSeconds: config.jwt.clockToleranceSeconds,
    clock,
  });

  const revocationList = new RevocationList(infra.cache, {
    graceSeconds: config.jwt.clockToleranceSeconds,
  });

  const otpEngine = new OtpEngine(
    {
      cache: infra.cache,
      hasher: new HmacSha256KeyedHasher(config.otp.hmacKey),
      queue: infra.queue,
      clock,
    },
    {
      length: config.otp.length,
      ttlSeconds: config.otp.ttlSeconds,
      maxAttempts: config.otp.maxAttempts,
    },
  );

  const emailGovernor = new LoginAttemptGovernor(infra.cache, {
    maxAttempts: config.lockout.maxAttempts,
    lockoutSeconds: config.lockout.durationSeconds,
  });
  const ipGovernor = new LoginAttemptGovernor(infra.cache, {
    maxAttempts: config.lockout.maxAttemptsPerIp,
    lockoutSeconds: config.lockout.durationSeconds,
  });

  // modules (no HTTP / no business logic here)
  const access = createAccessModule({
    cache: infra.cache,
    accessStore: infra.accessStore,
    credentialStore: infra.credentialStore,
    auditRepo: infra.auditRepo,
    logger,
    permissionCacheTtlSeconds: config.permissionCacheTtlSeconds,
  });

  const sessions = createSessionModule({
    sessionRepo: infra.sessionRepo,
    revocationList,
    logger,
    clock,
  });

  const auth = createAuthModule({
    credentialStore: infra.credentialStore,
    passwordHasher,
    tokenHasher,
    tokenService,
    otpEngine,
    emailGovernor,
    ipGovernor,
    rateLimiter,
    sessionRegistry: sessions.sessionRegistry,
    permissionResolver: access.permissionResolver,
    auditRepo: infra.auditRepo,
    queue: infra.queue,
    logger,
    policy: {
      passwordMinLength: config.password.minLength,
      resetTtlSeconds: config.password.resetTtlSeconds,
      rateLimits: {
        login: config.rateLimits.login,
        refresh: config.rateLimits.refresh,
        otpSend: config.rateLimits.otpSend,
        otpVerify: config.rateLimits.otpVerify,
      },
    },
    clock,
    requestTimeoutMs: config.requestTimeoutMs,
  });

  return {
    db: infra.db,
    cache: infra.cache,
    logger,
    rateLimiter,
    ipRateLimiter,
    tokenHasher,
    passwordHasher,
    tokenService,
    revocationList,
    otpEngine,
    auditRepo: infra.auditRepo,
    queue: infra.queue,
    access,
    sessions,
    auth,
    close: infra.close,
  };
}
