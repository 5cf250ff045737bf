import { buildApp } from '../../src/app/build-app';
import type { AppConfig } from '../../src/app/config';
import type { AppInfra } from '../../src/app/di';
import type { Cache } from '../../src/shared/cache/cache';
import { InMemCache } from '../../src/shared/cache/inmem-cache';
import { InMemQueue } from '../../src/shared/messaging/inmem-queue';
import type { IdentityWithHash } from '../../src/modules/identities/identity.types';
import {
  InMemoryAccessStore,
  InMemoryAuditRepo,
  InMemoryCredentialStore,
  InMemorySessionRepo,
  type NewIdentity,
} from './in-memory-stores';
import { createTestClock } from './test-clock';

export const TEST_ACCESS_SECRET = 'test-access-secret-0123456789abcdef';
export const TEST_REFRESH_SECRET = 'test-refresh-secret-0123456789abcdef';

/**
 * Config built directly (not through the env schema) so tests can use the bcrypt
 * minimum work factor and tight limits.
 */
export function testConfig(): AppConfig {
  return {
    nodeEnv: 'test',
    port: 0,
    trustProxy: false,
    databaseUrl: 'postgres://unused',
    redisUrl: 'redis://unused',

    logLevel: 'error',
    serviceName: 'hr-identity-test',

    password: { bcryptCost: 4, minLength: 8, resetTtlSeconds: 3600 },

    jwt: {
      accessSecret: TEST_ACCESS_SECRET,
      refreshSecret: TEST_REFRESH_SECRET,
      accessTtlSeconds: 900,
      refreshTtlSeconds: 604800,
      issuer: 'hr-management-system',
      audience: 'hr-management-users',
      clockToleranceSeconds: 5,
    },

    otp: {
      length: 6,
      ttlSeconds: 300,
      maxAttempts: 5,
      hmacKey: 'test-otp-hmac-key-0123456789abcdef',
    },

    lockout: { maxAttempts: 5, maxAttemptsPerIp: 20, durationSeconds: 1800 },

    rateLimits: {
      ipPerMinute: 1000,
      login: { limit: 100, windowSeconds: 900 },
      otpSend: { limit: 3, windowSeconds: 300 },
      otpVerify: { limit: 10, windowSeconds: 300 },
      refresh: { limit: 100, windowSeconds: 60 },
    },

    permissionCacheTtlSeconds: 300,
    requestTimeoutMs: 10000,

    seed: { enabled: false, adminEmail: 'admin@example.com', adminPassword: 'Change-me-1!' },
  };
}

/**
 * WHY:
 * - Build the real Fastify app for E2E-style tests using app.inject().
 * - No database, Redis or network: in-memory stores and InMemCache sit behind
 *   the same interfaces, and one TestClock drives tokens, cache TTLs and limits.
 */
export async function buildTestApp(
  opts: { config?: (base: AppConfig) => AppConfig; cache?: Cache } = {},
) {
  const config = opts.config ? opts.config(testConfig()) : testConfig();
  const clock = createTestClock();

  const credentials = new InMemoryCredentialStore();
  const access = new InMemoryAccessStore();
  const sessions = new InMemorySessionRepo();
  const audit = new InMemoryAuditRepo();
  const queue = new InMemQueue();
  const cache = opts.cache ?? new InMemCache({ now: clock.now });

  const infra: AppInfra = {
    db: null,
    cache,
    credentialStore: credentials,
    accessStore: access,
    sessionRepo: sessions,
    auditRepo: audit,
    queue,
    clock: clock.now,
    close: async () => {},
  };

  const built = await buildApp(config, infra);

  async function seedIdentity(
    input: Omit<NewIdentity, 'passwordHash'> & { password: string; roles?: string[] },
  ): Promise<IdentityWithHash> {
    const { password, roles = [], ...rest } = input;
    const passwordHash = await built.deps.passwordHasher.hash(password);
    const identity = credentials.add({ ...rest, passwordHash });
    for (const role of roles) access.give(identity.id, role);
    return identity;
  }

  return {
    app: built.app,
    deps: built.deps,
    config,
    clock,
    cache,
    queue,
    stores: { credentials, access, sessions, audit },
    seedIdentity,
    close: built.close,
  };
}

export type TestApp = Awaited<ReturnType<typeof buildTestApp>>;
