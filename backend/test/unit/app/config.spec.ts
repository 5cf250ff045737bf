import { describe, it, expect } from 'vitest';
import { buildConfig } from '../../../src/app/config';

function env(overrides: Record<string, string> = {}): NodeJS.ProcessEnv {
  return {
    DATABASE_URL: 'postgres://hr:hr@localhost:5432/hr',
    REDIS_URL: 'redis://localhost:6379',
    JWT_ACCESS_SECRET: 'test-access-secret-0123456789abcdef',
    JWT_REFRESH_SECRET: 'test-refresh-secret-0123456789abcdef',
    OTP_HMAC_KEY: 'test-otp-hmac-key-0123456789abcdef',
    ...overrides,
  };
}

describe('buildConfig', () => {
  it('applies the documented defaults', () => {
    const config = buildConfig(env());

    expect(config.nodeEnv).toBe('development');
    expect(config.trustProxy).toBe(false);
    expect(config.password).toEqual({ bcryptCost: 12, minLength: 8, resetTtlSeconds: 3600 });
    expect(config.jwt).toMatchObject({
      accessTtlSeconds: 900,
      refreshTtlSeconds: 604800,
      issuer: 'hr-management-system',
      audience: 'hr-management-users',
      clockToleranceSeconds: 5,
    });
    expect(config.otp).toMatchObject({ length: 6, ttlSeconds: 300, maxAttempts: 5 });
    expect(config.lockout).toEqual({ maxAttempts: 5, maxAttemptsPerIp: 20, durationSeconds: 1800 });
    expect(config.rateLimits).toEqual({
      ipPerMinute: 100,
      login: { limit: 20, windowSeconds: 900 },
      otpSend: { limit: 3, windowSeconds: 300 },
      otpVerify: { limit: 10, windowSeconds: 300 },
      refresh: { limit: 30, windowSeconds: 60 },
    });
    expect(config.permissionCacheTtlSeconds).toBe(300);
    expect(config.requestTimeoutMs).toBe(10000);
    expect(config.seed.enabled).toBe(false);
  });

  it('parses boolean flags literally', () => {
    expect(buildConfig(env({ TRUST_PROXY: 'true' })).trustProxy).toBe(true);
    expect(buildConfig(env({ SEED_ON_START: 'false' })).seed.enabled).toBe(false);
    expect(() => buildConfig(env({ SEED_ON_START: 'yes' }))).toThrow();
  });

  it('coerces numeric settings', () => {
    const config = buildConfig(env({ LOGIN_MAX_ATTEMPTS: '3', JWT_ACCESS_TTL_SECONDS: '300' }));

    expect(config.lockout.maxAttempts).toBe(3);
    expect(config.jwt.accessTtlSeconds).toBe(300);
  });

  it('refuses one secret for both token types', () => {
    expect(() =>
      buildConfig(
        env({
          JWT_ACCESS_SECRET: 'test-shared-secret-0123456789abcdef',
          JWT_REFRESH_SECRET: 'test-shared-secret-0123456789abcdef',
        }),
      ),
    ).toThrow(/JWT_ACCESS_SECRET and JWT_REFRESH_SECRET must differ/);
  });

  it('refuses short secrets', () => {
    expect(() => buildConfig(env({ OTP_HMAC_KEY: 'too-short' }))).toThrow(
      /must be at least 32 characters/,
    );
  });

  it('refuses a permission cache TTL that outlives the refresh token', () => {
    expect(() =>
      buildConfig(env({ PERMISSION_CACHE_TTL_SECONDS: '700000', JWT_REFRESH_TTL_SECONDS: '604800' })),
    ).toThrow(/PERMISSION_CACHE_TTL_SECONDS must be shorter than JWT_REFRESH_TTL_SECONDS/);
  });

  it('refuses a bcrypt work factor below 10', () => {
    expect(() => buildConfig(env({ BCRYPT_COST: '9' }))).toThrow();
  });

  it('requires the connection strings', () => {
    const { DATABASE_URL: _omitted, ...rest } = env();

    expect(() => buildConfig(rest)).toThrow();
  });
});
