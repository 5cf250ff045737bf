/**
 * backend/src/app/config.ts
 *
 * WHY:
 * - Central place for env parsing + validation (12-factor friendly).
 * - Every security knob (secrets, lifetimes, thresholds) is supplied from outside
 *   and handed to components at construction. Nothing below reads process.env.
 *
 * HOW TO USE:
 * - In dev, we load backend/.env via dotenv.
 * - In prod, the platform injects env vars (no file).
 *
 * RULES:
 * - Access and refresh secrets must differ (startup fails otherwise).
 * - Permission cache TTL must stay below the refresh lifetime.
 */

import 'dotenv/config';
import { z } from 'zod';

const NodeEnvSchema = z.enum(['development', 'test', 'production']).default('development');

const secret = z.string().min(32, 'must be at least 32 characters');

// z.coerce.boolean() treats the string "false" as true.
const flag = z
  .enum(['true', 'false'])
  .default('false')
  .transform((v) => v === 'true');

const ConfigSchema = z
  .object({
    NODE_ENV: NodeEnvSchema,
    PORT: z.coerce.number().default(3000),
    TRUST_PROXY: flag,

    DATABASE_URL: z.string().min(1),
    REDIS_URL: z.string().min(1),

    // Logging / service identity
    LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
    SERVICE_NAME: z.string().default('hr-identity-backend'),

    // Passwords
    BCRYPT_COST: z.coerce.number().int().min(10).max(15).default(12),
    PASSWORD_MIN_LENGTH: z.coerce.number().int().min(8).max(128).default(8),
    PASSWORD_RESET_TTL_SECONDS: z.coerce.number().int().min(300).max(86400).default(3600),

    // Tokens
    JWT_ACCESS_SECRET: secret,
    JWT_REFRESH_SECRET: secret,
    JWT_ACCESS_TTL_SECONDS: z.coerce.number().int().min(60).max(86400).default(900),
    JWT_REFRESH_TTL_SECONDS: z.coerce.number().int().min(300).max(2592000).default(604800),
    JWT_ISSUER: z.string().min(1).default('hr-management-system'),
    JWT_AUDIENCE: z.string().min(1).default('hr-management-users'),
    JWT_CLOCK_TOLERANCE_SECONDS: z.coerce.number().int().min(0).max(60).default(5),

    // OTP
    OTP_LENGTH: z.coerce.number().int().min(4).max(10).default(6),
    OTP_TTL_SECONDS: z.coerce.number().int().min(60).max(1800).default(300),
    OTP_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(5),
    OTP_HMAC_KEY: secret,

    // Lockout
    LOGIN_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(50).default(5),
    LOGIN_MAX_ATTEMPTS_PER_IP: z.coerce.number().int().min(1).max(500).default(20),
    LOCKOUT_SECONDS: z.coerce.number().int().min(60).max(86400).default(1800),

    // Rate limits
    RATE_LIMIT_IP_PER_MINUTE: z.coerce.number().int().min(1).default(100),
    RATE_LIMIT_LOGIN_PER_IP: z.coerce.number().int().min(1).default(20),
    RATE_LIMIT_LOGIN_WINDOW_SECONDS: z.coerce.number().int().min(1).default(900),
    RATE_LIMIT_OTP_SEND: z.coerce.number().int().min(1).default(3),
    RATE_LIMIT_OTP_SEND_WINDOW_SECONDS: z.coerce.number().int().min(1).default(300),
    RATE_LIMIT_OTP_VERIFY: z.coerce.number().int().min(1).default(10),
    RATE_LIMIT_OTP_VERIFY_WINDOW_SECONDS: z.coerce.number().int().min(1).default(300),
    RATE_LIMIT_REFRESH_PER_IP: z.coerce.number().int().min(1).default(30),
    RATE_LIMIT_REFRESH_WINDOW_SECONDS: z.coerce.number().int().min(1).default(60),

    // Permissions
    PERMISSION_CACHE_TTL_SECONDS: z.coerce.number().int().min(1).default(300),

    // Per-request deadline
    REQUEST_TIMEOUT_MS: z.coerce.number().int().min(100).max(120000).default(10000),

    // DEV seed bootstrap (idempotent)
    SEED_ON_START: flag,
    SEED_ADMIN_EMAIL: z.string().email().default('admin@example.com'),
    SEED_ADMIN_PASSWORD: z.string().min(8).default('Change-me-1!'),
  })
  .refine((env) => env.JWT_ACCESS_SECRET !== env.JWT_REFRESH_SECRET, {
    message: 'JWT_ACCESS_SECRET and JWT_REFRESH_SECRET must differ',
    path: ['JWT_REFRESH_SECRET'],
  })
  .refine((env) => env.PERMISSION_CACHE_TTL_SECONDS < env.JWT_REFRESH_TTL_SECONDS, {
    message: 'PERMISSION_CACHE_TTL_SECONDS must be shorter than JWT_REFRESH_TTL_SECONDS',
    path: ['PERMISSION_CACHE_TTL_SECONDS'],
  });

export type NodeEnv = z.infer<typeof NodeEnvSchema>;

export type RateRule = {
  limit: number;
  windowSeconds: number;
};

export type AppConfig = {
  nodeEnv: NodeEnv;
  port: number;
  trustProxy: boolean;
  databaseUrl: string;
  redisUrl: string;

  logLevel: string;
  serviceName: string;

  password: {
    bcryptCost: number;
    minLength: number;
    resetTtlSeconds: number;
  };

  jwt: {
    accessSecret: string;
    refreshSecret: string;
    accessTtlSeconds: number;
    refreshTtlSeconds: number;
    issuer: string;
    audience: string;
    clockToleranceSeconds: number;
  };

  otp: {
    length: number;
    ttlSeconds: number;
    maxAttempts: number;
    hmacKey: string;
  };

  lockout: {
    maxAttempts: number;
    maxAttemptsPerIp: number;
    durationSeconds: number;
  };

  rateLimits: {
    ipPerMinute: number;
    login: RateRule;
    otpSend: RateRule;
    otpVerify: RateRule;
    refresh: RateRule;
  };

  permissionCacheTtlSeconds: number;
  requestTimeoutMs: number;

  seed: {
    enabled: boolean;
    adminEmail: string;
    adminPassword: string;
  };
};

export function buildConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,
    trustProxy: parsed.TRUST_PROXY,
    databaseUrl: parsed.DATABASE_URL,
    redisUrl: parsed.REDIS_URL,

    logLevel: parsed.LOG_LEVEL,
    serviceName: parsed.SERVICE_NAME,

    password: {
      bcryptCost: parsed.BCRYPT_COST,
      minLength: parsed.PASSWORD_MIN_LENGTH,
      resetTtlSeconds: parsed.PASSWORD_RESET_TTL_SECONDS,
    },

    jwt: {
      accessSecret: parsed.JWT_ACCESS_SECRET,
      refreshSecret: parsed.JWT_REFRESH_SECRET,
      accessTtlSeconds: parsed.JWT_ACCESS_TTL_SECONDS,
      refreshTtlSeconds: parsed.JWT_REFRESH_TTL_SECONDS,
      issuer: parsed.JWT_ISSUER,
      audience: parsed.JWT_AUDIENCE,
      clockToleranceSeconds: parsed.JWT_CLOCK_TOLERANCE_SECONDS,
    },

    otp: {
      length: parsed.OTP_LENGTH,
      ttlSeconds: parsed.OTP_TTL_SECONDS,
      maxAttempts: parsed.OTP_MAX_ATTEMPTS,
      hmacKey: parsed.OTP_HMAC_KEY,
    },

    lockout: {
      maxAttempts: parsed.LOGIN_MAX_ATTEMPTS,
      maxAttemptsPerIp: parsed.LOGIN_MAX_ATTEMPTS_PER_IP,
      durationSeconds: parsed.LOCKOUT_SECONDS,
    },

    rateLimits: {
      ipPerMinute: parsed.RATE_LIMIT_IP_PER_MINUTE,
      login: {
        limit: parsed.RATE_LIMIT_LOGIN_PER_IP,
        windowSeconds: parsed.RATE_LIMIT_LOGIN_WINDOW_SECONDS,
      },
      otpSend: {
        limit: parsed.RATE_LIMIT_OTP_SEND,
        windowSeconds: parsed.RATE_LIMIT_OTP_SEND_WINDOW_SECONDS,
      },
      otpVerify: {
        limit: parsed.RATE_LIMIT_OTP_VERIFY,
        windowSeconds: parsed.RATE_LIMIT_OTP_VERIFY_WINDOW_SECONDS,
      },
      refresh: {
        limit: parsed.RATE_LIMIT_REFRESH_PER_IP,
        windowSeconds: parsed.RATE_LIMIT_REFRESH_WINDOW_SECONDS,
      },
    },

    permissionCacheTtlSeconds: parsed.PERMISSION_CACHE_TTL_SECONDS,
    requestTimeoutMs: parsed.REQUEST_TIMEOUT_MS,

    seed: {
      enabled: parsed.SEED_ON_START,
      adminEmail: parsed.SEED_ADMIN_EMAIL,
      adminPassword: parsed.SEED_ADMIN_PASSWORD,
    },
  };
}
