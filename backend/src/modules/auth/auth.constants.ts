/**
 * backend/src/modules/auth/auth.constants.ts
 *
 * WHY:
 * - Central place for auth domain constants shared across flows.
 *
 * RULES:
 * - Must not import from DB/HTTP/framework code.
 * - Configurable thresholds come from AppConfig, not from here. These are the
 *   fixed ones (silent/abuse limits that are not part of the config surface).
 */

export const AUTH_RATE_LIMITS = {
  forgotPassword: {
    perEmail: { limit: 3, windowSeconds: 3600 }, // silent
  },
  resetPassword: {
    perIp: { limit: 5, windowSeconds: 900 }, // hard 429
  },
} as const;

/** Endpoint names used in endpoint-scoped rate-limit keys. */
export const AUTH_ENDPOINTS = {
  login: 'auth.login',
  refresh: 'auth.refresh',
  resetPassword: 'auth.reset-password',
} as const;

/** Identifier scopes used in identifier-scoped rate-limit keys. */
export const AUTH_IDENTIFIER_SCOPES = {
  twoFactorVerify: 'two-factor-verify',
  otpSend: 'otp-send',
  otpVerify: 'otp-verify',
  forgotPassword: 'forgot-password',
} as const;

/** OTP purposes a caller may request through the public OTP endpoints. */
export const PUBLIC_OTP_PURPOSES = ['email_verification'] as const;

export type PublicOtpPurpose = (typeof PUBLIC_OTP_PURPOSES)[number];
