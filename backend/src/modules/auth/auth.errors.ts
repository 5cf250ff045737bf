/**
 * src/modules/auth/auth.errors.ts
 *
 * WHY:
 * - Auth module owns its domain-specific error semantics.
 * - Security-safe: error messages never reveal whether an email exists.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Never include passwords, codes, tokens, or hashes in meta.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';
import type { PasswordViolation } from '../../shared/security/password-policy';
import { describeViolations } from '../../shared/security/password-policy';

export const AuthErrors = {
  /** Wrong email or password. Intentionally vague. */
  invalidCredentials(meta?: AppErrorMeta) {
    return new AppError({
      code: 'INVALID_CREDENTIALS',
      status: 401,
      message: 'Invalid email or password.',
      meta,
    });
  },

  /** Email or client IP is in its lockout window. */
  accountLocked(retryAfterSeconds: number, meta?: AppErrorMeta) {
    return new AppError({
      code: 'ACCOUNT_LOCKED',
      status: 423,
      message: `Too many failed sign-in attempts. Try again in ${retryAfterSeconds} seconds.`,
      meta,
      retryAfterSeconds,
    });
  },

  accountInactive(meta?: AppErrorMeta) {
    return new AppError({
      code: 'ACCOUNT_INACTIVE',
      status: 403,
      message: 'This account is not active.',
      meta,
    });
  },

  /** No live code: never issued, already used, expired, or burned by too many guesses. */
  otpExpired(meta?: AppErrorMeta) {
    return new AppError({
      code: 'OTP_EXPIRED',
      status: 400,
      message: 'The code has expired. Request a new one.',
      meta,
    });
  },

  otpInvalid(meta?: AppErrorMeta) {
    return new AppError({
      code: 'OTP_INVALID',
      status: 400,
      message: 'The code is incorrect.',
      meta,
    });
  },

  weakPassword(violations: readonly PasswordViolation[]) {
    return AppError.validationError(describeViolations(violations), { violations });
  },

  /**
   * Password reset token is invalid, expired, or already used.
   * One error for all three so the endpoint is not an oracle for token state.
   */
  resetTokenInvalid(meta?: AppErrorMeta) {
    return AppError.validationError('This reset link is invalid or has expired.', meta);
  },
} as const;
