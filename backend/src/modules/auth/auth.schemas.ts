/**
 * src/modules/auth/auth.schemas.ts
 *
 * WHY:
 * - Centralizes request validation for the Auth module.
 * - Prevents invalid payloads from reaching services.
 *
 * RULES:
 * - Use Zod for runtime validation.
 * - Password strength is checked by the password policy in the flows (it is
 *   configurable); here we only bound the length.
 * - Email normalized to lowercase in flows, not here.
 * - Token min-length guards against obviously garbage values but does not
 *   validate the token cryptographically (that is the flow's job).
 */

import { z } from 'zod';
import { PUBLIC_OTP_PURPOSES } from './auth.constants';

const email = z.string().trim().email('Invalid email address').max(320);
const password = z.string().min(1, 'Password is required').max(256);
const otpCode = z.string().regex(/^\d{4,10}$/, 'Code must be numeric');

export const loginSchema = z.object({
  email,
  password,
});

export type LoginInput = z.infer<typeof loginSchema>;

export const verifyTwoFactorSchema = z.object({
  email,
  code: otpCode,
});

export const refreshSchema = z.object({
  refreshToken: z.string().min(20, 'Invalid refresh token'),
});

export const changePasswordSchema = z.object({
  currentPassword: password,
  newPassword: password,
});

export const forgotPasswordSchema = z.object({
  email,
});

export const resetPasswordSchema = z.object({
  /** Raw reset token from the email link. */
  token: z.string().min(20, 'Invalid reset token'),
  newPassword: password,
});

export const sendOtpSchema = z.object({
  email,
  purpose: z.enum(PUBLIC_OTP_PURPOSES),
});

export const verifyOtpSchema = z.object({
  email,
  purpose: z.enum(PUBLIC_OTP_PURPOSES),
  code: otpCode,
});
