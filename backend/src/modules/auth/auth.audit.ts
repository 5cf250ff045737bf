/**
 * backend/src/modules/auth/auth.audit.ts
 *
 * WHY:
 * - Typed audit helpers for the Auth module.
 * - Keeps audit metadata consistent and typo-free per domain action.
 *
 * RULES:
 * - Each function maps one domain action to one audit write.
 * - No DB access (delegates to AuditWriter).
 * - Emails appear as a SHA-256 key; never passwords, codes or tokens.
 */

import type { AuditWriter } from '../../shared/audit/audit.writer';

export type LoginFailureReason = 'unknown_identity' | 'wrong_password' | 'inactive';

export function auditLoginSuccess(
  writer: AuditWriter,
  data: { sessionId: string; twoFactor: boolean },
): Promise<void> {
  return writer.append('auth.login.success', data);
}

export function auditLoginFailed(
  writer: AuditWriter,
  data: { emailKey: string; reason: LoginFailureReason; attempts?: number },
): Promise<void> {
  return writer.append('auth.login.failed', data);
}

export function auditLoginLocked(
  writer: AuditWriter,
  data: { emailKey: string; scope: 'email' | 'ip' | 'account'; retryAfterSeconds: number },
): Promise<void> {
  return writer.append('auth.login.locked', data);
}

export function auditTwoFactorChallengeSent(writer: AuditWriter): Promise<void> {
  return writer.append('auth.two_factor.challenge_sent');
}

export function auditTwoFactorVerified(
  writer: AuditWriter,
  data: { sessionId: string },
): Promise<void> {
  return writer.append('auth.two_factor.verified', data);
}

export function auditTwoFactorFailed(
  writer: AuditWriter,
  data: { outcome: 'expired' | 'invalid' },
): Promise<void> {
  return writer.append('auth.two_factor.failed', data);
}

export function auditTokenRefreshed(
  writer: AuditWriter,
  data: { previousSessionId: string; sessionId: string },
): Promise<void> {
  return writer.append('auth.token.refreshed', data);
}

export function auditLogout(writer: AuditWriter, data: { sessionId: string }): Promise<void> {
  return writer.append('auth.logout', data);
}

export function auditPasswordChanged(
  writer: AuditWriter,
  data: { revokedSessions: number },
): Promise<void> {
  return writer.append('auth.password.changed', data);
}

export type PasswordResetRequestOutcome = 'sent' | 'rate_limited' | 'user_not_found' | 'inactive';

export function auditPasswordResetRequested(
  writer: AuditWriter,
  data: { outcome: PasswordResetRequestOutcome },
): Promise<void> {
  return writer.append('auth.password_reset.requested', data);
}

export function auditPasswordResetCompleted(
  writer: AuditWriter,
  data: { revokedSessions: number },
): Promise<void> {
  return writer.append('auth.password_reset.completed', data);
}

export function auditOtpSent(writer: AuditWriter, data: { purpose: string }): Promise<void> {
  return writer.append('auth.otp.sent', data);
}

export function auditOtpVerified(writer: AuditWriter, data: { purpose: string }): Promise<void> {
  return writer.append('auth.otp.verified', data);
}

export function auditOtpFailed(
  writer: AuditWriter,
  data: { purpose: string; outcome: 'expired' | 'invalid' },
): Promise<void> {
  return writer.append('auth.otp.failed', data);
}
