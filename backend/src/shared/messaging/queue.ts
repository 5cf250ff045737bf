/**
 * src/shared/messaging/queue.ts
 *
 * WHY:
 * - Decouples "I need to notify this person" from "here is how mail is sent".
 * - Auth flows enqueue messages; the notification transport is wired at the DI layer only.
 *
 * RULES:
 * - Queue interface depends on nothing else in this codebase (shared -> nothing).
 * - Message types are discriminated unions on the `type` field.
 * - Messages must be JSON-serializable.
 * - Raw OTP codes and reset tokens are allowed here: the dispatch payload is the one
 *   place they travel. They are never stored or logged anywhere else.
 * - Never put password hashes or session tokens in messages.
 */

// ── Message types ─────────────────────────────────────────────

export type OtpPurpose = 'two_factor' | 'email_verification';

export type OtpCodeMessage = {
  type: 'auth.otp-code';
  identityId: string;
  email: string;
  purpose: OtpPurpose;
  /** Plaintext code, rendered into the email body only. */
  code: string;
  expiresAt: string;
};

export type ResetPasswordEmailMessage = {
  type: 'auth.reset-password-email';
  identityId: string;
  email: string;
  /** Raw (un-hashed) reset token; goes into the email link only, never stored. */
  resetToken: string;
  expiresAt: string;
};

export type QueueMessage = OtpCodeMessage | ResetPasswordEmailMessage;

// ── Queue interface ───────────────────────────────────────────

export interface Queue {
  enqueue(message: QueueMessage): Promise<void>;
}
