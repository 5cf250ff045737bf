/**
 * src/shared/audit/audit.types.ts
 *
 * WHY:
 * - Central audit event types (compliance trail stored in DB).
 * - Keeps audit writes consistent across all modules.
 * - AuditContext groups the request-level fields that repeat on every event.
 * - AuditAction uses a union + escape hatch to catch typos early
 *   while still allowing new actions without touching this file.
 *
 * RULES:
 * - Metadata is a plain object (repo serializes to JSON for DB).
 * - Never import module types here (shared must stay module-agnostic).
 * - Never put passwords, codes, tokens or hashes in metadata.
 */

export type KnownAuditAction =
  // Sign-in
  | 'auth.login.success'
  | 'auth.login.failed'
  | 'auth.login.locked'
  // Two-factor
  | 'auth.two_factor.challenge_sent'
  | 'auth.two_factor.verified'
  | 'auth.two_factor.failed'
  // Sessions
  | 'auth.token.refreshed'
  | 'auth.logout'
  // Passwords
  | 'auth.password.changed'
  | 'auth.password_reset.requested'
  | 'auth.password_reset.completed'
  // Standalone OTP
  | 'auth.otp.sent'
  | 'auth.otp.verified'
  | 'auth.otp.failed'
  // Access control
  | 'access.role.assigned'
  | 'access.role.revoked'
  | 'access.permission.granted'
  | 'access.permission.revoked';

// Escape hatch: allows new actions without updating this file every time.
export type AuditAction = KnownAuditAction | (string & {});

export type AuditMetadata = Record<string, unknown>;

/**
 * Request-level context that is identical across every audit event
 * within a single request. userId is filled once the identity is known.
 */
export type AuditContext = {
  userId: string | null;

  requestId: string | null;
  ip: string | null;
  userAgent: string | null;
};

/**
 * Full audit event shape for insertion.
 * Used by AuditRepo only (low-level).
 */
export type AuditEventInsert = AuditContext & {
  action: AuditAction;
  metadata?: AuditMetadata;
};
