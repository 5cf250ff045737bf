/**
 * src/shared/security/security.errors.ts
 *
 * WHY:
 * - Token, session, permission and throttling failures are raised by shared
 *   middleware and by several modules; their semantics are owned here once.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Messages never say which check failed beyond the error code itself.
 * - Never include tokens or secrets in meta.
 */

import { AppError, type AppErrorMeta } from '../http/errors';

export const SecurityErrors = {
  authenticationRequired(meta?: AppErrorMeta) {
    return AppError.unauthorized('Authentication required', meta);
  },

  tokenExpired(meta?: AppErrorMeta) {
    return new AppError({ code: 'TOKEN_EXPIRED', status: 401, message: 'Token has expired.', meta });
  },

  /** Bad signature, wrong token type, malformed or not yet valid. */
  tokenInvalid(meta?: AppErrorMeta) {
    return new AppError({ code: 'TOKEN_INVALID', status: 401, message: 'Token is invalid.', meta });
  },

  sessionRevoked(meta?: AppErrorMeta) {
    return new AppError({
      code: 'SESSION_REVOKED',
      status: 401,
      message: 'Session has been revoked. Please sign in again.',
      meta,
    });
  },

  permissionDenied(meta?: AppErrorMeta) {
    return new AppError({
      code: 'PERMISSION_DENIED',
      status: 403,
      message: 'You do not have permission to perform this action.',
      meta,
    });
  },

  rateLimited(retryAfterSeconds: number, meta?: AppErrorMeta) {
    return new AppError({
      code: 'RATE_LIMITED',
      status: 429,
      message: 'Too many requests. Try again later.',
      meta,
      retryAfterSeconds,
    });
  },

  timeout(meta?: AppErrorMeta) {
    return new AppError({
      code: 'TIMEOUT',
      status: 503,
      message: 'The request took too long to complete.',
      meta,
    });
  },
} as const;
