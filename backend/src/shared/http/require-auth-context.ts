/**
 * backend/src/shared/http/require-auth-context.ts
 *
 * WHY:
 * - Controllers must not duplicate "require identity / permission" logic.
 * - Centralizes authContext validation to prevent drift across endpoints.
 *
 * RULES:
 * - HTTP-only helper (may depend on Fastify request typing).
 * - Must NOT touch DB, cache, or services: the token middleware already did.
 * - Throws AppError so error-handler maps it consistently.
 *
 * Guard sequence (LOCKED):
 * 1) recorded token failure -> 401 TOKEN_EXPIRED / TOKEN_INVALID / SESSION_REVOKED
 * 2) no identity            -> 401 UNAUTHORIZED "Authentication required"
 * 3) permission or role not held -> 403 PERMISSION_DENIED
 */

import type { FastifyRequest, preHandlerAsyncHookHandler } from 'fastify';
import { SecurityErrors } from '../security/security.errors';
import { hasAll, hasAny } from '../security/permissions';

export type CurrentIdentity = Readonly<{
  id: string;
  email: string;
  sessionId: string;
  roles: readonly string[];
  permissions: readonly string[];
  tokenIssuedAt: number;
}>;

export function requireIdentity(req: FastifyRequest): CurrentIdentity {
  const ctx = req.authContext;
  if (!ctx) throw SecurityErrors.authenticationRequired();

  if (ctx.failure === 'TOKEN_EXPIRED') throw SecurityErrors.tokenExpired();
  if (ctx.failure === 'TOKEN_INVALID') throw SecurityErrors.tokenInvalid();
  if (ctx.failure === 'SESSION_REVOKED') throw SecurityErrors.sessionRevoked();

  if (!ctx.identityId || !ctx.email || !ctx.sessionId || ctx.tokenIssuedAt === null) {
    throw SecurityErrors.authenticationRequired();
  }

  return {
    id: ctx.identityId,
    email: ctx.email,
    sessionId: ctx.sessionId,
    roles: ctx.roles,
    permissions: ctx.permissions,
    tokenIssuedAt: ctx.tokenIssuedAt,
  };
}

/** preHandler: authenticated + holds at least one of `permissions`. */
export function requirePermission(...permissions: string[]): preHandlerAsyncHookHandler {
  return async (req) => {
    const identity = requireIdentity(req);
    if (!hasAny(identity.permissions, permissions)) {
      throw SecurityErrors.permissionDenied({ required: permissions, identityId: identity.id });
    }
  };
}

/** preHandler: authenticated + holds every one of `permissions`. */
export function requireAllPermissions(...permissions: string[]): preHandlerAsyncHookHandler {
  return async (req) => {
    const identity = requireIdentity(req);
    if (!hasAll(identity.permissions, permissions)) {
      throw SecurityErrors.permissionDenied({ required: permissions, identityId: identity.id });
    }
  };
}

/** preHandler: authenticated + holds at least one of `roles` (exact slugs, no wildcards). */
export function requireRole(...roles: string[]): preHandlerAsyncHookHandler {
  return async (req) => {
    const identity = requireIdentity(req);
    if (!roles.some((role) => identity.roles.includes(role))) {
      throw SecurityErrors.permissionDenied({ requiredRoles: roles, identityId: identity.id });
    }
  };
}

/** preHandler: authenticated, no permission requirement. */
export const requireAuthenticated: preHandlerAsyncHookHandler = async (req) => {
  requireIdentity(req);
};
