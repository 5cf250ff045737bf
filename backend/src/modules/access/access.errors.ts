/**
 * backend/src/modules/access/access.errors.ts
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Only reachable behind requirePermission: revealing existence here is fine.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const AccessErrors = {
  identityNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('Identity not found', meta);
  },

  roleNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('Role not found', meta);
  },

  permissionNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('Permission not found', meta);
  },
} as const;
