/**
 * backend/src/modules/access/access.routes.ts
 *
 * WHY:
 * - Declares role/permission administration endpoints and their permission gates.
 *
 * RULES:
 * - No business logic here.
 * - Every route carries a requirePermission preHandler.
 */

import type { FastifyInstance } from 'fastify';
import { requirePermission } from '../../shared/http/require-auth-context';
import type { AccessController } from './access.controller';

export const ACCESS_PERMISSIONS = {
  assignRoles: 'roles.assign',
  manageRoles: 'roles.manage',
} as const;

export function registerAccessRoutes(app: FastifyInstance, controller: AccessController) {
  const canAssign = { preHandler: requirePermission(ACCESS_PERMISSIONS.assignRoles) };
  const canManage = { preHandler: requirePermission(ACCESS_PERMISSIONS.manageRoles) };

  app.post('/access/users/:identityId/roles', canAssign, controller.assignRole.bind(controller));
  app.delete(
    '/access/users/:identityId/roles/:role',
    canAssign,
    controller.revokeRole.bind(controller),
  );

  app.post('/access/roles/:role/permissions', canManage, controller.grantPermission.bind(controller));
  app.delete(
    '/access/roles/:role/permissions/:permission',
    canManage,
    controller.revokePermission.bind(controller),
  );
}
