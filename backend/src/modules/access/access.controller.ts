/**
 * src/modules/access/access.controller.ts
 *
 * WHY:
 * - Maps HTTP -> AccessService for role/permission administration.
 *
 * RULES:
 * - No DB access here.
 * - Permission gates run as route preHandlers (access.routes.ts); handlers only
 *   read the already-verified identity.
 * - Validate with Zod and throw AppError.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import { AppError } from '../../shared/http/errors';
import { clientInfo } from '../../shared/http/client-info';
import { requireIdentity } from '../../shared/http/require-auth-context';
import type { AccessActor, AccessService } from './access.service';
import {
  assignRoleSchema,
  grantPermissionSchema,
  identityParamsSchema,
  identityRoleParamsSchema,
  roleParamsSchema,
  rolePermissionParamsSchema,
} from './access.schemas';

function actorOf(req: FastifyRequest): AccessActor {
  const identity = requireIdentity(req);
  const client = clientInfo(req);
  return {
    identityId: identity.id,
    requestId: client.requestId,
    ip: client.ip,
    userAgent: client.userAgent,
  };
}

export class AccessController {
  constructor(private readonly accessService: AccessService) {}

  async assignRole(req: FastifyRequest, reply: FastifyReply) {
    const params = identityParamsSchema.safeParse(req.params);
    const body = assignRoleSchema.safeParse(req.body);
    if (!params.success || !body.success) {
      throw AppError.validationError('Invalid request body', {
        issues: [...(params.error?.issues ?? []), ...(body.error?.issues ?? [])],
      });
    }

    const result = await this.accessService.assignRole(
      { identityId: params.data.identityId, role: body.data.role },
      actorOf(req),
    );

    return reply.status(200).send({
      identityId: params.data.identityId,
      role: body.data.role,
      changed: result.changed,
    });
  }

  async revokeRole(req: FastifyRequest, reply: FastifyReply) {
    const params = identityRoleParamsSchema.safeParse(req.params);
    if (!params.success) {
      throw AppError.validationError('Invalid request', { issues: params.error.issues });
    }

    const result = await this.accessService.revokeRole(params.data, actorOf(req));

    return reply.status(200).send({ ...params.data, changed: result.changed });
  }

  async grantPermission(req: FastifyRequest, reply: FastifyReply) {
    const params = roleParamsSchema.safeParse(req.params);
    const body = grantPermissionSchema.safeParse(req.body);
    if (!params.success || !body.success) {
      throw AppError.validationError('Invalid request body', {
        issues: [...(params.error?.issues ?? []), ...(body.error?.issues ?? [])],
      });
    }

    const result = await this.accessService.grantPermission(
      { role: params.data.role, permission: body.data.permission },
      actorOf(req),
    );

    return reply.status(200).send({
      role: params.data.role,
      permission: body.data.permission,
      ...result,
    });
  }

  async revokePermission(req: FastifyRequest, reply: FastifyReply) {
    const params = rolePermissionParamsSchema.safeParse(req.params);
    if (!params.success) {
      throw AppError.validationError('Invalid request', { issues: params.error.issues });
    }

    const result = await this.accessService.revokePermission(params.data, actorOf(req));

    return reply.status(200).send({ ...params.data, ...result });
  }
}
