/**
 * backend/src/modules/access/access.module.ts
 *
 * WHY:
 * - Encapsulates Access module wiring: resolver (used by the token middleware on
 *   every request), service and admin routes.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 */

import type { FastifyInstance } from 'fastify';
import type { Cache } from '../../shared/cache/cache';
import type { AuditRepo } from '../../shared/audit/audit.repo';
import type { Logger } from '../../shared/logger/logger';
import type { CredentialStore } from '../identities/credential-store';
import type { AccessStore } from './access-store';
import { PermissionResolver } from './permission-resolver';
import { AccessService } from './access.service';
import { AccessController } from './access.controller';
import { registerAccessRoutes } from './access.routes';

export type AccessModule = ReturnType<typeof createAccessModule>;

export function createAccessModule(deps: {
  cache: Cache;
  accessStore: AccessStore;
  credentialStore: CredentialStore;
  auditRepo: AuditRepo;
  logger: Logger;
  permissionCacheTtlSeconds: number;
}) {
  const permissionResolver = new PermissionResolver({
    cache: deps.cache,
    store: deps.accessStore,
    logger: deps.logger,
    ttlSeconds: deps.permissionCacheTtlSeconds,
  });

  const accessService = new AccessService({
    accessStore: deps.accessStore,
    credentialStore: deps.credentialStore,
    permissionResolver,
    auditRepo: deps.auditRepo,
    logger: deps.logger,
  });

  const controller = new AccessController(accessService);

  return {
    permissionResolver,
    accessService,
    registerRoutes(app: FastifyInstance) {
      registerAccessRoutes(app, controller);
    },
  };
}
