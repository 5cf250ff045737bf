/**
 * src/modules/access/access.service.ts
 *
 * WHY:
 * - Role/permission mutations with synchronous cache eviction: the affected
 *   identities' permission entries are deleted inside the same operation, before
 *   it reports success. A stale permission cache is a security defect.
 *
 * RULES:
 * - Mutate store -> evict -> audit. Eviction errors propagate (the caller sees a
 *   failure and can retry; the mutation itself is idempotent).
 * - No-op mutations (already assigned / already absent) still evict.
 */

import type { AuditRepo } from '../../shared/audit/audit.repo';
import { AuditWriter } from '../../shared/audit/audit.writer';
import type { Logger } from '../../shared/logger/logger';
import type { CredentialStore } from '../identities/credential-store';
import type { AccessStore } from './access-store';
import type { PermissionResolver } from './permission-resolver';
import type { Permission, Role } from './access.types';
import { AccessErrors } from './access.errors';
import {
  auditPermissionGranted,
  auditPermissionRevoked,
  auditRoleAssigned,
  auditRoleRevoked,
} from './access.audit';

export type AccessActor = {
  identityId: string;
  requestId: string;
  ip: string;
  userAgent: string | null;
};

export class AccessService {
  constructor(
    private readonly deps: {
      accessStore: AccessStore;
      credentialStore: CredentialStore;
      permissionResolver: PermissionResolver;
      auditRepo: AuditRepo;
      logger: Logger;
    },
  ) {}

  private audit(actor: AccessActor): AuditWriter {
    return new AuditWriter(this.deps.auditRepo, {
      userId: actor.identityId,
      requestId: actor.requestId,
      ip: actor.ip,
      userAgent: actor.userAgent,
    });
  }

  private async requireIdentity(identityId: string): Promise<void> {
    const identity = await this.deps.credentialStore.findById(identityId);
    if (!identity) throw AccessErrors.identityNotFound({ identityId });
  }

  private async requireRole(slug: string): Promise<Role> {
    const role = await this.deps.accessStore.findRoleBySlug(slug);
    if (!role) throw AccessErrors.roleNotFound({ role: slug });
    return role;
  }

  private async requirePermission(slug: string): Promise<Permission> {
    const permission = await this.deps.accessStore.findPermissionBySlug(slug);
    if (!permission) throw AccessErrors.permissionNotFound({ permission: slug });
    return permission;
  }

  // ── Identity <-> role ────────────────────────────────────

  async assignRole(
    params: { identityId: string; role: string },
    actor: AccessActor,
  ): Promise<{ changed: boolean }> {
    await this.requireIdentity(params.identityId);
    const role = await this.requireRole(params.role);

    const changed = await this.deps.accessStore.assignRole({
      identityId: params.identityId,
      roleId: role.id,
      assignedBy: actor.identityId,
    });

    await this.deps.permissionResolver.invalidate(params.identityId);

    if (changed) {
      await auditRoleAssigned(this.audit(actor), { identityId: params.identityId, role: role.slug });
    }

    this.deps.logger.info('access.role.assigned', {
      flow: 'access.assign-role',
      requestId: actor.requestId,
      identityId: params.identityId,
      role: role.slug,
      changed,
    });

    return { changed };
  }

  async revokeRole(
    params: { identityId: string; role: string },
    actor: AccessActor,
  ): Promise<{ changed: boolean }> {
    const role = await this.requireRole(params.role);

    const changed = await this.deps.accessStore.revokeRole({
      identityId: params.identityId,
      roleId: role.id,
    });

    await this.deps.permissionResolver.invalidate(params.identityId);

    if (changed) {
      await auditRoleRevoked(this.audit(actor), { identityId: params.identityId, role: role.slug });
    }

    this.deps.logger.info('access.role.revoked', {
      flow: 'access.revoke-role',
      requestId: actor.requestId,
      identityId: params.identityId,
      role: role.slug,
      changed,
    });

    return { changed };
  }

  // ── Role <-> permission ──────────────────────────────────

  async grantPermission(
    params: { role: string; permission: string },
    actor: AccessActor,
  ): Promise<{ changed: boolean; affectedIdentities: number }> {
    const role = await this.requireRole(params.role);
    const permission = await this.requirePermission(params.permission);

    const changed = await this.deps.accessStore.grantPermission({
      roleId: role.id,
      permissionId: permission.id,
    });

    const holders = await this.deps.accessStore.listIdentitiesWithRole(role.id);
    await this.deps.permissionResolver.invalidateMany(holders);

    if (changed) {
      await auditPermissionGranted(this.audit(actor), {
        role: role.slug,
        permission: permission.slug,
        affectedIdentities: holders.length,
      });
    }

    return { changed, affectedIdentities: holders.length };
  }

  async revokePermission(
    params: { role: string; permission: string },
    actor: AccessActor,
  ): Promise<{ changed: boolean; affectedIdentities: number }> {
    const role = await this.requireRole(params.role);
    const permission = await this.requirePermission(params.permission);

    const changed = await this.deps.accessStore.revokePermission({
      roleId: role.id,
      permissionId: permission.id,
    });

    const holders = await this.deps.accessStore.listIdentitiesWithRole(role.id);
    await this.deps.permissionResolver.invalidateMany(holders);

    if (changed) {
      await auditPermissionRevoked(this.audit(actor), {
        role: role.slug,
        permission: permission.slug,
        affectedIdentities: holders.length,
      });
    }

    return { changed, affectedIdentities: holders.length };
  }
}
