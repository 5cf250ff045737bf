/**
 * backend/src/modules/access/dal/access.repo.ts
 *
 * WHY:
 * - Postgres AccessStore.
 *
 * RULES:
 * - No AppError.
 * - Supports withDb() for transaction binding.
 * - Inserts use ON CONFLICT DO NOTHING; the returned row tells us if anything changed.
 */

import type { DbExecutor } from '../../../shared/db/db';
import type { AccessStore } from '../access-store';
import type { Permission, PermissionSet, Role } from '../access.types';
import {
  selectIdentityIdsWithRoleSql,
  selectPermissionBySlugSql,
  selectPermissionSlugsForIdentitySql,
  selectRoleBySlugSql,
  selectRoleSlugsForIdentitySql,
} from './access.query-sql';

export class KyselyAccessStore implements AccessStore {
  constructor(private readonly db: DbExecutor) {}

  withDb(db: DbExecutor): KyselyAccessStore {
    return new KyselyAccessStore(db);
  }

  async loadPermissionSet(identityId: string): Promise<PermissionSet> {
    const [roles, permissions] = await Promise.all([
      selectRoleSlugsForIdentitySql(this.db, identityId),
      selectPermissionSlugsForIdentitySql(this.db, identityId),
    ]);
    return { roles, permissions };
  }

  async findRoleBySlug(slug: string): Promise<Role | undefined> {
    return selectRoleBySlugSql(this.db, slug);
  }

  async findPermissionBySlug(slug: string): Promise<Permission | undefined> {
    return selectPermissionBySlugSql(this.db, slug);
  }

  async listIdentitiesWithRole(roleId: string): Promise<string[]> {
    return selectIdentityIdsWithRoleSql(this.db, roleId);
  }

  async assignRole(params: {
    identityId: string;
    roleId: string;
    assignedBy: string | null;
  }): Promise<boolean> {
    const row = await this.db
      .insertInto('user_roles')
      .values({
        user_id: params.identityId,
        role_id: params.roleId,
        assigned_by: params.assignedBy,
      })
      .onConflict((oc) => oc.columns(['user_id', 'role_id']).doNothing())
      .returning(['user_id'])
      .executeTakeFirst();

    return row !== undefined;
  }

  async revokeRole(params: { identityId: string; roleId: string }): Promise<boolean> {
    const result = await this.db
      .deleteFrom('user_roles')
      .where('user_id', '=', params.identityId)
      .where('role_id', '=', params.roleId)
      .executeTakeFirst();

    return result.numDeletedRows > 0n;
  }

  async grantPermission(params: { roleId: string; permissionId: string }): Promise<boolean> {
    const row = await this.db
      .insertInto('role_permissions')
      .values({ role_id: params.roleId, permission_id: params.permissionId })
      .onConflict((oc) => oc.columns(['role_id', 'permission_id']).doNothing())
      .returning(['role_id'])
      .executeTakeFirst();

    return row !== undefined;
  }

  async revokePermission(params: { roleId: string; permissionId: string }): Promise<boolean> {
    const result = await this.db
      .deleteFrom('role_permissions')
      .where('role_id', '=', params.roleId)
      .where('permission_id', '=', params.permissionId)
      .executeTakeFirst();

    return result.numDeletedRows > 0n;
  }
}
