/**
 * backend/src/modules/access/dal/access.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for roles/permissions and their relations.
 *
 * RULES:
 * - No AppError.
 * - No policies.
 * - No transactions started here.
 */

import type { DbExecutor } from '../../../shared/db/db';

export async function selectRoleSlugsForIdentitySql(
  db: DbExecutor,
  identityId: string,
): Promise<string[]> {
  const rows = await db
    .selectFrom('user_roles')
    .innerJoin('roles', 'roles.id', 'user_roles.role_id')
    .select('roles.slug')
    .where('user_roles.user_id', '=', identityId)
    .execute();

  return rows.map((r) => r.slug);
}

export async function selectPermissionSlugsForIdentitySql(
  db: DbExecutor,
  identityId: string,
): Promise<string[]> {
  const rows = await db
    .selectFrom('user_roles')
    .innerJoin('role_permissions', 'role_permissions.role_id', 'user_roles.role_id')
    .innerJoin('permissions', 'permissions.id', 'role_permissions.permission_id')
    .select('permissions.slug')
    .distinct()
    .where('user_roles.user_id', '=', identityId)
    .execute();

  return rows.map((r) => r.slug);
}

export async function selectRoleBySlugSql(db: DbExecutor, slug: string) {
  return db
    .selectFrom('roles')
    .select(['id', 'slug', 'name'])
    .where('slug', '=', slug)
    .executeTakeFirst();
}

export async function selectPermissionBySlugSql(db: DbExecutor, slug: string) {
  return db
    .selectFrom('permissions')
    .select(['id', 'slug', 'module'])
    .where('slug', '=', slug)
    .executeTakeFirst();
}

export async function selectIdentityIdsWithRoleSql(db: DbExecutor, roleId: string): Promise<string[]> {
  const rows = await db
    .selectFrom('user_roles')
    .select('user_id')
    .where('role_id', '=', roleId)
    .execute();

  return rows.map((r) => r.user_id);
}
