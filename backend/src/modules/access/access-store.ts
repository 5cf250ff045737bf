/**
 * src/modules/access/access-store.ts
 *
 * WHY:
 * - Relational side of role-based access: identity -> role and role -> permission
 *   relations. KyselyAccessStore (dal/) is the Postgres implementation.
 *
 * RULES:
 * - Mutations are idempotent and report whether anything changed.
 * - Cache eviction is NOT done here; AccessService owns it.
 */

import type { Permission, PermissionSet, Role } from './access.types';

export interface AccessStore {
  /** Raw role and permission slugs for an identity (may contain duplicates). */
  loadPermissionSet(identityId: string): Promise<PermissionSet>;

  findRoleBySlug(slug: string): Promise<Role | undefined>;
  findPermissionBySlug(slug: string): Promise<Permission | undefined>;

  /** Identity ids currently holding the role. */
  listIdentitiesWithRole(roleId: string): Promise<string[]>;

  assignRole(params: { identityId: string; roleId: string; assignedBy: string | null }): Promise<boolean>;
  revokeRole(params: { identityId: string; roleId: string }): Promise<boolean>;

  grantPermission(params: { roleId: string; permissionId: string }): Promise<boolean>;
  revokePermission(params: { roleId: string; permissionId: string }): Promise<boolean>;
}
