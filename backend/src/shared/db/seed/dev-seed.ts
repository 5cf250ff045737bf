/**
 * backend/src/shared/db/seed/dev-seed.ts
 *
 * DEV-ONLY seed bootstrap.
 *
 * Creates:
 * - the permission catalog and the built-in roles (if missing)
 * - role -> permission grants (if missing)
 * - an initial admin identity holding the `admin` role (if missing)
 *
 * Idempotent: safe to run on every start.
 *
 * IMPORTANT:
 * - Stores only the bcrypt hash of the admin password.
 * - Identities are otherwise provisioned by other systems; this is the only
 *   place this service inserts into users.
 */

import type { DbExecutor } from '../db';
import type { PasswordHasher } from '../../security/password-hasher';
import { logger } from '../../logger/logger';

type DevSeedOptions = {
  adminEmail: string;
  adminPassword: string;
};

type RoleSeed = {
  slug: string;
  name: string;
  description: string;
  permissions: string[];
};

const PERMISSIONS: ReadonlyArray<{ slug: string; name: string }> = [
  { slug: '*', name: 'Everything' },
  { slug: 'roles.assign', name: 'Assign roles to users' },
  { slug: 'roles.manage', name: 'Grant and revoke role permissions' },
  { slug: 'employees.*', name: 'All employee actions' },
  { slug: 'employees.view', name: 'View employees' },
  { slug: 'employees.manage', name: 'Create and edit employees' },
  { slug: 'payroll.*', name: 'All payroll actions' },
  { slug: 'payroll.view', name: 'View payroll' },
  { slug: 'payroll.run', name: 'Run payroll' },
  { slug: 'profile.view', name: 'View own profile' },
  { slug: 'profile.update', name: 'Update own profile' },
];

const ROLES: readonly RoleSeed[] = [
  { slug: 'admin', name: 'Administrator', description: 'Full access', permissions: ['*'] },
  {
    slug: 'hr_manager',
    name: 'HR Manager',
    description: 'Employee and payroll administration',
    permissions: ['employees.*', 'payroll.*', 'roles.assign'],
  },
  {
    slug: 'employee',
    name: 'Employee',
    description: 'Self-service access',
    permissions: ['profile.view', 'profile.update'],
  },
];

function moduleOf(slug: string): string {
  const dot = slug.indexOf('.');
  return dot >= 0 ? slug.slice(0, dot) : slug;
}

export async function runDevSeed(opts: {
  db: DbExecutor;
  passwordHasher: PasswordHasher;
  options: DevSeedOptions;
}): Promise<void> {
  const { db, passwordHasher, options } = opts;

  const flow = 'seed.dev';

  // 1) Permission catalog
  await db
    .insertInto('permissions')
    .values(PERMISSIONS.map((p) => ({ slug: p.slug, name: p.name, module: moduleOf(p.slug) })))
    .onConflict((oc) => oc.column('slug').doNothing())
    .execute();

  // 2) Roles + grants
  for (const role of ROLES) {
    await db
      .insertInto('roles')
      .values({ slug: role.slug, name: role.name, description: role.description })
      .onConflict((oc) => oc.column('slug').doNothing())
      .execute();

    const roleRow = await db
      .selectFrom('roles')
      .select(['id'])
      .where('slug', '=', role.slug)
      .executeTakeFirstOrThrow();

    const permissionRows = await db
      .selectFrom('permissions')
      .select(['id'])
      .where('slug', 'in', role.permissions)
      .execute();

    if (permissionRows.length > 0) {
      await db
        .insertInto('role_permissions')
        .values(permissionRows.map((p) => ({ role_id: roleRow.id, permission_id: p.id })))
        .onConflict((oc) => oc.columns(['role_id', 'permission_id']).doNothing())
        .execute();
    }

    logger.info('seed.role.ensured', { flow, role: role.slug, permissions: role.permissions });
  }

  // 3) Initial admin identity
  const email = options.adminEmail.toLowerCase();

  const existing = await db
    .selectFrom('users')
    .select(['id'])
    .where('email', '=', email)
    .executeTakeFirst();

  if (existing) {
    logger.info('seed.admin.exists', { flow, userId: existing.id });
    return;
  }

  const passwordHash = await passwordHasher.hash(options.adminPassword);
  const now = new Date();

  const created = await db
    .insertInto('users')
    .values({
      email,
      password_hash: passwordHash,
      status: 'active',
      password_changed_at: now,
      email_verified_at: now,
    })
    .returning(['id'])
    .executeTakeFirstOrThrow();

  const adminRole = await db
    .selectFrom('roles')
    .select(['id'])
    .where('slug', '=', 'admin')
    .executeTakeFirstOrThrow();

  await db
    .insertInto('user_roles')
    .values({ user_id: created.id, role_id: adminRole.id, assigned_by: null })
    .onConflict((oc) => oc.columns(['user_id', 'role_id']).doNothing())
    .execute();

  logger.info('seed.admin.created', { flow, userId: created.id });
}
