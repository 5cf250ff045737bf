/**
 * src/shared/db/migrations/0002_access_schema.ts
 *
 * WHY:
 * - Role-based access: identity -> roles -> permission slugs.
 * - Slugs are "<module>.<action>", "<module>.*" or "*" (see shared/security/permissions.ts).
 *
 * KEY CONSTRAINTS:
 * - roles.slug / permissions.slug UNIQUE.
 * - Join tables use composite primary keys (assignment is idempotent).
 */

import { type Kysely, sql } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await sql`
    CREATE TABLE roles (
      id          UUID        PRIMARY KEY DEFAULT gen_random_uuid(),
      slug        TEXT        NOT NULL UNIQUE,
      name        TEXT        NOT NULL,
      description TEXT,
      created_at  TIMESTAMPTZ NOT NULL DEFAULT now()
    );
  `.execute(db);

  await sql`
    CREATE TABLE permissions (
      id         UUID        PRIMARY KEY DEFAULT gen_random_uuid(),
      slug       TEXT        NOT NULL UNIQUE,
      module     TEXT        NOT NULL,
      name       TEXT        NOT NULL,
      created_at TIMESTAMPTZ NOT NULL DEFAULT now()
    );
  `.execute(db);

  await sql`
    CREATE TABLE role_permissions (
      role_id       UUID        NOT NULL REFERENCES roles(id) ON DELETE CASCADE,
      permission_id UUID        NOT NULL REFERENCES permissions(id) ON DELETE CASCADE,
      created_at    TIMESTAMPTZ NOT NULL DEFAULT now(),
      PRIMARY KEY (role_id, permission_id)
    );
  `.execute(db);

  await sql`
    CREATE TABLE user_roles (
      user_id     UUID        NOT NULL REFERENCES users(id) ON DELETE CASCADE,
      role_id     UUID        NOT NULL REFERENCES roles(id) ON DELETE CASCADE,
      assigned_by UUID        REFERENCES users(id) ON DELETE SET NULL,
      created_at  TIMESTAMPTZ NOT NULL DEFAULT now(),
      PRIMARY KEY (user_id, role_id)
    );
  `.execute(db);

  await sql`CREATE INDEX idx_user_roles_role ON user_roles (role_id);`.execute(db);
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await sql`DROP TABLE IF EXISTS user_roles;`.execute(db);
  await sql`DROP TABLE IF EXISTS role_permissions;`.execute(db);
  await sql`DROP TABLE IF EXISTS permissions;`.execute(db);
  await sql`DROP TABLE IF EXISTS roles;`.execute(db);
}
