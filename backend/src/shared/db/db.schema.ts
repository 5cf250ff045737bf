/**
 * backend/src/shared/db/db.schema.ts
 *
 * WHY:
 * - Kysely table interfaces for the identity core, kept next to the migration that
 *   creates them (0001_identity_schema.ts). Change both together.
 *
 * RULES:
 * - snake_case mirrors the SQL; DAL/queries map to camelCase domain types.
 * - Generated<> marks columns with DB defaults (ids, timestamps, counters).
 */

import type { ColumnType, Generated } from 'kysely';

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

type Timestamp = ColumnType<Date, Date | string, Date | string>;
type CreatedAt = ColumnType<Date, Date | string | undefined, never>;

export type IdentityStatus = 'active' | 'inactive' | 'suspended' | 'pending';

export interface UsersTable {
  id: Generated<string>;
  email: string;
  phone: string | null;
  password_hash: string;
  status: Generated<IdentityStatus>;
  two_factor_enabled: Generated<boolean>;
  failed_login_attempts: Generated<number>;
  locked_until: Timestamp | null;
  password_changed_at: Timestamp | null;
  email_verified_at: Timestamp | null;
  last_login_at: Timestamp | null;
  last_login_ip: string | null;
  created_at: CreatedAt;
  updated_at: ColumnType<Date, Date | string | undefined, Date | string>;
}

export interface RolesTable {
  id: Generated<string>;
  slug: string;
  name: string;
  description: string | null;
  created_at: CreatedAt;
}

export interface PermissionsTable {
  id: Generated<string>;
  slug: string;
  module: string;
  name: string;
  created_at: CreatedAt;
}

export interface RolePermissionsTable {
  role_id: string;
  permission_id: string;
  created_at: CreatedAt;
}

export interface UserRolesTable {
  user_id: string;
  role_id: string;
  assigned_by: string | null;
  created_at: CreatedAt;
}

export interface UserSessionsTable {
  id: string;
  user_id: string;
  issued_at: Timestamp;
  expires_at: Timestamp;
  client_fingerprint: string;
  user_agent: string | null;
  ip: string | null;
  revoked_at: Timestamp | null;
  created_at: CreatedAt;
}

export interface PasswordResetTokensTable {
  id: Generated<string>;
  user_id: string;
  token_hash: string;
  expires_at: Timestamp;
  used_at: Timestamp | null;
  created_at: CreatedAt;
}

export interface AuditEventsTable {
  id: Generated<string>;
  user_id: string | null;
  action: string;
  request_id: string | null;
  ip: string | null;
  user_agent: string | null;
  metadata: ColumnType<JsonValue, JsonValue | string, JsonValue | string>;
  created_at: CreatedAt;
}

export interface DB {
  users: UsersTable;
  roles: RolesTable;
  permissions: PermissionsTable;
  role_permissions: RolePermissionsTable;
  user_roles: UserRolesTable;
  user_sessions: UserSessionsTable;
  password_reset_tokens: PasswordResetTokensTable;
  audit_events: AuditEventsTable;
}
