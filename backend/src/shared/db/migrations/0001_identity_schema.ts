/**
 * src/shared/db/migrations/0001_identity_schema.ts
 *
 * WHY:
 * - Identity core tables: credentials + lockout state, durable session records,
 *   single-use password reset tokens, append-only audit trail.
 *
 * KEY CONSTRAINTS:
 * - users.email is stored lower-case and UNIQUE.
 * - users.status CHECK matches IdentityStatus in db.schema.ts.
 * - user_sessions.id IS the token session id (minted by TokenService), not DB-generated.
 * - password_reset_tokens.token_hash UNIQUE: lookups go by hash only.
 *
 * HOW TO RUN:
 *   npm run db:migrate --workspace backend
 */

import { type Kysely, sql } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await sql`CREATE EXTENSION IF NOT EXISTS pgcrypto;`.execute(db);

  await sql`
    CREATE TABLE users (
      id                    UUID        PRIMARY KEY DEFAULT gen_random_uuid(),
      email                 TEXT        NOT NULL UNIQUE,
      phone                 TEXT,
      password_hash         TEXT        NOT NULL,
      status                TEXT        NOT NULL DEFAULT 'pending'
                            CHECK (status IN ('active', 'inactive', 'suspended', 'pending')),
      two_factor_enabled    BOOLEAN     NOT NULL DEFAULT false,
      failed_login_attempts INTEGER     NOT NULL DEFAULT 0,
      locked_until          TIMESTAMPTZ,
      password_changed_at   TIMESTAMPTZ,
      email_verified_at     TIMESTAMPTZ,
      last_login_at         TIMESTAMPTZ,
      last_login_ip         TEXT,
      created_at            TIMESTAMPTZ NOT NULL DEFAULT now(),
      updated_at            TIMESTAMPTZ NOT NULL DEFAULT now(),
      CHECK (email = lower(email))
    );
  `.execute(db);

  await sql`
    CREATE TABLE user_sessions (
      id                 UUID        PRIMARY KEY,
      user_id            UUID        NOT NULL REFERENCES users(id) ON DELETE CASCADE,
      issued_at          TIMESTAMPTZ NOT NULL,
      expires_at         TIMESTAMPTZ NOT NULL,
      client_fingerprint TEXT        NOT NULL,
      user_agent         TEXT,
      ip                 TEXT,
      revoked_at         TIMESTAMPTZ,
      created_at         TIMESTAMPTZ NOT NULL DEFAULT now()
    );
  `.execute(db);

  await sql`
    CREATE INDEX idx_user_sessions_live ON user_sessions (user_id, expires_at)
    WHERE revoked_at IS NULL;
  `.execute(db);

  await sql`
    CREATE TABLE password_reset_tokens (
      id         UUID        PRIMARY KEY DEFAULT gen_random_uuid(),
      user_id    UUID        NOT NULL REFERENCES users(id) ON DELETE CASCADE,
      token_hash TEXT        NOT NULL UNIQUE,
      expires_at TIMESTAMPTZ NOT NULL,
      used_at    TIMESTAMPTZ,
      created_at TIMESTAMPTZ NOT NULL DEFAULT now()
    );
  `.execute(db);

  await sql`
    CREATE INDEX idx_password_reset_tokens_active ON password_reset_tokens (user_id)
    WHERE used_at IS NULL;
  `.execute(db);

  await sql`
    CREATE TABLE audit_events (
      id         UUID        PRIMARY KEY DEFAULT gen_random_uuid(),
      user_id    UUID        REFERENCES users(id) ON DELETE SET NULL,
      action     TEXT        NOT NULL,
      request_id TEXT,
      ip         TEXT,
      user_agent TEXT,
      metadata   JSONB       NOT NULL DEFAULT '{}'::jsonb,
      created_at TIMESTAMPTZ NOT NULL DEFAULT now()
    );
  `.execute(db);

  await sql`CREATE INDEX idx_audit_events_user ON audit_events (user_id, created_at DESC);`.execute(db);
  await sql`CREATE INDEX idx_audit_events_action ON audit_events (action, created_at DESC);`.execute(db);
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await sql`DROP TABLE IF EXISTS audit_events;`.execute(db);
  await sql`DROP TABLE IF EXISTS password_reset_tokens;`.execute(db);
  await sql`DROP TABLE IF EXISTS user_sessions;`.execute(db);
  await sql`DROP TABLE IF EXISTS users;`.execute(db);
}
