/**
 * backend/src/modules/identities/dal/identity.repo.ts
 *
 * WHY:
 * - Postgres CredentialStore: maps rows to domain types and performs the writes.
 *
 * RULES:
 * - No AppError.
 * - No policies.
 * - Supports withDb() for transaction binding.
 * - The failure counter increment happens in SQL (no read-modify-write in JS).
 */

import { sql } from 'kysely';

import type { DbExecutor } from '../../../shared/db/db';
import type { CredentialStore } from '../credential-store';
import type { IdentityWithHash, PasswordResetToken } from '../identity.types';
import {
  selectIdentityByEmailSql,
  selectIdentityByIdSql,
  selectValidResetTokenSql,
  type IdentityRow,
} from './identity.query-sql';

function toIdentity(row: IdentityRow): IdentityWithHash {
  return {
    id: row.id,
    email: row.email,
    phone: row.phone,
    status: row.status,
    twoFactorEnabled: row.two_factor_enabled,
    failedLoginAttempts: row.failed_login_attempts,
    lockedUntil: row.locked_until,
    passwordChangedAt: row.password_changed_at,
    emailVerifiedAt: row.email_verified_at,
    lastLoginAt: row.last_login_at,
    passwordHash: row.password_hash,
  };
}

export class KyselyCredentialStore implements CredentialStore {
  constructor(private readonly db: DbExecutor) {}

  withDb(db: DbExecutor): KyselyCredentialStore {
    return new KyselyCredentialStore(db);
  }

  async findByEmail(email: string): Promise<IdentityWithHash | undefined> {
    const row = await selectIdentityByEmailSql(this.db, email);
    return row ? toIdentity(row) : undefined;
  }

  async findById(identityId: string): Promise<IdentityWithHash | undefined> {
    const row = await selectIdentityByIdSql(this.db, identityId);
    return row ? toIdentity(row) : undefined;
  }

  async recordFailedLogin(params: {
    identityId: string;
    lockUntil: Date | null;
    at: Date;
  }): Promise<number> {
    const row = await this.db
      .updateTable('users')
      .set({
        failed_login_attempts: sql<number>`failed_login_attempts + 1`,
        locked_until: sql<Date | null>`COALESCE(${params.lockUntil}::timestamptz, locked_until)`,
        updated_at: params.at,
      })
      .where('id', '=', params.identityId)
      .returning(['failed_login_attempts'])
      .executeTakeFirst();

    return row?.failed_login_attempts ?? 0;
  }

  async recordSuccessfulLogin(params: { identityId: string; ip: string; at: Date }): Promise<void> {
    await this.db
      .updateTable('users')
      .set({
        failed_login_attempts: 0,
        locked_until: null,
        last_login_at: params.at,
        last_login_ip: params.ip,
        updated_at: params.at,
      })
      .where('id', '=', params.identityId)
      .execute();
  }

  async updatePasswordHash(params: {
    identityId: string;
    passwordHash: string;
    changedAt: Date;
  }): Promise<void> {
    await this.db
      .updateTable('users')
      .set({
        password_hash: params.passwordHash,
        password_changed_at: params.changedAt,
        updated_at: params.changedAt,
      })
      .where('id', '=', params.identityId)
      .execute();
  }

  async upgradePasswordHash(params: {
    identityId: string;
    passwordHash: string;
    at: Date;
  }): Promise<void> {
    await this.db
      .updateTable('users')
      .set({ password_hash: params.passwordHash, updated_at: params.at })
      .where('id', '=', params.identityId)
      .execute();
  }

  async markEmailVerified(params: { identityId: string; at: Date }): Promise<void> {
    await this.db
      .updateTable('users')
      .set({ email_verified_at: params.at, updated_at: params.at })
      .where('id', '=', params.identityId)
      .where('email_verified_at', 'is', null)
      .execute();
  }

  async insertPasswordResetToken(params: {
    identityId: string;
    tokenHash: string;
    expiresAt: Date;
  }): Promise<void> {
    await this.db
      .insertInto('password_reset_tokens')
      .values({
        user_id: params.identityId,
        token_hash: params.tokenHash,
        expires_at: params.expiresAt,
        used_at: null,
      })
      .execute();
  }

  async invalidateActiveResetTokens(params: { identityId: string; at: Date }): Promise<void> {
    await this.db
      .updateTable('password_reset_tokens')
      .set({ used_at: params.at })
      .where('user_id', '=', params.identityId)
      .where('used_at', 'is', null)
      .execute();
  }

  async findValidResetToken(params: {
    tokenHash: string;
    now: Date;
  }): Promise<PasswordResetToken | undefined> {
    const row = await selectValidResetTokenSql(this.db, params);
    if (!row) return undefined;
    return { id: row.id, identityId: row.user_id, expiresAt: row.expires_at };
  }

  async completePasswordReset(params: {
    tokenHash: string;
    identityId: string;
    passwordHash: string;
    at: Date;
  }): Promise<boolean> {
    return this.db.transaction().execute(async (trx) => {
      // Conditional consume: a concurrent reset with the same token updates 0 rows.
      const consumed = await trx
        .updateTable('password_reset_tokens')
        .set({ used_at: params.at })
        .where('token_hash', '=', params.tokenHash)
        .where('user_id', '=', params.identityId)
        .where('used_at', 'is', null)
        .returning(['id'])
        .executeTakeFirst();

      if (!consumed) return false;

      const store = this.withDb(trx);
      await store.updatePasswordHash({
        identityId: params.identityId,
        passwordHash: params.passwordHash,
        changedAt: params.at,
      });
      await trx
        .updateTable('users')
        .set({ failed_login_attempts: 0, locked_until: null })
        .where('id', '=', params.identityId)
        .execute();
      await store.invalidateActiveResetTokens({ identityId: params.identityId, at: params.at });

      return true;
    });
  }
}
