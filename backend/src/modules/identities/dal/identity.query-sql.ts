/**
 * backend/src/modules/identities/dal/identity.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for identities and reset tokens (raw SQL access).
 *
 * RULES:
 * - No AppError.
 * - No policies.
 * - No transactions started here.
 */

import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { PasswordResetTokensTable, UsersTable } from '../../../shared/db/db.schema';

export type IdentityRow = Selectable<UsersTable>;
export type ResetTokenRow = Selectable<PasswordResetTokensTable>;

export async function selectIdentityByEmailSql(
  db: DbExecutor,
  email: string,
): Promise<IdentityRow | undefined> {
  return db
    .selectFrom('users')
    .selectAll()
    .where('email', '=', email.toLowerCase())
    .executeTakeFirst();
}

export async function selectIdentityByIdSql(
  db: DbExecutor,
  identityId: string,
): Promise<IdentityRow | undefined> {
  return db.selectFrom('users').selectAll().where('id', '=', identityId).executeTakeFirst();
}

export async function selectValidResetTokenSql(
  db: DbExecutor,
  params: { tokenHash: string; now: Date },
): Promise<ResetTokenRow | undefined> {
  return db
    .selectFrom('password_reset_tokens')
    .selectAll()
    .where('token_hash', '=', params.tokenHash)
    .where('used_at', 'is', null)
    .where('expires_at', '>', params.now)
    .executeTakeFirst();
}
