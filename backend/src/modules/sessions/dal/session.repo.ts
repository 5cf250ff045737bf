/**
 * backend/src/modules/sessions/dal/session.repo.ts
 *
 * WHY:
 * - Postgres SessionRepo over user_sessions.
 *
 * RULES:
 * - No AppError.
 * - Supports withDb() for transaction binding.
 */

import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { UserSessionsTable } from '../../../shared/db/db.schema';
import type { SessionRepo } from '../session.repo';
import type { SessionRecord } from '../session.types';

type SessionRow = Selectable<UserSessionsTable>;

function toSession(row: SessionRow): SessionRecord {
  return {
    id: row.id,
    identityId: row.user_id,
    issuedAt: row.issued_at,
    expiresAt: row.expires_at,
    clientFingerprint: row.client_fingerprint,
    userAgent: row.user_agent,
    ip: row.ip,
    revokedAt: row.revoked_at,
  };
}

export class KyselySessionRepo implements SessionRepo {
  constructor(private readonly db: DbExecutor) {}

  withDb(db: DbExecutor): KyselySessionRepo {
    return new KyselySessionRepo(db);
  }

  async insert(record: SessionRecord): Promise<void> {
    await this.db
      .insertInto('user_sessions')
      .values({
        id: record.id,
        user_id: record.identityId,
        issued_at: record.issuedAt,
        expires_at: record.expiresAt,
        client_fingerprint: record.clientFingerprint,
        user_agent: record.userAgent,
        ip: record.ip,
        revoked_at: record.revokedAt,
      })
      .execute();
  }

  async findById(sessionId: string): Promise<SessionRecord | undefined> {
    const row = await this.db
      .selectFrom('user_sessions')
      .selectAll()
      .where('id', '=', sessionId)
      .executeTakeFirst();
    return row ? toSession(row) : undefined;
  }

  async listLive(params: { identityId: string; now: Date }): Promise<SessionRecord[]> {
    const rows = await this.db
      .selectFrom('user_sessions')
      .selectAll()
      .where('user_id', '=', params.identityId)
      .where('revoked_at', 'is', null)
      .where('expires_at', '>', params.now)
      .orderBy('issued_at', 'desc')
      .execute();
    return rows.map(toSession);
  }

  async markRevoked(params: { sessionId: string; at: Date }): Promise<void> {
    await this.db
      .updateTable('user_sessions')
      .set({ revoked_at: params.at })
      .where('id', '=', params.sessionId)
      .where('revoked_at', 'is', null)
      .execute();
  }

  async clearRevoked(sessionId: string): Promise<void> {
    await this.db
      .updateTable('user_sessions')
      .set({ revoked_at: null })
      .where('id', '=', sessionId)
      .execute();
  }

  async delete(sessionId: string): Promise<void> {
    await this.db.deleteFrom('user_sessions').where('id', '=', sessionId).execute();
  }
}
