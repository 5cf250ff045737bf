/**
 * backend/src/shared/audit/audit.repo.ts
 *
 * WHY:
 * - Append-only audit sink. Services call it when "someone did something meaningful".
 * - AuditRepo is the seam; KyselyAuditRepo persists to audit_events.
 *
 * RULES:
 * - DAL-style component: DB concerns only.
 * - No business rules here.
 * - No AppError.
 * - Must work with both DB and transactions (DbExecutor).
 * - Metadata is accepted as plain object and serialized here.
 */

import type { DbExecutor } from '../db/db';
import type { AuditEventInsert } from './audit.types';

export interface AuditRepo {
  append(event: AuditEventInsert): Promise<void>;
}

export class KyselyAuditRepo implements AuditRepo {
  constructor(private readonly db: DbExecutor) {}

  /**
   * Returns a repo bound to a different executor (e.g. a transaction).
   */
  withDb(db: DbExecutor): KyselyAuditRepo {
    return new KyselyAuditRepo(db);
  }

  async append(event: AuditEventInsert): Promise<void> {
    await this.db
      .insertInto('audit_events')
      .values({
        action: event.action,
        user_id: event.userId,
        request_id: event.requestId,
        ip: event.ip,
        user_agent: event.userAgent,
        // stringify drops undefined/functions; pg casts the text to jsonb
        metadata: JSON.stringify(event.metadata ?? {}),
      })
      .execute();
  }
}
