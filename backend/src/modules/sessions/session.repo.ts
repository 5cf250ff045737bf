/**
 * src/modules/sessions/session.repo.ts
 *
 * WHY:
 * - Durable session records (visibility + audit). The revocation list, not this
 *   table, is what rejects a token; rows may lag the cache briefly.
 */

import type { SessionRecord } from './session.types';

export interface SessionRepo {
  insert(record: SessionRecord): Promise<void>;
  findById(sessionId: string): Promise<SessionRecord | undefined>;

  /** Not revoked and not expired at `now`, newest first. */
  listLive(params: { identityId: string; now: Date }): Promise<SessionRecord[]>;

  markRevoked(params: { sessionId: string; at: Date }): Promise<void>;
  clearRevoked(sessionId: string): Promise<void>;

  delete(sessionId: string): Promise<void>;
}
