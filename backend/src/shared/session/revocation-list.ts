/**
 * src/shared/session/revocation-list.ts
 *
 * WHY:
 * - Signed tokens stay valid until they expire; this negative cache is how a
 *   session is killed early (logout, password change, refresh rotation).
 * - Presence of revoked:<sessionId> means "reject", checked on every authenticated
 *   request right after signature validation.
 *
 * RULES:
 * - TTL = remaining refresh-token lifetime plus the validation clock tolerance, so the
 *   entry covers every instant the token still verifies. After it expires, the session
 *   looks exactly like one never revoked.
 * - The write is never skipped: a token past exp but inside the tolerance still
 *   validates, and set-if-absent is what stops it from being rotated twice.
 * - revoke() is SET NX: the boolean tells the caller whether THIS call revoked it,
 *   which makes refresh rotation exclusive across instances.
 * - Critical write: cache errors propagate (fail closed).
 */

import type { Cache } from '../cache/cache';

export class RevocationList {
  private readonly graceSeconds: number;

  constructor(
    private readonly cache: Cache,
    opts: { graceSeconds?: number } = {},
  ) {
    this.graceSeconds = opts.graceSeconds ?? 0;
  }

  private key(sessionId: string): string {
    return `revoked:${sessionId}`;
  }

  /**
   * Returns true when this call inserted the entry, false when it already existed.
   */
  async revoke(sessionId: string, ttlSeconds: number): Promise<boolean> {
    const remaining = Math.max(Math.ceil(ttlSeconds), 0);
    const ttl = Math.max(remaining + this.graceSeconds, 1);
    return this.cache.setIfAbsent(this.key(sessionId), '1', { ttlSeconds: ttl });
  }

  /** Undoes a revoke this caller won (rollback of an unfinished rotation). */
  async release(sessionId: string): Promise<void> {
    await this.cache.del(this.key(sessionId));
  }

  async isRevoked(sessionId: string): Promise<boolean> {
    return (await this.cache.get(this.key(sessionId))) !== null;
  }
}
