/**
 * src/modules/sessions/session-registry.ts
 *
 * WHY:
 * - One place that ties a token pair's session id to its durable record and to the
 *   cache-backed revocation list.
 *
 * RULES:
 * - revoke(): the revocation entry is the critical write and goes first (errors
 *   propagate); marking the row is best-effort and only logged on failure.
 * - Revocation TTL = remaining refresh lifetime (plus the list's validation grace).
 * - discard() and reinstate() are the rollback pair for a rotation that did not
 *   finish: both cache writes are critical, the row update in reinstate() is not.
 * - listActive() hides sessions the revocation list already rejects, even when the
 *   row has not caught up yet.
 */

import { createHash } from 'node:crypto';

import type { Logger } from '../../shared/logger/logger';
import type { TokenPair } from '../../shared/security/token-service';
import type { RevocationList } from '../../shared/session/revocation-list';
import type { SessionRepo } from './session.repo';
import type { SessionClient, SessionRecord } from './session.types';

export class SessionRegistry {
  private readonly clock: () => number;

  constructor(
    private readonly deps: {
      sessionRepo: SessionRepo;
      revocationList: RevocationList;
      logger: Logger;
      clock?: () => number;
    },
  ) {
    this.clock = deps.clock ?? Date.now;
  }

  /** sha256(userAgent|ip|acceptLanguage), hex. */
  static fingerprint(client: SessionClient): string {
    return createHash('sha256')
      .update([client.userAgent ?? '', client.ip, client.acceptLanguage ?? ''].join('|'))
      .digest('hex');
  }

  async storeSession(identityId: string, pair: TokenPair, client: SessionClient): Promise<SessionRecord> {
    const record: SessionRecord = {
      id: pair.sessionId,
      identityId,
      issuedAt: pair.issuedAt,
      expiresAt: pair.refreshExpiresAt,
      clientFingerprint: SessionRegistry.fingerprint(client),
      userAgent: client.userAgent,
      ip: client.ip,
      revokedAt: null,
    };

    await this.deps.sessionRepo.insert(record);
    return record;
  }

  /**
   * Returns true when this call revoked the session, false when it was already revoked.
   */
  async revoke(sessionId: string, refreshExpiresAt: Date): Promise<boolean> {
    const now = this.clock();
    const ttlSeconds = Math.ceil((refreshExpiresAt.getTime() - now) / 1000);

    const revoked = await this.deps.revocationList.revoke(sessionId, ttlSeconds);

    try {
      await this.deps.sessionRepo.markRevoked({ sessionId, at: new Date(now) });
    } catch (err) {
      this.deps.logger.warn('session.mark_revoked_failed', {
        flow: 'session.revoke',
        sessionId,
        message: err instanceof Error ? err.message : String(err),
      });
    }

    return revoked;
  }

  /** Kills a session whose tokens never reached the client and drops its row. */
  async discard(sessionId: string, refreshExpiresAt: Date): Promise<void> {
    const ttlSeconds = Math.ceil((refreshExpiresAt.getTime() - this.clock()) / 1000);
    await this.deps.revocationList.revoke(sessionId, ttlSeconds);
    await this.deps.sessionRepo.delete(sessionId);
  }

  /** Undoes a revoke() this caller won. */
  async reinstate(sessionId: string): Promise<void> {
    await this.deps.revocationList.release(sessionId);

    try {
      await this.deps.sessionRepo.clearRevoked(sessionId);
    } catch (err) {
      this.deps.logger.warn('session.clear_revoked_failed', {
        flow: 'session.reinstate',
        sessionId,
        message: err instanceof Error ? err.message : String(err),
      });
    }
  }

  isRevoked(sessionId: string): Promise<boolean> {
    return this.deps.revocationList.isRevoked(sessionId);
  }

  /** Revokes every live session of the identity. Returns how many were live. */
  async revokeAllForIdentity(identityId: string): Promise<number> {
    const live = await this.deps.sessionRepo.listLive({ identityId, now: new Date(this.clock()) });

    for (const session of live) {
      await this.revoke(session.id, session.expiresAt);
    }

    return live.length;
  }

  async listActive(identityId: string): Promise<SessionRecord[]> {
    const live = await this.deps.sessionRepo.listLive({ identityId, now: new Date(this.clock()) });

    const active: SessionRecord[] = [];
    for (const session of live) {
      if (!(await this.deps.revocationList.isRevoked(session.id))) active.push(session);
    }
    return active;
  }
}
