/**
 * backend/src/modules/sessions/session.module.ts
 *
 * WHY:
 * - Support module (no routes of its own; GET /auth/sessions lives in auth).
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 */

import type { Logger } from '../../shared/logger/logger';
import type { RevocationList } from '../../shared/session/revocation-list';
import type { SessionRepo } from './session.repo';
import { SessionRegistry } from './session-registry';

export type SessionModule = ReturnType<typeof createSessionModule>;

export function createSessionModule(deps: {
  sessionRepo: SessionRepo;
  revocationList: RevocationList;
  logger: Logger;
  clock?: () => number;
}) {
  const sessionRegistry = new SessionRegistry(deps);

  return {
    sessionRegistry,
  };
}
