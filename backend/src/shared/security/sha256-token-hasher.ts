/**
 * backend/src/shared/security/sha256-token-hasher.ts
 *
 * WHY:
 * - Concrete TokenHasher using SHA-256: reset tokens (256-bit random), email keys,
 *   and the session client fingerprint.
 */

import { createHash } from 'node:crypto';
import type { TokenHasher } from './token-hasher';

export class Sha256TokenHasher implements TokenHasher {
  hash(rawToken: string): string {
    return createHash('sha256').update(rawToken).digest('hex');
  }
}
