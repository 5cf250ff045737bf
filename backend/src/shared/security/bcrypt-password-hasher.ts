/**
 * backend/src/shared/security/bcrypt-password-hasher.ts
 *
 * WHY:
 * - Bcrypt is a battle-tested adaptive password hash.
 * - The cost lives inside each hash, so raising BCRYPT_COST never breaks old hashes;
 *   needsRehash() lets login upgrade them lazily.
 *
 * HOW TO USE:
 * - const hasher = new BcryptPasswordHasher({ cost: 12 })
 * - const hash = await hasher.hash('secret')
 * - const ok = await hasher.verify('secret', hash)
 */

import bcrypt from 'bcrypt';
import type { PasswordHasher } from './password-hasher';

export class BcryptPasswordHasher implements PasswordHasher {
  private readonly cost: number;
  private timingHash: Promise<string> | null = null;

  constructor(opts?: { cost?: number }) {
    this.cost = opts?.cost ?? 12;
  }

  async hash(plain: string): Promise<string> {
    return bcrypt.hash(plain, this.cost);
  }

  async verify(plain: string, hash: string): Promise<boolean> {
    return bcrypt.compare(plain, hash);
  }

  needsRehash(hash: string): boolean {
    try {
      return bcrypt.getRounds(hash) !== this.cost;
    } catch {
      // not a bcrypt hash at all
      return true;
    }
  }

  async equalizeTiming(plain: string): Promise<void> {
    this.timingHash ??= bcrypt.hash('timing-equalizer', this.cost);
    await bcrypt.compare(plain, await this.timingHash);
  }
}
