/**
 * backend/src/shared/security/password-hasher.ts
 *
 * WHY:
 * - Password hashing must be consistent, safe, and easy to swap.
 * - Services should depend on an interface (DIP), not bcrypt directly.
 *
 * HOW TO USE:
 * - const hash = await hasher.hash(password)
 * - const ok = await hasher.verify(password, hash)
 * - if (hasher.needsRehash(hash)) -> store a fresh hash after a successful login
 */

export interface PasswordHasher {
  hash(plain: string): Promise<string>;
  verify(plain: string, hash: string): Promise<boolean>;

  /** True when `hash` was produced with a different work factor than the current one. */
  needsRehash(hash: string): boolean;

  /** Burns the same time a real verify would. Used when the identity does not exist. */
  equalizeTiming(plain: string): Promise<void>;
}
