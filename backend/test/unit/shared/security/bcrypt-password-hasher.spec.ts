import { describe, it, expect } from 'vitest';
import { BcryptPasswordHasher } from '../../../../src/shared/security/bcrypt-password-hasher';

function flipLowestBit(value: string, index: number): string {
  const code = value.charCodeAt(index) ^ 1;
  return value.slice(0, index) + String.fromCharCode(code) + value.slice(index + 1);
}

describe('BcryptPasswordHasher', () => {
  const hasher = new BcryptPasswordHasher({ cost: 4 });

  it('verifies the password it hashed', async () => {
    const hash = await hasher.hash('Correct-Horse-1');

    expect(hash).not.toContain('Correct-Horse-1');
    expect(await hasher.verify('Correct-Horse-1', hash)).toBe(true);
  });

  it.each([0, 7, 14])('rejects the password with one bit flipped at index %i', async (index) => {
    const hash = await hasher.hash('Correct-Horse-1');

    expect(await hasher.verify(flipLowestBit('Correct-Horse-1', index), hash)).toBe(false);
  });

  it('salts every hash', async () => {
    const a = await hasher.hash('Same-Password-1');
    const b = await hasher.hash('Same-Password-1');

    expect(a).not.toBe(b);
  });

  it('flags hashes made with another work factor for rehash', async () => {
    const older = await new BcryptPasswordHasher({ cost: 5 }).hash('Correct-Horse-1');
    const current = await hasher.hash('Correct-Horse-1');

    expect(hasher.needsRehash(older)).toBe(true);
    expect(hasher.needsRehash(current)).toBe(false);
    expect(hasher.needsRehash('not-a-bcrypt-hash')).toBe(true);
  });

  it('equalizeTiming completes without a stored hash', async () => {
    await expect(hasher.equalizeTiming('anything')).resolves.toBeUndefined();
  });
});
