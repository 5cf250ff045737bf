import { describe, it, expect, beforeEach } from 'vitest';
import { InMemCache } from '../../../../src/shared/cache/inmem-cache';
import { InMemQueue } from '../../../../src/shared/messaging/inmem-queue';
import { HmacSha256KeyedHasher } from '../../../../src/shared/security/keyed-hasher';
import { OtpEngine } from '../../../../src/shared/security/otp-engine';
import { createTestClock, type TestClock } from '../../../helpers/test-clock';

const identityId = '5b0e7c1a-8f2d-4a61-9c3e-2d4f6a8b0c11';

describe('OtpEngine', () => {
  let clock: TestClock;
  let cache: InMemCache;
  let queue: InMemQueue;
  let engine: OtpEngine;

  beforeEach(() => {
    clock = createTestClock();
    cache = new InMemCache({ now: clock.now });
    queue = new InMemQueue();
    engine = new OtpEngine(
      {
        cache,
        hasher: new HmacSha256KeyedHasher('test-otp-hmac-key-0123456789abcdef'),
        queue,
        clock: clock.now,
      },
      { length: 6, ttlSeconds: 300, maxAttempts: 3 },
    );
  });

  function lastCode(): string {
    const message = queue.drain().at(-1);
    if (message?.type !== 'auth.otp-code') throw new Error('expected an otp-code message');
    return message.code;
  }

  it('dispatches a numeric code of the configured length', async () => {
    const { expiresAt } = await engine.issue({
      identityId,
      email: 'lee@example.com',
      purpose: 'two_factor',
    });

    expect(lastCode()).toMatch(/^\d{6}$/);
    expect(expiresAt.getTime()).toBe(clock.now() + 300_000);
  });

  it('stores only a keyed hash of the code', async () => {
    await engine.issue({ identityId, email: 'lee@example.com', purpose: 'two_factor' });
    const code = lastCode();

    const raw = await cache.get(OtpEngine.key('two_factor', identityId));
    const stored: unknown = JSON.parse(raw ?? '{}');

    expect(stored).toMatchObject({ codeHash: expect.stringMatching(/^[0-9a-f]{64}$/) });
    expect(stored).not.toMatchObject({ codeHash: code });
  });

  it('accepts the correct code exactly once', async () => {
    await engine.issue({ identityId, email: 'lee@example.com', purpose: 'two_factor' });
    const code = lastCode();

    expect(await engine.verify({ identityId, purpose: 'two_factor', code })).toBe('ok');
    expect(await engine.verify({ identityId, purpose: 'two_factor', code })).toBe('expired');
  });

  it('lets exactly one of two concurrent correct submissions through', async () => {
    await engine.issue({ identityId, email: 'lee@example.com', purpose: 'two_factor' });
    const code = lastCode();

    const outcomes = await Promise.all([
      engine.verify({ identityId, purpose: 'two_factor', code }),
      engine.verify({ identityId, purpose: 'two_factor', code }),
    ]);

    expect(outcomes.filter((o) => o === 'ok')).toHaveLength(1);
  });

  it('never lets a code cross purposes', async () => {
    await engine.issue({ identityId, email: 'lee@example.com', purpose: 'two_factor' });
    const code = lastCode();

    expect(await engine.verify({ identityId, purpose: 'email_verification', code })).toBe('expired');
    expect(await engine.verify({ identityId, purpose: 'two_factor', code })).toBe('ok');
  });

  it('reports expiry after the lifetime elapses', async () => {
    await engine.issue({ identityId, email: 'lee@example.com', purpose: 'two_factor' });
    const code = lastCode();

    clock.advance(301);

    expect(await engine.verify({ identityId, purpose: 'two_factor', code })).toBe('expired');
  });

  it('burns the code after the maximum number of mismatches', async () => {
    await engine.issue({ identityId, email: 'lee@example.com', purpose: 'two_factor' });
    const code = lastCode();
    const wrong = code === '000000' ? '111111' : '000000';

    expect(await engine.verify({ identityId, purpose: 'two_factor', code: wrong })).toBe('invalid');
    expect(await engine.verify({ identityId, purpose: 'two_factor', code: wrong })).toBe('invalid');
    expect(await engine.verify({ identityId, purpose: 'two_factor', code: wrong })).toBe('invalid');

    expect(await engine.verify({ identityId, purpose: 'two_factor', code })).toBe('expired');
  });

  it('resets the mismatch counter when a new code is issued', async () => {
    await engine.issue({ identityId, email: 'lee@example.com', purpose: 'two_factor' });
    const first = lastCode();
    const wrong = first === '000000' ? '111111' : '000000';

    await engine.verify({ identityId, purpose: 'two_factor', code: wrong });
    await engine.verify({ identityId, purpose: 'two_factor', code: wrong });

    await engine.issue({ identityId, email: 'lee@example.com', purpose: 'two_factor' });
    const second = lastCode();
    const wrongAgain = second === '000000' ? '111111' : '000000';

    expect(await engine.verify({ identityId, purpose: 'two_factor', code: wrongAgain })).toBe(
      'invalid',
    );
    expect(await engine.verify({ identityId, purpose: 'two_factor', code: second })).toBe('ok');
  });
});
