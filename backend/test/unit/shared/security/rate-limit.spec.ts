import { describe, it, expect, beforeEach } from 'vitest';
import { InMemCache } from '../../../../src/shared/cache/inmem-cache';
import { RateLimiter, RateLimitError } from '../../../../src/shared/security/rate-limit';
import { createTestClock, type TestClock } from '../../../helpers/test-clock';
import { UnavailableCache } from '../../../helpers/in-memory-stores';

const rule = { limit: 3, windowSeconds: 60 };

describe('RateLimiter', () => {
  let clock: TestClock;
  let limiter: RateLimiter;

  beforeEach(() => {
    clock = createTestClock();
    limiter = new RateLimiter(new InMemCache({ now: clock.now }), {
      prefix: 'rl',
      clock: clock.now,
    });
  });

  it('allows up to the limit and rejects the next request', async () => {
    const first = await limiter.checkIp('10.0.0.1', rule);
    expect(first).toMatchObject({ allowed: true, limit: 3, remaining: 2 });

    await limiter.checkIp('10.0.0.1', rule);
    await limiter.checkIp('10.0.0.1', rule);

    const fourth = await limiter.checkIp('10.0.0.1', rule);
    expect(fourth).toMatchObject({ allowed: false, remaining: 0, retryAfterSeconds: 60 });
    expect(fourth.resetAt.getTime()).toBe(clock.now() + 60_000);
  });

  it('allows again once the window has slid past the oldest request', async () => {
    for (let i = 0; i < 3; i++) await limiter.checkIp('10.0.0.1', rule);

    clock.advance(61);

    expect((await limiter.checkIp('10.0.0.1', rule)).allowed).toBe(true);
  });

  it('slides rather than resetting on a fixed boundary', async () => {
    await limiter.checkIp('10.0.0.1', rule);
    clock.advance(30);
    await limiter.checkIp('10.0.0.1', rule);
    clock.advance(10);
    await limiter.checkIp('10.0.0.1', rule);

    clock.advance(10);
    const blocked = await limiter.checkIp('10.0.0.1', rule);
    expect(blocked).toMatchObject({ allowed: false, retryAfterSeconds: 10 });

    clock.advance(11);
    expect(await limiter.checkIp('10.0.0.1', rule)).toMatchObject({ allowed: true, remaining: 0 });
  });

  it('keeps scopes apart', async () => {
    for (let i = 0; i < 3; i++) await limiter.checkIp('10.0.0.1', rule);

    expect((await limiter.checkIp('10.0.0.2', rule)).allowed).toBe(true);
    expect((await limiter.checkEndpoint('10.0.0.1', 'auth.login', rule)).allowed).toBe(true);
    expect((await limiter.checkIdentifier('otp-send', '10.0.0.1', rule)).allowed).toBe(true);
  });

  it('hitOrThrow raises a RateLimitError carrying the retry delay', async () => {
    const key = RateLimiter.identifierKey('otp-send', 'abc');
    for (let i = 0; i < 3; i++) await limiter.hitOrThrow(key, rule);

    const error = await limiter.hitOrThrow(key, rule).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(RateLimitError);
    expect(error).toMatchObject({
      key: 'rl:id:otp-send:abc',
      limit: 3,
      windowSeconds: 60,
      retryAfterSeconds: 60,
    });
  });

  it('hitOrSkip answers false instead of throwing', async () => {
    const key = RateLimiter.identifierKey('forgot-password', 'abc');

    expect(await limiter.hitOrSkip(key, { limit: 1, windowSeconds: 3600 })).toBe(true);
    expect(await limiter.hitOrSkip(key, { limit: 1, windowSeconds: 3600 })).toBe(false);
  });

  it('fails closed on a cache outage by default', async () => {
    const closed = new RateLimiter(new UnavailableCache());

    await expect(closed.checkIp('10.0.0.1', rule)).rejects.toThrow('cache unavailable');
  });

  it('lets traffic through on a cache outage when failOpen is set', async () => {
    const open = new RateLimiter(new UnavailableCache(), { failOpen: true });

    expect(await open.checkIp('10.0.0.1', rule)).toMatchObject({ allowed: true, remaining: 3 });
  });

  it('never limits when disabled', async () => {
    const disabled = new RateLimiter(new UnavailableCache(), { disabled: true });

    for (let i = 0; i < 5; i++) {
      expect((await disabled.checkIp('10.0.0.1', rule)).allowed).toBe(true);
    }
  });
});
