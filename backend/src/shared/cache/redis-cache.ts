/**
 * backend/src/shared/cache/redis-cache.ts
 *
 * WHY:
 * - Redis implementation of Cache used for lockout counters, OTPs, revocations,
 *   rate windows and permission sets.
 *
 * ATOMICITY:
 * - incr / compareAndDelete / slidingWindowHit run as Lua scripts so the
 *   read-modify-write happens inside Redis. Two instances racing on the same key
 *   cannot both pass a boundary check.
 *
 * IMPORTANT:
 * - Importing RedisClientType can cause type conflicts if multiple copies of
 *   @redis/client exist. We avoid that by deriving the client type from createClient().
 *
 * LOGGING:
 * - Connection errors fire outside any request context; we use the global logger.
 */

import { randomUUID } from 'node:crypto';
import { createClient } from 'redis';
import type { Cache, CacheSetOptions, SlidingWindowHit, SlidingWindowInput } from './cache';
import { logger } from '../logger/logger';

type RedisClient = ReturnType<typeof createClient>;

// KEYS[1] counter, ARGV[1] ttl seconds (0 = none). TTL is seeded on first increment only.
const INCR_WITH_TTL_SCRIPT = `
local value = redis.call('INCR', KEYS[1])
if value == 1 and tonumber(ARGV[1]) > 0 then
  redis.call('EXPIRE', KEYS[1], tonumber(ARGV[1]))
end
return value
`;

// KEYS[1] key, ARGV[1] expected value
const COMPARE_AND_DELETE_SCRIPT = `
if redis.call('GET', KEYS[1]) == ARGV[1] then
  return redis.call('DEL', KEYS[1])
end
return 0
`;

// KEYS[1] zset, ARGV: now ms, window ms, limit, unique member
const SLIDING_WINDOW_SCRIPT = `
local key = KEYS[1]
local now = tonumber(ARGV[1])
local window = tonumber(ARGV[2])
local limit = tonumber(ARGV[3])
local member = ARGV[4]

redis.call('ZREMRANGEBYSCORE', key, '-inf', now - window)
local count = redis.call('ZCARD', key)

local allowed = 0
if count < limit then
  redis.call('ZADD', key, now, member)
  count = count + 1
  allowed = 1
end

redis.call('PEXPIRE', key, window)

local oldest = -1
local first = redis.call('ZRANGE', key, 0, 0, 'WITHSCORES')
if first[2] then
  oldest = tonumber(first[2])
end

return { allowed, count, oldest }
`;

function toInteger(reply: unknown, script: string): number {
  if (typeof reply === 'number') return reply;
  if (typeof reply === 'string' && /^-?\d+$/.test(reply)) return Number(reply);
  throw new Error(`redis.${script}: unexpected reply ${JSON.stringify(reply)}`);
}

export class RedisCache implements Cache {
  private constructor(private readonly client: RedisClient) {}

  static async connect(redisUrl: string): Promise<RedisCache> {
    const client = createClient({ url: redisUrl });

    client.on('error', (err: Error) => {
      logger.error('redis.client_error', {
        flow: 'redis',
        message: err.message,
        stack: err.stack,
      });
    });

    await client.connect();
    return new RedisCache(client);
  }

  async close(): Promise<void> {
    await this.client.quit();
  }

  async get(key: string): Promise<string | null> {
    return this.client.get(key);
  }

  async set(key: string, value: string, opts?: CacheSetOptions): Promise<void> {
    if (opts?.ttlSeconds) {
      await this.client.set(key, value, { EX: opts.ttlSeconds });
      return;
    }
    await this.client.set(key, value);
  }

  async del(key: string): Promise<void> {
    await this.client.del(key);
  }

  async incr(key: string, opts?: { ttlSeconds?: number }): Promise<number> {
    const reply = await this.client.eval(INCR_WITH_TTL_SCRIPT, {
      keys: [key],
      arguments: [String(opts?.ttlSeconds ?? 0)],
    });
    return toInteger(reply, 'incr');
  }

  async setIfAbsent(key: string, value: string, opts?: CacheSetOptions): Promise<boolean> {
    const reply = opts?.ttlSeconds
      ? await this.client.set(key, value, { NX: true, EX: opts.ttlSeconds })
      : await this.client.set(key, value, { NX: true });
    return reply === 'OK';
  }

  async ttl(key: string): Promise<number | null> {
    const seconds = await this.client.ttl(key);
    // -2: missing, -1: no expiry
    return seconds >= 0 ? seconds : null;
  }

  async compareAndDelete(key: string, expected: string): Promise<boolean> {
    const reply = await this.client.eval(COMPARE_AND_DELETE_SCRIPT, {
      keys: [key],
      arguments: [expected],
    });
    return toInteger(reply, 'compareAndDelete') === 1;
  }

  async slidingWindowHit(key: string, input: SlidingWindowInput): Promise<SlidingWindowHit> {
    const member = `${input.nowMs}:${randomUUID()}`;

    const reply = await this.client.eval(SLIDING_WINDOW_SCRIPT, {
      keys: [key],
      arguments: [String(input.nowMs), String(input.windowMs), String(input.limit), member],
    });

    if (!Array.isArray(reply) || reply.length !== 3) {
      throw new Error(`redis.slidingWindowHit: unexpected reply ${JSON.stringify(reply)}`);
    }

    const [allowed, count, oldest] = reply.map((part: unknown) =>
      toInteger(part, 'slidingWindowHit'),
    );

    return {
      allowed: allowed === 1,
      count: count ?? 0,
      oldestMs: oldest === undefined || oldest < 0 ? null : oldest,
    };
  }
}
