/**
 * backend/src/shared/http/ip-rate-limit.ts
 *
 * WHY:
 * - Global per-IP throttle in front of every route, before authentication work.
 * - Every response carries X-RateLimit-Limit / -Remaining / -Reset so well-behaved
 *   clients can pace themselves.
 *
 * RULES:
 * - The limiter passed in is the fail-open instance (a cache outage must not take
 *   the whole API down). Flow limiters stay fail-closed.
 * - A rejected request surfaces as RateLimitError -> 429 + Retry-After via the
 *   global error handler.
 */

import type { FastifyInstance } from 'fastify';
import { RateLimitError, type RateLimiter, type RateLimitRule } from '../security/rate-limit';

export function registerIpRateLimit(
  app: FastifyInstance,
  opts: { limiter: RateLimiter; rule: RateLimitRule },
) {
  app.addHook('onRequest', async (req, reply) => {
    const result = await opts.limiter.checkIp(req.ip, opts.rule);

    void reply.header('X-RateLimit-Limit', String(result.limit));
    void reply.header('X-RateLimit-Remaining', String(result.remaining));
    void reply.header('X-RateLimit-Reset', String(Math.ceil(result.resetAt.getTime() / 1000)));

    if (!result.allowed) {
      throw new RateLimitError(
        `ip:${req.ip}`,
        result.limit,
        opts.rule.windowSeconds,
        result.retryAfterSeconds,
      );
    }
  });
}
