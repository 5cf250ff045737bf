/**
 * backend/src/app/server.ts
 *
 * WHY:
 * - Builds the Fastify server and registers global plugins/hooks.
 * - Keeps "build app" separate from "start listening" (test-friendly).
 *
 * HOOK ORDER (onRequest):
 *  1. request context (requestId, client headers)
 *  2. empty auth context
 *  3. request log
 *  4. global per-IP rate limit (fail-open)
 *  5. bearer authentication (failures recorded, gates decide)
 */

import Fastify from 'fastify';

import type { AppConfig } from './config';
import type { AppDeps } from './di';
import { logger } from '../shared/logger/logger';
import { registerRequestContext } from '../shared/http/request-context';
import { registerAuthContext } from '../shared/http/auth-context';
import { registerErrorHandler } from '../shared/http/error-handler';
import { registerIpRateLimit } from '../shared/http/ip-rate-limit';
import { registerTokenAuthentication } from '../shared/session/token-auth.middleware';

export async function buildServer(opts: { config: AppConfig; deps: AppDeps }) {
  const { config, deps } = opts;

  const app = Fastify({
    logger: false, // we use our own Winston logger
    trustProxy: config.trustProxy,
  });

  registerRequestContext(app);
  registerAuthContext(app);
  registerErrorHandler(app);

  app.addHook('onRequest', async (req) => {
    logger.info('request', {
      method: req.method,
      url: req.url,
      requestId: req.requestContext.requestId,
      host: req.requestContext.host,
    });
  });

  registerIpRateLimit(app, {
    limiter: deps.ipRateLimiter,
    rule: { limit: config.rateLimits.ipPerMinute, windowSeconds: 60 },
  });

  registerTokenAuthentication(app, {
    tokenService: deps.tokenService,
    revocationList: deps.revocationList,
    resolveAccess: (identityId) => deps.access.permissionResolver.resolve(identityId),
  });

  return app;
}
