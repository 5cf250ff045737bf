/**
 * backend/src/shared/http/client-info.ts
 *
 * WHY:
 * - Flows need the same request facts (ip, user agent, request id) for rate-limit
 *   keys, session fingerprints and audit context. Controllers build it once here.
 *
 * RULES:
 * - req.ip honours TRUST_PROXY (set on the Fastify instance), never raw X-Forwarded-For.
 */

import type { FastifyRequest } from 'fastify';

export type ClientInfo = {
  ip: string;
  userAgent: string | null;
  acceptLanguage: string | null;
  requestId: string;
};

export function clientInfo(req: FastifyRequest): ClientInfo {
  return {
    ip: req.ip,
    userAgent: req.requestContext.userAgent,
    acceptLanguage: req.requestContext.acceptLanguage,
    requestId: req.requestContext.requestId,
  };
}
