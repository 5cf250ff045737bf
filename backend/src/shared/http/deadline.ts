/**
 * backend/src/shared/http/deadline.ts
 *
 * WHY:
 * - Every request has a bounded handling time. Past the deadline the caller gets
 *   503 TIMEOUT instead of a late, possibly partial, result.
 *
 * HOW TO USE:
 * - await runWithDeadline(config.requestTimeoutMs, (signal) => service.login(params, signal))
 * - Flows call signal.throwIfAborted() right before their commit step (session insert,
 *   revocation write) so a timed-out request never commits half of its work.
 */

import { SecurityErrors } from '../security/security.errors';

export async function runWithDeadline<T>(
  timeoutMs: number,
  work: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const expired = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      const err = SecurityErrors.timeout({ timeoutMs });
      controller.abort(err);
      reject(err);
    }, timeoutMs);
  });

  try {
    return await Promise.race([work(controller.signal), expired]);
  } finally {
    clearTimeout(timer);
  }
}
