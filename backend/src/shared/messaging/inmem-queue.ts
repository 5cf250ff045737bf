/**
 * src/shared/messaging/inmem-queue.ts
 *
 * WHY:
 * - Tests need to inspect what the service enqueued (OTP codes, reset links)
 *   without running real mail infrastructure.
 * - drain() is the test contract: call it after the HTTP request completes.
 * - Production: di.ts swaps this for a real transport adapter without touching flows.
 *
 * RULES:
 * - Implements Queue only; drain() is never called by production code.
 */

import type { Queue, QueueMessage } from './queue';

export class InMemQueue implements Queue {
  private readonly messages: QueueMessage[] = [];

  enqueue(message: QueueMessage): Promise<void> {
    this.messages.push(message);
    return Promise.resolve();
  }

  /**
   * Returns all enqueued messages and clears the queue.
   */
  drain(): QueueMessage[] {
    return this.messages.splice(0, this.messages.length);
  }
}
