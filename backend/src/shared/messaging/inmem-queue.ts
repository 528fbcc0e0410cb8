/**
 * src/shared/messaging/inmem-queue.ts
 *
 * WHY:
 * - Tests inspect what a flow enqueued without any mail infrastructure.
 * - Production swaps this for a real transport in di.ts without touching flows.
 *
 * RULES:
 * - drain() is for tests only; flows see the Queue interface.
 */

import type { Queue, QueueMessage } from './queue';

export class InMemQueue implements Queue {
  private readonly messages: QueueMessage[] = [];

  enqueue(message: QueueMessage): Promise<void> {
    this.messages.push(message);
    return Promise.resolve();
  }

  /** Returns every enqueued message and empties the queue. */
  drain(): QueueMessage[] {
    return this.messages.splice(0, this.messages.length);
  }
}
