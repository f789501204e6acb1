/**
 * Bounded per-user buffers for messages a user missed while offline
 */

import type { ServerMessage } from './types.js';

interface QueuedMessage {
  message: ServerMessage;
  enqueuedAt: number;
}

export interface EnqueueResult {
  /** Messages dropped from the front to stay under the cap */
  dropped: number;
  /** Queue length after the append */
  size: number;
}

export class OfflineQueue {
  private readonly queues = new Map<string, QueuedMessage[]>();
  private readonly limit: number;
  private droppedTotal = 0;

  constructor(options: { limit?: number } = {}) {
    this.limit = Math.max(1, options.limit ?? 500);
  }

  /**
   * Append a message; the oldest entries go once the cap is exceeded
   */
  enqueue(userId: string, message: ServerMessage, now: number = Date.now()): EnqueueResult {
    let queue = this.queues.get(userId);
    if (!queue) {
      queue = [];
      this.queues.set(userId, queue);
    }

    queue.push({ message, enqueuedAt: now });

    let dropped = 0;
    if (queue.length > this.limit) {
      dropped = queue.length - this.limit;
      queue.splice(0, dropped);
      this.droppedTotal += dropped;
    }

    return { dropped, size: queue.length };
  }

  /**
   * Remove and return a user's queued messages in enqueue order. With
   * `since`, messages enqueued at or before it are discarded instead.
   */
  drain(userId: string, since?: number): ServerMessage[] {
    const queue = this.queues.get(userId);
    if (!queue) return [];

    this.queues.delete(userId);

    return queue
      .filter((entry) => since === undefined || entry.enqueuedAt > since)
      .map((entry) => entry.message);
  }

  /** Messages held for one user */
  size(userId: string): number {
    return this.queues.get(userId)?.length ?? 0;
  }

  /** Messages held across all users */
  totalSize(): number {
    let total = 0;
    for (const queue of this.queues.values()) total += queue.length;
    return total;
  }

  /** Messages dropped over the cap since creation */
  droppedCount(): number {
    return this.droppedTotal;
  }

  clear(): void {
    this.queues.clear();
  }
}
