import { describe, expect, it } from 'vitest';
import { appliedMessage } from './__tests__/helpers.js';
import { OfflineQueue } from './offline-queue.js';

describe('OfflineQueue', () => {
  it('should drain messages in enqueue order and empty the queue', () => {
    const queue = new OfflineQueue();
    queue.enqueue('user-1', appliedMessage('m1'));
    queue.enqueue('user-1', appliedMessage('m2'));
    queue.enqueue('user-2', appliedMessage('m3'));

    expect(queue.drain('user-1').map((message) => message.id)).toEqual(['m1', 'm2']);
    expect(queue.size('user-1')).toBe(0);
    expect(queue.totalSize()).toBe(1);
  });

  it('should return nothing for an unknown user', () => {
    expect(new OfflineQueue().drain('nobody')).toEqual([]);
  });

  it('should drop from the front once over the limit', () => {
    const queue = new OfflineQueue({ limit: 2 });

    expect(queue.enqueue('user-1', appliedMessage('m1'))).toEqual({ dropped: 0, size: 1 });
    expect(queue.enqueue('user-1', appliedMessage('m2'))).toEqual({ dropped: 0, size: 2 });
    expect(queue.enqueue('user-1', appliedMessage('m3'))).toEqual({ dropped: 1, size: 2 });

    expect(queue.droppedCount()).toBe(1);
    expect(queue.drain('user-1').map((message) => message.id)).toEqual(['m2', 'm3']);
  });

  it('should keep only messages enqueued after since', () => {
    const queue = new OfflineQueue();
    queue.enqueue('user-1', appliedMessage('m1'), 100);
    queue.enqueue('user-1', appliedMessage('m2'), 200);
    queue.enqueue('user-1', appliedMessage('m3'), 300);

    expect(queue.drain('user-1', 200).map((message) => message.id)).toEqual(['m3']);
    expect(queue.size('user-1')).toBe(0);
  });

  it('should treat a non-positive limit as 1', () => {
    const queue = new OfflineQueue({ limit: 0 });
    queue.enqueue('user-1', appliedMessage('m1'));
    queue.enqueue('user-1', appliedMessage('m2'));

    expect(queue.drain('user-1').map((message) => message.id)).toEqual(['m2']);
  });
});
