// Unit tests for AsyncQueue

import { describe, it, expect } from 'vitest';
import { AsyncQueue } from '../../../src/utils/asyncQueue.js';

describe('AsyncQueue', () => {
  it('should throw when offering to a closed queue', () => {
    const q = new AsyncQueue<number>();
    q.close();

    expect(() => q.offer(1)).toThrow('Queue is closed');
  });

  it('should yield buffered items and terminate via for-await-of on close', async () => {
    const q = new AsyncQueue<number>();
    q.offer(1);
    q.offer(2);
    q.offer(3);
    q.close();

    const collected: number[] = [];
    for await (const item of q) {
      collected.push(item);
    }

    expect(collected).toEqual([1, 2, 3]);
  });

  it('should hand items to a waiting consumer in order', async () => {
    const q = new AsyncQueue<string>();
    const collected: string[] = [];

    const consumer = (async () => {
      for await (const item of q) {
        collected.push(item);
      }
    })();

    // Let the consumer reach its wait
    await Promise.resolve();
    q.offer('a');
    q.offer('b');
    q.close();
    await consumer;

    expect(collected).toEqual(['a', 'b']);
  });

  it('should report size and closed state', () => {
    const q = new AsyncQueue<number>();
    q.offer(7);

    expect(q.size()).toBe(1);
    expect(q.isClosed()).toBe(false);

    q.close();
    expect(q.isClosed()).toBe(true);
  });
});
