import { describe, it, expect } from 'vitest';
import { ScanQueue } from '../src/reader/queue.js';

describe('ScanQueue', () => {
  it('should reject a non-positive or fractional capacity', () => {
    expect(() => new ScanQueue(0)).toThrow(RangeError);
    expect(() => new ScanQueue(-1)).toThrow(RangeError);
    expect(() => new ScanQueue(2.5)).toThrow(RangeError);
  });

  it('should hand out items in FIFO order', () => {
    const queue = new ScanQueue<string>(3);
    queue.push('a');
    queue.push('b');

    expect(queue.tryPop()).toBe('a');
    expect(queue.tryPop()).toBe('b');
    expect(queue.tryPop()).toBeNull();
  });

  it('should evict the oldest item when full', () => {
    const queue = new ScanQueue<string>(2);

    expect(queue.push('a')).toBeUndefined();
    expect(queue.push('b')).toBeUndefined();
    expect(queue.push('c')).toBe('a');

    expect(queue.size).toBe(2);
    expect(queue.tryPop()).toBe('b');
    expect(queue.tryPop()).toBe('c');
  });

  it('should resolve pop immediately when an item is queued', async () => {
    const queue = new ScanQueue<string>();
    queue.push('a');

    await expect(queue.pop(1000)).resolves.toBe('a');
  });

  it('should resolve pop with null after the timeout', async () => {
    const queue = new ScanQueue<string>();

    await expect(queue.pop(10)).resolves.toBeNull();
  });

  it('should resolve pop with null at once for a zero timeout', async () => {
    const queue = new ScanQueue<string>();

    await expect(queue.pop(0)).resolves.toBeNull();
  });

  it('should deliver a push to a waiting pop', async () => {
    const queue = new ScanQueue<string>();
    const pending = queue.pop(1000);

    expect(queue.push('a')).toBeUndefined();
    await expect(pending).resolves.toBe('a');
    expect(queue.size).toBe(0);
  });

  it('should serve waiters in the order they started waiting', async () => {
    const queue = new ScanQueue<string>();
    const first = queue.pop(1000);
    const second = queue.pop(1000);

    queue.push('a');
    queue.push('b');

    await expect(first).resolves.toBe('a');
    await expect(second).resolves.toBe('b');
  });

  it('should not hand a push to a waiter that already timed out', async () => {
    const queue = new ScanQueue<string>();
    await queue.pop(5);

    queue.push('a');
    expect(queue.size).toBe(1);
  });

  it('should release waiters with null on clear', async () => {
    const queue = new ScanQueue<string>();
    queue.push('a');
    await queue.pop(0);
    const pending = queue.pop(5000);

    queue.clear();

    await expect(pending).resolves.toBeNull();
    expect(queue.size).toBe(0);
  });

  it('should drop queued items on clear', () => {
    const queue = new ScanQueue<string>();
    queue.push('a');
    queue.push('b');

    queue.clear();

    expect(queue.tryPop()).toBeNull();
  });
});
