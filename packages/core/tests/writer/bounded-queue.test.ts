import { describe, it, expect } from 'vitest';
import { BoundedQueue, QueueSaturationError } from '../../src/index.js';

describe('BoundedQueue', () => {
  it('is FIFO across wrap-around', () => {
    const queue = new BoundedQueue<number>(3, 'drop-newest');
    queue.push(1);
    queue.push(2);
    expect(queue.shift()).toBe(1);
    queue.push(3);
    queue.push(4);
    expect(queue.takeBatch(10)).toEqual([2, 3, 4]);
    expect(queue.isEmpty()).toBe(true);
  });

  it('drop-newest discards the incoming entry', () => {
    const queue = new BoundedQueue<number>(2, 'drop-newest');
    queue.push(1);
    queue.push(2);
    expect(queue.push(3)).toEqual({ accepted: false, evicted: 0 });
    expect(queue.dropped).toBe(1);
    expect(queue.takeBatch(5)).toEqual([1, 2]);
  });

  it('drop-oldest evicts the head', () => {
    const queue = new BoundedQueue<number>(2, 'drop-oldest');
    queue.push(1);
    queue.push(2);
    expect(queue.push(3)).toEqual({ accepted: true, evicted: 1 });
    expect(queue.length).toBe(2);
    expect(queue.takeBatch(5)).toEqual([2, 3]);
  });

  it('reject throws and counts the loss', () => {
    const queue = new BoundedQueue<number>(1, 'reject');
    queue.push(1);
    expect(() => queue.push(2)).toThrow(QueueSaturationError);
    expect(queue.dropped).toBe(1);
    expect(queue.length).toBe(1);
  });

  it('takeBatch respects the limit', () => {
    const queue = new BoundedQueue<number>(5, 'drop-newest');
    [1, 2, 3, 4].forEach((n) => queue.push(n));
    expect(queue.takeBatch(3)).toEqual([1, 2, 3]);
    expect(queue.length).toBe(1);
  });

  it('clear reports how many entries it removed', () => {
    const queue = new BoundedQueue<string>(4, 'drop-newest');
    queue.push('a');
    queue.push('b');
    expect(queue.clear()).toBe(2);
    expect(queue.isEmpty()).toBe(true);
  });

  it('refuses a capacity below one', () => {
    expect(() => new BoundedQueue<number>(0, 'drop-newest')).toThrow(RangeError);
  });
});
