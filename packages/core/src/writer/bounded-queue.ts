import { QueueSaturationError } from '../errors.js';
import type { OverflowPolicy } from '../config/types.js';

/** Outcome of one {@link BoundedQueue.push}. */
export interface PushResult {
  /** Whether the pushed entry is now queued. */
  accepted: boolean;
  /** Older entries discarded to make room. */
  evicted: number;
}

/**
 * Fixed-capacity FIFO ring buffer with an explicit overflow policy.
 *
 * Losses are counted in {@link BoundedQueue.dropped}; memory never grows
 * past `capacity` entries.
 */
export class BoundedQueue<T> {
  private readonly items: Array<T | undefined>;
  private head = 0;
  private size = 0;
  private droppedCount = 0;

  constructor(
    readonly capacity: number,
    readonly policy: OverflowPolicy,
  ) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
    this.items = new Array<T | undefined>(capacity);
  }

  get length(): number {
    return this.size;
  }

  /** Entries lost to the overflow policy since construction. */
  get dropped(): number {
    return this.droppedCount;
  }

  isFull(): boolean {
    return this.size === this.capacity;
  }

  isEmpty(): boolean {
    return this.size === 0;
  }

  /**
   * Append an entry, applying the overflow policy when full.
   *
   * @throws {QueueSaturationError} Under the `reject` policy when full
   */
  push(item: T): PushResult {
    if (this.size < this.capacity) {
      this.items[(this.head + this.size) % this.capacity] = item;
      this.size += 1;
      return { accepted: true, evicted: 0 };
    }

    switch (this.policy) {
      case 'drop-newest':
        this.droppedCount += 1;
        return { accepted: false, evicted: 0 };
      case 'drop-oldest':
        this.items[this.head] = item;
        this.head = (this.head + 1) % this.capacity;
        this.droppedCount += 1;
        return { accepted: true, evicted: 1 };
      case 'reject':
        this.droppedCount += 1;
        throw new QueueSaturationError(
          `Event queue is full (${this.capacity} entries); event rejected`,
          this.capacity,
          this.droppedCount,
        );
    }
  }

  /** Remove and return the oldest entry. */
  shift(): T | undefined {
    if (this.size === 0) return undefined;
    const item = this.items[this.head];
    this.items[this.head] = undefined;
    this.head = (this.head + 1) % this.capacity;
    this.size -= 1;
    return item;
  }

  /** Remove up to `max` entries, oldest first. */
  takeBatch(max: number): T[] {
    const batch: T[] = [];
    while (batch.length < max && this.size > 0) {
      const item = this.shift();
      if (item !== undefined) batch.push(item);
    }
    return batch;
  }

  /** Remove every entry, returning how many there were. */
  clear(): number {
    const count = this.size;
    this.items.fill(undefined);
    this.head = 0;
    this.size = 0;
    return count;
  }
}
