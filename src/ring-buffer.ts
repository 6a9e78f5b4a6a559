/**
 * Fixed-capacity ring buffer with drop-oldest eviction.
 * Uses a circular buffer for O(1) push/shift regardless of fill level.
 *
 * Backs the live sliding window (last N scored samples) and the inbox of
 * frames pushed by a streaming client.
 */

export class RingBuffer<T> {
  private buffer: (T | undefined)[];
  private head: number; // index of the oldest element
  private tail: number; // index of the next write position
  private count: number;
  private readonly maxSize: number;
  private evicted: number;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new Error(`Invalid ring buffer capacity: ${capacity}. Must be a positive integer.`);
    }
    this.maxSize = capacity;
    this.buffer = new Array<T | undefined>(capacity).fill(undefined);
    this.head = 0;
    this.tail = 0;
    this.count = 0;
    this.evicted = 0;
  }

  /**
   * Append an item. When full, the oldest item is evicted first.
   * Returns the evicted item, if any.
   */
  push(item: T): T | undefined {
    let dropped: T | undefined;

    if (this.count === this.maxSize) {
      dropped = this.buffer[this.head];
      this.buffer[this.head] = undefined; // release reference to oldest
      this.head = (this.head + 1) % this.maxSize;
      this.count--;
      this.evicted++;
    }

    this.buffer[this.tail] = item;
    this.tail = (this.tail + 1) % this.maxSize;
    this.count++;
    return dropped;
  }

  /** Remove and return the oldest item (FIFO), or undefined if empty. */
  shift(): T | undefined {
    if (this.count === 0) {
      return undefined;
    }

    const item = this.buffer[this.head];
    this.buffer[this.head] = undefined;
    this.head = (this.head + 1) % this.maxSize;
    this.count--;
    return item;
  }

  /** Most recently pushed item, or undefined if empty. */
  peekNewest(): T | undefined {
    if (this.count === 0) return undefined;
    return this.buffer[(this.tail - 1 + this.maxSize) % this.maxSize];
  }

  /** Snapshot in insertion order, oldest first. */
  toArray(): T[] {
    const items: T[] = [];
    for (let i = 0; i < this.count; i++) {
      const item = this.buffer[(this.head + i) % this.maxSize];
      if (item !== undefined) items.push(item);
    }
    return items;
  }

  /** Items evicted because the buffer was full at push time. */
  get evictedCount(): number {
    return this.evicted;
  }

  get size(): number {
    return this.count;
  }

  get capacity(): number {
    return this.maxSize;
  }

  /** Drop all items and reset pointers. The eviction counter is kept. */
  clear(): void {
    this.buffer.fill(undefined);
    this.head = 0;
    this.tail = 0;
    this.count = 0;
  }
}
