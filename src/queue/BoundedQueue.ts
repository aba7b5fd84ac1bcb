/**
 * Fixed-capacity FIFO over a ring buffer. offer() refuses instead of growing,
 * which is what gives the scheduler its backpressure.
 */
export class BoundedQueue<T> {
  private readonly slots: Array<T | undefined>;
  private head = 0;
  private count = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 0) {
      throw new RangeError(`Queue capacity must be a non-negative integer, got ${capacity}`);
    }
    this.slots = new Array<T | undefined>(capacity).fill(undefined);
  }

  get size(): number {
    return this.count;
  }

  isFull(): boolean {
    return this.count >= this.capacity;
  }

  /** Returns false, leaving the queue untouched, when it is full */
  offer(item: T): boolean {
    if (this.isFull()) return false;
    this.slots[(this.head + this.count) % this.capacity] = item;
    this.count++;
    return true;
  }

  poll(): T | undefined {
    if (this.count === 0) return undefined;
    const item = this.slots[this.head];
    this.slots[this.head] = undefined;
    this.head = (this.head + 1) % this.capacity;
    this.count--;
    return item;
  }

  /** Empties the queue and returns what it held, oldest first */
  drain(): T[] {
    const items: T[] = [];
    for (let item = this.poll(); item !== undefined; item = this.poll()) {
      items.push(item);
    }
    return items;
  }
}
