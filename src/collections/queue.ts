/**
 * FIFO queue backed by an array and a moving head index, so `dequeue` stays
 * O(1) where `Array.prototype.shift` would copy the remaining items.
 */
export class Queue<T> {
  private items: T[] = [];
  private head = 0;

  constructor(items: Iterable<T> = []) {
    for (const item of items) {
      this.enqueue(item);
    }
  }

  get size(): number {
    return this.items.length - this.head;
  }

  isEmpty(): boolean {
    return this.size === 0;
  }

  enqueue(item: T): void {
    this.items.push(item);
  }

  /** Removes and returns the oldest item, or `undefined` when empty. */
  dequeue(): T | undefined {
    return this.isEmpty() ? undefined : this.take();
  }

  /**
   * Removes and returns the oldest item. Unlike {@link dequeue} the result is
   * never ambiguous, so queues may hold `undefined`. Throws on an empty queue.
   */
  take(): T {
    if (this.isEmpty()) {
      throw new RangeError("Cannot take from an empty queue");
    }
    const item = this.items[this.head];
    this.head += 1;
    // Compact once the consumed prefix dominates the backing array.
    if (this.head >= 32 && this.head * 2 >= this.items.length) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }
    return item;
  }

  peek(): T | undefined {
    return this.head < this.items.length ? this.items[this.head] : undefined;
  }
}
