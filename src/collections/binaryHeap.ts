/** Returns a negative number when `a` sorts before `b`. */
export type Comparator<T> = (a: T, b: T) => number;

/**
 * Partially ordered collection stored as an implicit complete binary tree:
 * the root sits at index 0 and the children of `i` at `2i + 1` and `2i + 2`.
 *
 * `insert` and `extractMin` run in O(log n), `peek` in O(1).
 */
export class BinaryMinHeap<T> {
  private readonly items: T[] = [];

  constructor(
    private readonly compare: Comparator<T>,
    items: Iterable<T> = [],
  ) {
    for (const item of items) {
      this.insert(item);
    }
  }

  get size(): number {
    return this.items.length;
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  insert(item: T): void {
    this.items.push(item);
    this.bubbleUp(this.items.length - 1);
  }

  /** Returns the minimum item without removing it. */
  peek(): T | undefined {
    return this.items.length > 0 ? this.items[0] : undefined;
  }

  /** Removes and returns the minimum item. */
  extractMin(): T | undefined {
    if (this.items.length === 0) {
      return undefined;
    }
    const min = this.items[0];
    const last = this.items[this.items.length - 1];
    this.items.length -= 1;
    if (this.items.length > 0) {
      this.items[0] = last;
      this.bubbleDown(0);
    }
    return min;
  }

  /**
   * Removes the minimum and inserts `item` in a single sift. On an empty heap
   * the item is simply inserted and `undefined` is returned.
   */
  replaceMin(item: T): T | undefined {
    if (this.items.length === 0) {
      this.insert(item);
      return undefined;
    }
    const min = this.items[0];
    this.items[0] = item;
    this.bubbleDown(0);
    return min;
  }

  toArray(): T[] {
    return [...this.items];
  }

  private bubbleUp(index: number): void {
    while (index > 0) {
      const parent = Math.floor((index - 1) / 2);
      if (this.compare(this.items[parent], this.items[index]) <= 0) {
        break;
      }
      this.swap(parent, index);
      index = parent;
    }
  }

  private bubbleDown(index: number): void {
    const length = this.items.length;
    while (true) {
      let smallest = index;
      const left = 2 * index + 1;
      const right = 2 * index + 2;
      if (left < length && this.compare(this.items[left], this.items[smallest]) < 0) {
        smallest = left;
      }
      if (right < length && this.compare(this.items[right], this.items[smallest]) < 0) {
        smallest = right;
      }
      if (smallest === index) {
        break;
      }
      this.swap(index, smallest);
      index = smallest;
    }
  }

  private swap(a: number, b: number): void {
    [this.items[a], this.items[b]] = [this.items[b], this.items[a]];
  }
}
