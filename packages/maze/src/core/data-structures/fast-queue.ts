/**
 * FIFO queue with O(1) amortized enqueue and dequeue.
 *
 * Array-backed with a moving head; the consumed prefix is dropped once it
 * grows past the compaction threshold and outweighs the live part.
 *
 * @example
 * ```typescript
 * const queue = new FastQueue<number>();
 * queue.enqueue(1);
 * queue.enqueue(2);
 * queue.dequeue(); // 1
 * ```
 */
export class FastQueue<T> {
  private items: T[] = [];
  private head = 0;

  get length(): number {
    return this.items.length - this.head;
  }

  get isEmpty(): boolean {
    return this.length === 0;
  }

  enqueue(item: T): void {
    this.items.push(item);
  }

  /**
   * Remove and return the oldest item, or undefined when empty.
   */
  dequeue(): T | undefined {
    if (this.isEmpty) return undefined;

    const item = this.items[this.head];
    this.head++;

    if (this.head > 1000 && this.head > this.items.length / 2) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }

    return item;
  }

  peek(): T | undefined {
    if (this.isEmpty) return undefined;
    return this.items[this.head];
  }

  clear(): void {
    this.items = [];
    this.head = 0;
  }

  static from<T>(items: Iterable<T>): FastQueue<T> {
    const queue = new FastQueue<T>();
    for (const item of items) {
      queue.enqueue(item);
    }
    return queue;
  }
}
