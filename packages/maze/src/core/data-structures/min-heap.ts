/**
 * Binary min-heap ordered by a caller-supplied comparator.
 *
 * The frontier of A* and Dijkstra. Ties are the comparator's business:
 * the searches compare by priority, then by insertion counter.
 */

export type MinHeapCompare<T> = (a: T, b: T) => number;

export class MinHeap<T> {
  private readonly items: T[] = [];
  private readonly compare: MinHeapCompare<T>;

  constructor(compare: MinHeapCompare<T>) {
    this.compare = compare;
  }

  get size(): number {
    return this.items.length;
  }

  get isEmpty(): boolean {
    return this.items.length === 0;
  }

  peek(): T | undefined {
    return this.items[0];
  }

  push(value: T): void {
    this.items.push(value);
    this.siftUp(this.items.length - 1);
  }

  pop(): T | undefined {
    const best = this.items[0];
    const tail = this.items.pop();

    if (best === undefined || tail === undefined) {
      return undefined;
    }
    if (this.items.length === 0) {
      return best;
    }

    this.items[0] = tail;
    this.siftDown(0);
    return best;
  }

  clear(): void {
    this.items.length = 0;
  }

  private siftUp(startIndex: number): void {
    let index = startIndex;
    const value = this.items[index];
    if (value === undefined) return;

    while (index > 0) {
      const parent = (index - 1) >> 1;
      const parentValue = this.items[parent];
      if (parentValue === undefined) break;
      if (this.compare(parentValue, value) <= 0) break;

      this.items[index] = parentValue;
      index = parent;
    }

    this.items[index] = value;
  }

  private siftDown(startIndex: number): void {
    let index = startIndex;
    const value = this.items[index];
    if (value === undefined) return;

    while (true) {
      const left = index * 2 + 1;
      if (left >= this.items.length) break;

      const leftValue = this.items[left];
      if (leftValue === undefined) break;

      let bestChild = left;
      let bestChildValue = leftValue;

      const rightValue = this.items[left + 1];
      if (
        rightValue !== undefined &&
        this.compare(rightValue, bestChildValue) < 0
      ) {
        bestChild = left + 1;
        bestChildValue = rightValue;
      }

      if (this.compare(value, bestChildValue) <= 0) break;

      this.items[index] = bestChildValue;
      index = bestChild;
    }

    this.items[index] = value;
  }
}
