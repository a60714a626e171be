/**
 * Binary min-heap ordered by a caller-supplied comparator.
 */

export type MinHeapCompare<T> = (a: T, b: T) => number;

export class MinHeap<T> {
  private readonly items: T[] = [];

  constructor(private readonly compare: MinHeapCompare<T>) {}

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
    const items = this.items;
    let index = items.length;
    items.push(value);

    while (index > 0) {
      const parent = (index - 1) >> 1;
      const parentValue = items[parent];
      if (parentValue === undefined || this.compare(parentValue, value) <= 0) {
        break;
      }
      items[index] = parentValue;
      index = parent;
    }
    items[index] = value;
  }

  pop(): T | undefined {
    const items = this.items;
    const best = items[0];
    const tail = items.pop();
    if (best === undefined || tail === undefined || items.length === 0) {
      return best;
    }

    let index = 0;
    const length = items.length;
    while (true) {
      const left = index * 2 + 1;
      if (left >= length) break;

      let child = left;
      let childValue = items[left];
      const rightValue = items[left + 1];
      if (
        rightValue !== undefined &&
        childValue !== undefined &&
        this.compare(rightValue, childValue) < 0
      ) {
        child = left + 1;
        childValue = rightValue;
      }
      if (childValue === undefined || this.compare(tail, childValue) <= 0) {
        break;
      }

      items[index] = childValue;
      index = child;
    }
    items[index] = tail;
    return best;
  }

  clear(): void {
    this.items.length = 0;
  }
}
