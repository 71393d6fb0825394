/**
 * Generic binary min-heap.
 *
 * O(log n) push/pop with caller-defined ordering. Entries that compare equal
 * pop in no particular order, so callers that need stable ties put a
 * sequence number into the comparison.
 */

export type MinHeapCompare<T> = (a: T, b: T) => number;

export class MinHeap<T> {
  private readonly items: T[] = [];

  constructor(private readonly compare: MinHeapCompare<T>) {}

  get isEmpty(): boolean {
    return this.items.length === 0;
  }

  push(value: T): void {
    const items = this.items;
    let index = items.length;
    items.push(value);

    while (index > 0) {
      const parent = (index - 1) >> 1;
      if (this.compare(items[parent], value) <= 0) break;
      items[index] = items[parent];
      index = parent;
    }
    items[index] = value;
  }

  pop(): T | undefined {
    const items = this.items;
    if (items.length === 0) return undefined;

    const best = items[0];
    const tail = items.pop();
    if (tail === undefined || items.length === 0) return best;

    // Sift the former tail down from the root
    let index = 0;
    const length = items.length;
    while (true) {
      const left = index * 2 + 1;
      if (left >= length) break;
      const right = left + 1;
      const child =
        right < length && this.compare(items[right], items[left]) < 0 ? right : left;
      if (this.compare(tail, items[child]) <= 0) break;
      items[index] = items[child];
      index = child;
    }
    items[index] = tail;
    return best;
  }
}
