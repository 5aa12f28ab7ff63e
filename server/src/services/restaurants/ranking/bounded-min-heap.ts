/**
 * Array-backed binary min-heap holding at most `capacity` items.
 *
 * `less(a, b)` decides heap order; the root is the element every other element is not less than.
 * Used with a "ranks below" predicate so the root is the worst entry kept.
 */

export type OfferResult = 'inserted' | 'replaced' | 'discarded';

export class BoundedMinHeap<T> {
  private readonly data: T[] = [];

  constructor(
    readonly capacity: number,
    private readonly less: (a: T, b: T) => boolean
  ) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Heap capacity must be a positive integer, got ${capacity}`);
    }
  }

  size(): number {
    return this.data.length;
  }

  isFull(): boolean {
    return this.data.length >= this.capacity;
  }

  peek(): T | undefined {
    return this.data[0];
  }

  /**
   * Insert while below capacity. Once full, `item` replaces the root only when
   * the root is strictly less than it; ties keep the root.
   */
  offer(item: T): OfferResult {
    const a = this.data;
    if (a.length < this.capacity) {
      a.push(item);
      this.siftUp(a.length - 1);
      return 'inserted';
    }

    if (!this.less(a[0], item)) {
      return 'discarded';
    }
    a[0] = item;
    this.siftDown(0);
    return 'replaced';
  }

  /** Heap contents, order implementation-defined. */
  toArray(): T[] {
    return Array.from(this.data);
  }

  private siftUp(i: number): void {
    const a = this.data;
    while (i > 0) {
      const p = (i - 1) >> 1;
      if (!this.less(a[i], a[p])) break;
      this.swap(i, p);
      i = p;
    }
  }

  private siftDown(i: number): void {
    const a = this.data;
    const n = a.length;

    while (true) {
      const l = i * 2 + 1;
      const r = l + 1;
      let smallest = i;

      if (l < n && this.less(a[l], a[smallest])) smallest = l;
      if (r < n && this.less(a[r], a[smallest])) smallest = r;
      if (smallest === i) return;

      this.swap(i, smallest);
      i = smallest;
    }
  }

  private swap(i: number, j: number): void {
    const a = this.data;
    const tmp = a[i];
    a[i] = a[j];
    a[j] = tmp;
  }
}
