import type { Heap } from "../heap.js";

/**
 * Binary heap over a plain array. `less(a, b)` decides which item sits nearer the top,
 * so the same class serves as a min-heap or a max-heap.
 */
export class ArrayHeap<T> implements Heap<T> {
  private readonly data: T[] = [];

  constructor(private readonly less: (a: T, b: T) => boolean) {}

  size(): number {
    return this.data.length;
  }

  peek(): T | undefined {
    return this.data[0];
  }

  push(item: T): void {
    const a = this.data;
    a.push(item);
    let i = a.length - 1;
    while (i > 0) {
      const p = (i - 1) >> 1;
      if (!this.less(a[i]!, a[p]!)) break;
      this.swap(i, p);
      i = p;
    }
  }

  pop(): T | undefined {
    const a = this.data;
    if (a.length === 0) return undefined;
    const top = a[0];
    const last = a.pop()!;
    if (a.length) {
      a[0] = last;
      this.siftDown(0);
    }
    return top;
  }

  toArray(): T[] {
    return Array.from(this.data);
  }

  private swap(i: number, j: number): void {
    const a = this.data;
    const tmp = a[i]!;
    a[i] = a[j]!;
    a[j] = tmp;
  }

  private siftDown(i: number): void {
    const a = this.data;
    const n = a.length;

    while (true) {
      const l = i * 2 + 1;
      const r = l + 1;
      let top = i;

      if (l < n && this.less(a[l]!, a[top]!)) top = l;
      if (r < n && this.less(a[r]!, a[top]!)) top = r;
      if (top === i) return;

      this.swap(i, top);
      i = top;
    }
  }
}
