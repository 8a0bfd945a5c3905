import type { TopKSelector } from "../heap.js";
import { ArrayHeap } from "./arrayHeap.js";

/**
 * Keeps a fixed-size min-heap of the best K items.
 *
 * Comparator uses Array.sort semantics (a before b if <0). We treat "best" as comparator ascending,
 * so the heap tracks the *worst of the best* at the top.
 */
export class MinHeapTopKSelector<T> implements TopKSelector<T> {
  topK(items: Iterable<T>, k: number, comparator: (a: T, b: T) => number): T[] {
    if (k <= 0) return [];

    // less(a,b) means a is WORSE than b (for min-heap of worst items)
    const heap = new ArrayHeap<T>((a, b) => comparator(a, b) > 0);

    for (const item of items) {
      if (heap.size() < k) {
        heap.push(item);
        continue;
      }
      const worst = heap.peek();
      // if item is better than worst => replace
      if (worst !== undefined && comparator(item, worst) < 0) {
        heap.pop();
        heap.push(item);
      }
    }

    const arr = heap.toArray();
    arr.sort(comparator);
    return arr;
  }
}
