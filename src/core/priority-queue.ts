/**
 * Binary min-heap keyed on (weight, sequence).
 *
 * Every push is stamped with a monotonically increasing sequence number, so
 * items of equal weight pop in insertion order. Two queues fed the same
 * pushes always pop in the same order.
 */

interface Entry<T> {
  weight: number;
  seq: number;
  value: T;
}

export class MinPriorityQueue<T> {
  private heap: Entry<T>[] = [];
  private seqCounter = 0;

  push(value: T, weight: number): void {
    this.heap.push({ weight, seq: this.seqCounter++, value });
    this.siftUp(this.heap.length - 1);
  }

  /**
   * Remove and return the lowest item, or `undefined` when empty.
   */
  pop(): T | undefined {
    const top = this.heap[0];
    const last = this.heap.pop();
    if (top === undefined || last === undefined) return undefined;

    if (this.heap.length > 0) {
      this.heap[0] = last;
      this.siftDown(0);
    }
    return top.value;
  }

  get size(): number {
    return this.heap.length;
  }

  private less(a: Entry<T>, b: Entry<T>): boolean {
    if (a.weight !== b.weight) return a.weight < b.weight;
    return a.seq < b.seq;
  }

  private siftUp(index: number): void {
    let i = index;
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (!this.less(this.heap[i], this.heap[parent])) break;
      this.swap(i, parent);
      i = parent;
    }
  }

  private siftDown(index: number): void {
    const n = this.heap.length;
    let i = index;
    for (;;) {
      const left = 2 * i + 1;
      const right = left + 1;
      let smallest = i;

      if (left < n && this.less(this.heap[left], this.heap[smallest])) {
        smallest = left;
      }
      if (right < n && this.less(this.heap[right], this.heap[smallest])) {
        smallest = right;
      }
      if (smallest === i) return;

      this.swap(i, smallest);
      i = smallest;
    }
  }

  private swap(a: number, b: number): void {
    const tmp = this.heap[a];
    this.heap[a] = this.heap[b];
    this.heap[b] = tmp;
  }
}
