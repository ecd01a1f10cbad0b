import { HuffmanError } from "./errors";
import type {
  IPriorityQueue,
  IPriorityQueueConfig,
} from "./priority-queue.domain";

interface HeapSlot<T> {
  item: T;
  weight: number;
  seq: number;
}

/**
 * Binary min-heap ordered by (weight, insertion sequence).
 */
export class PriorityQueue<T> implements IPriorityQueue<T> {
  private readonly _weigh: (item: T) => number;
  private readonly _capacity: number;
  private readonly _heap: HeapSlot<T>[] = [];
  private _seq = 0;

  constructor({ weigh, capacity = Infinity }: IPriorityQueueConfig<T>) {
    this._weigh = weigh;
    this._capacity = capacity;
  }

  get size(): number {
    return this._heap.length;
  }

  push(item: T): void {
    if (this._heap.length >= this._capacity) {
      throw new HuffmanError(
        "QUEUE_OVERFLOW",
        `Priority queue is full (capacity ${this._capacity})`
      );
    }
    this._heap.push({ item, weight: this._weigh(item), seq: this._seq++ });
    this.siftUp(this._heap.length - 1);
  }

  pop(): T | undefined {
    const top = this._heap[0];
    const last = this._heap.pop();
    if (top === undefined || last === undefined) return undefined;

    if (this._heap.length > 0) {
      this._heap[0] = last;
      this.siftDown(0);
    }
    return top.item;
  }

  private less(i: number, j: number): boolean {
    const a = this._heap[i];
    const b = this._heap[j];
    if (a.weight !== b.weight) return a.weight < b.weight;
    return a.seq < b.seq;
  }

  private swap(i: number, j: number): void {
    const t = this._heap[i];
    this._heap[i] = this._heap[j];
    this._heap[j] = t;
  }

  private siftUp(i: number): void {
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (!this.less(i, parent)) break;
      this.swap(i, parent);
      i = parent;
    }
  }

  private siftDown(i: number): void {
    const n = this._heap.length;
    for (;;) {
      const l = 2 * i + 1;
      const r = l + 1;
      let smallest = i;
      if (l < n && this.less(l, smallest)) smallest = l;
      if (r < n && this.less(r, smallest)) smallest = r;
      if (smallest === i) break;
      this.swap(i, smallest);
      i = smallest;
    }
  }
}
