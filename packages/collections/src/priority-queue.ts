/**
 * PriorityQueue<T>: a binary min-heap ordered by Ord<T>.
 *
 * `offer` and `poll` are O(log n), `peek` is O(1). Iteration visits the
 * elements in heap order, not sorted order; use `drain()` for that.
 *
 * @example
 * ```typescript
 * const jobs = new PriorityQueue(ordBy((j: Job) => j.deadline, ordNumber), { bound: 1000 });
 * if (!jobs.offer(job)) shed(job);
 * const next = jobs.poll();
 * ```
 */

import { Fault } from "@corral/scope";
import type { Ord } from "@corral/std";
import { FailFastIterator, done, yielded, type MutableIterator, type Versioned } from "./fail-fast.js";
import { checkBound, type BoundedOptions } from "./options.js";

interface HeapAccess<T> {
  size(): number;
  at(index: number): T;
  /** Returns the element that moved in front of `index`, if one did. */
  removeAt(index: number): { readonly moved: T } | undefined;
  removeExact(element: T): void;
}

export class PriorityQueue<T> {
  private readonly _ord: Ord<T>;
  private readonly _bound: number;
  private _heap: T[] = [];
  private _generation = 0;

  constructor(ord: Ord<T>, options: BoundedOptions = {}) {
    this._ord = ord;
    this._bound = checkBound(options.bound);
  }

  get size(): number {
    return this._heap.length;
  }

  get bound(): number {
    return this._bound;
  }

  get generation(): number {
    return this._generation;
  }

  isEmpty(): boolean {
    return this._heap.length === 0;
  }

  /**
   * Add `x`; false when the queue is at its bound.
   */
  offer(x: T): boolean {
    if (this._heap.length >= this._bound) return false;
    this._heap.push(x);
    this.siftUp(this._heap.length - 1, x);
    this._generation++;
    return true;
  }

  /**
   * Add `x`; fails with CapacityOverflowFault when the queue is at its bound.
   */
  add(x: T): this {
    if (!this.offer(x)) {
      throw Fault.capacityOverflow(`priority queue is full (bound ${this._bound})`);
    }
    return this;
  }

  peek(): T | undefined {
    return this._heap.length === 0 ? undefined : this._heap[0];
  }

  /** Like `peek`, but fails with NotFound on an empty queue. */
  element(): T {
    if (this._heap.length === 0) throw Fault.notFound("priority queue is empty");
    return this._heap[0];
  }

  poll(): T | undefined {
    const n = this._heap.length;
    if (n === 0) return undefined;
    const min = this._heap[0];
    const last = this._heap[n - 1];
    this._heap.length = n - 1;
    if (n > 1) this.siftDown(0, last);
    this._generation++;
    return min;
  }

  /**
   * Remove one element equal to `x` under the queue's ordering.
   */
  remove(x: T): boolean {
    const index = this.indexOf(x);
    if (index < 0) return false;
    this.removeAt(index);
    return true;
  }

  has(x: T): boolean {
    return this.indexOf(x) >= 0;
  }

  clear(): void {
    if (this._heap.length === 0) return;
    this._heap = [];
    this._generation++;
  }

  /** Elements in heap order. */
  toArray(): T[] {
    return this._heap.slice();
  }

  /** Remove every element, smallest first. */
  drain(): T[] {
    const result: T[] = [];
    while (this._heap.length > 0) {
      const min = this._heap[0];
      this.poll();
      result.push(min);
    }
    return result;
  }

  iterator(): MutableIterator<T> {
    return new HeapIterator(this, {
      size: () => this._heap.length,
      at: (index) => this._heap[index],
      removeAt: (index) => this.removeAt(index),
      removeExact: (element) => {
        const index = this._heap.indexOf(element);
        if (index >= 0) this.removeAt(index);
      },
    });
  }

  [Symbol.iterator](): MutableIterator<T> {
    return this.iterator();
  }

  // --------------------------------------------------------------------------
  // Heap maintenance
  // --------------------------------------------------------------------------

  private indexOf(x: T): number {
    for (let i = 0; i < this._heap.length; i++) {
      if (this._ord.equals(x, this._heap[i])) return i;
    }
    return -1;
  }

  private removeAt(index: number): { readonly moved: T } | undefined {
    this._generation++;
    const s = this._heap.length - 1;
    const last = this._heap[s];
    this._heap.length = s;
    if (index === s) return undefined;

    this.siftDown(index, last);
    if (this._heap[index] === last) {
      this.siftUp(index, last);
      if (this._heap[index] !== last) return { moved: last };
    }
    return undefined;
  }

  private siftUp(start: number, x: T): void {
    let k = start;
    while (k > 0) {
      const parent = (k - 1) >>> 1;
      const e = this._heap[parent];
      if (this._ord.compare(x, e) >= 0) break;
      this._heap[k] = e;
      k = parent;
    }
    this._heap[k] = x;
  }

  private siftDown(start: number, x: T): void {
    const n = this._heap.length;
    const half = n >>> 1;
    let k = start;
    while (k < half) {
      let child = 2 * k + 1;
      let c = this._heap[child];
      const right = child + 1;
      if (right < n && this._ord.compare(c, this._heap[right]) > 0) {
        child = right;
        c = this._heap[child];
      }
      if (this._ord.compare(x, c) <= 0) break;
      this._heap[k] = c;
      k = child;
    }
    this._heap[k] = x;
  }
}

/**
 * Walks the heap array. Removing an element can pull the last element in
 * front of the cursor; those are queued and visited at the end.
 */
class HeapIterator<T> extends FailFastIterator<T> {
  private _cursor = 0;
  private _lastIndex = -1;
  private _lastMoved: { readonly element: T } | undefined = undefined;
  private readonly _moved: T[] = [];

  constructor(
    source: Versioned,
    private readonly heap: HeapAccess<T>
  ) {
    super(source);
  }

  protected override advance(): IteratorResult<T, undefined> {
    if (this._cursor < this.heap.size()) {
      this._lastIndex = this._cursor++;
      this._lastMoved = undefined;
      return yielded(this.heap.at(this._lastIndex));
    }
    if (this._moved.length > 0) {
      const [element] = this._moved.splice(0, 1);
      this._lastIndex = -1;
      this._lastMoved = { element };
      return yielded(element);
    }
    return done();
  }

  protected override removeLast(): void {
    if (this._lastIndex >= 0) {
      const result = this.heap.removeAt(this._lastIndex);
      this._lastIndex = -1;
      if (result === undefined) {
        this._cursor--;
      } else {
        this._moved.push(result.moved);
      }
      return;
    }
    const last = this._lastMoved;
    if (last === undefined) throw Fault.illegalState("no element to remove");
    this._lastMoved = undefined;
    this.heap.removeExact(last.element);
  }
}
