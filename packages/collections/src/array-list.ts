/**
 * ArrayList<T>: a growable indexed sequence.
 *
 * Elements live in a preallocated buffer whose length is the capacity.
 * `add` is amortized O(1): a full buffer is reallocated at twice the length,
 * up to the optional bound. Indexed reads and writes are O(1); inserting or
 * removing in the middle shifts the tail.
 */

import { createLogger } from "@corral/core";
import { Fault } from "@corral/scope";
import { eqStrict, type Eq } from "@corral/std";
import { IndexIterator, type MutableIterator } from "./fail-fast.js";
import { checkBound, checkCapacity, type BoundedOptions } from "./options.js";

const log = createLogger("collections");

export interface ArrayListOptions<T> extends BoundedOptions {
  initialCapacity?: number;
  /** Element equality for `indexOf`, `remove` and `has`; defaults to === */
  eq?: Eq<T>;
}

export class ArrayList<T> {
  private readonly _eq: Eq<T>;
  private readonly _bound: number;
  private _buffer: T[];
  private _size = 0;
  private _generation = 0;

  constructor(options: ArrayListOptions<T> = {}) {
    this._eq = options.eq ?? eqStrict<T>();
    this._bound = checkBound(options.bound);
    const capacity = checkCapacity("initialCapacity", options.initialCapacity ?? 10);
    this._buffer = new Array<T>(Math.min(capacity, this._bound));
  }

  static from<T>(items: Iterable<T>, options: ArrayListOptions<T> = {}): ArrayList<T> {
    const list = new ArrayList<T>(options);
    for (const item of items) list.add(item);
    return list;
  }

  get size(): number {
    return this._size;
  }

  /** Slots available before the next reallocation. */
  get capacity(): number {
    return this._buffer.length;
  }

  get generation(): number {
    return this._generation;
  }

  isEmpty(): boolean {
    return this._size === 0;
  }

  // ==========================================================================
  // Positional access
  // ==========================================================================

  get(index: number): T {
    this.checkIndex(index, this._size);
    return this._buffer[index];
  }

  /**
   * Replace the element at `index` and return the old one. Not structural.
   */
  set(index: number, value: T): T {
    this.checkIndex(index, this._size);
    const old = this._buffer[index];
    this._buffer[index] = value;
    return old;
  }

  add(value: T): this {
    this.growFor(this._size + 1);
    this._buffer[this._size++] = value;
    this._generation++;
    return this;
  }

  /**
   * Insert at `index` (0 ≤ index ≤ size), shifting later elements up.
   */
  insert(index: number, value: T): void {
    this.checkIndex(index, this._size + 1);
    this.growFor(this._size + 1);
    for (let i = this._size; i > index; i--) this._buffer[i] = this._buffer[i - 1];
    this._buffer[index] = value;
    this._size++;
    this._generation++;
  }

  removeAt(index: number): T {
    this.checkIndex(index, this._size);
    const removed = this._buffer[index];
    for (let i = index; i < this._size - 1; i++) this._buffer[i] = this._buffer[i + 1];
    // Release the vacated slot
    delete this._buffer[--this._size];
    this._generation++;
    return removed;
  }

  // ==========================================================================
  // Search
  // ==========================================================================

  /** Remove the first element equal to `value`. */
  remove(value: T): boolean {
    const index = this.indexOf(value);
    if (index < 0) return false;
    this.removeAt(index);
    return true;
  }

  indexOf(value: T): number {
    for (let i = 0; i < this._size; i++) {
      if (this._eq.equals(this._buffer[i], value)) return i;
    }
    return -1;
  }

  lastIndexOf(value: T): number {
    for (let i = this._size - 1; i >= 0; i--) {
      if (this._eq.equals(this._buffer[i], value)) return i;
    }
    return -1;
  }

  has(value: T): boolean {
    return this.indexOf(value) >= 0;
  }

  // ==========================================================================
  // Stack
  // ==========================================================================

  push(value: T): this {
    return this.add(value);
  }

  pop(): T | undefined {
    if (this._size === 0) return undefined;
    return this.removeAt(this._size - 1);
  }

  peek(): T | undefined {
    return this._size === 0 ? undefined : this._buffer[this._size - 1];
  }

  // ==========================================================================
  // Capacity
  // ==========================================================================

  /** Empties the list; the capacity is kept. */
  clear(): void {
    if (this._size === 0) return;
    for (let i = 0; i < this._size; i++) delete this._buffer[i];
    this._size = 0;
    this._generation++;
  }

  /**
   * Make room for at least `minCapacity` elements without further growth.
   */
  ensureCapacity(minCapacity: number): void {
    checkCapacity("minCapacity", minCapacity);
    if (minCapacity > this._bound) {
      throw Fault.capacityOverflow(`capacity ${minCapacity} exceeds bound ${this._bound}`);
    }
    if (minCapacity > this._buffer.length) this.reallocate(minCapacity);
  }

  /** Shrink the buffer to exactly `size` slots. */
  trimToSize(): void {
    if (this._buffer.length > this._size) this.reallocate(this._size);
  }

  // ==========================================================================
  // Iteration
  // ==========================================================================

  iterator(): MutableIterator<T> {
    return new IndexIterator(this, {
      size: () => this._size,
      at: (index) => this._buffer[index],
      removeAt: (index) => {
        this.removeAt(index);
      },
    });
  }

  [Symbol.iterator](): MutableIterator<T> {
    return this.iterator();
  }

  forEach(fn: (value: T, index: number) => void): void {
    let index = 0;
    for (const value of this) fn(value, index++);
  }

  toArray(): T[] {
    return this._buffer.slice(0, this._size);
  }

  private growFor(required: number): void {
    const capacity = this._buffer.length;
    if (required <= capacity) return;
    if (required > this._bound) {
      throw Fault.capacityOverflow(`list is full (bound ${this._bound})`);
    }
    this.reallocate(Math.min(Math.max(capacity * 2, required), this._bound));
    log.debug(`resized list from ${capacity} to ${this._buffer.length} slots`);
  }

  private reallocate(capacity: number): void {
    const buffer = new Array<T>(capacity);
    for (let i = 0; i < this._size; i++) buffer[i] = this._buffer[i];
    this._buffer = buffer;
  }

  private checkIndex(index: number, limit: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= limit) {
      throw Fault.indexOutOfBounds(`index ${index} out of bounds for size ${this._size}`);
    }
  }
}
