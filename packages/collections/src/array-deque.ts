/**
 * ArrayDeque<T>: a double-ended queue on a circular buffer.
 *
 * Adds and removes at either end are amortized O(1). The buffer length is a
 * power of two; when it fills, it doubles and the contents are copied back
 * to start at slot 0.
 *
 * @example
 * ```typescript
 * const history = new ArrayDeque<string>({ bound: 50 });
 * if (!history.offerLast(command)) {
 *   history.pollFirst();
 *   history.offerLast(command);
 * }
 * ```
 */

import { createLogger } from "@corral/core";
import { Fault } from "@corral/scope";
import { IndexIterator, type MutableIterator } from "./fail-fast.js";
import { MAXIMUM_CAPACITY, checkBound, checkCapacity, tableSizeFor, type BoundedOptions } from "./options.js";

const log = createLogger("collections");

export interface ArrayDequeOptions extends BoundedOptions {
  /** Rounded up to a power of two */
  initialCapacity?: number;
}

export class ArrayDeque<T> {
  private readonly _bound: number;
  private _buffer: T[];
  private _head = 0;
  private _size = 0;
  private _generation = 0;

  constructor(options: ArrayDequeOptions = {}) {
    this._bound = checkBound(options.bound);
    const initial = checkCapacity("initialCapacity", options.initialCapacity ?? 16);
    this._buffer = new Array<T>(tableSizeFor(initial));
  }

  get size(): number {
    return this._size;
  }

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
  // Insertion
  // ==========================================================================

  /** Fails with CapacityOverflowFault at the bound. */
  addFirst(value: T): void {
    if (!this.offerFirst(value)) throw this.full();
  }

  /** Fails with CapacityOverflowFault at the bound. */
  addLast(value: T): void {
    if (!this.offerLast(value)) throw this.full();
  }

  offerFirst(value: T): boolean {
    if (this._size >= this._bound) return false;
    this.ensureRoom();
    this._head = (this._head - 1) & this.mask;
    this._buffer[this._head] = value;
    this._size++;
    this._generation++;
    return true;
  }

  offerLast(value: T): boolean {
    if (this._size >= this._bound) return false;
    this.ensureRoom();
    this._buffer[this.slot(this._size)] = value;
    this._size++;
    this._generation++;
    return true;
  }

  // ==========================================================================
  // Removal
  // ==========================================================================

  pollFirst(): T | undefined {
    if (this._size === 0) return undefined;
    const value = this._buffer[this._head];
    delete this._buffer[this._head];
    this._head = (this._head + 1) & this.mask;
    this._size--;
    this._generation++;
    return value;
  }

  pollLast(): T | undefined {
    if (this._size === 0) return undefined;
    const index = this.slot(this._size - 1);
    const value = this._buffer[index];
    delete this._buffer[index];
    this._size--;
    this._generation++;
    return value;
  }

  /** Fails with NotFound when empty. */
  removeFirst(): T {
    if (this._size === 0) throw this.empty();
    const value = this._buffer[this._head];
    this.pollFirst();
    return value;
  }

  /** Fails with NotFound when empty. */
  removeLast(): T {
    if (this._size === 0) throw this.empty();
    const value = this._buffer[this.slot(this._size - 1)];
    this.pollLast();
    return value;
  }

  clear(): void {
    if (this._size === 0) return;
    this._buffer = new Array<T>(this._buffer.length);
    this._head = 0;
    this._size = 0;
    this._generation++;
  }

  // ==========================================================================
  // Inspection
  // ==========================================================================

  peekFirst(): T | undefined {
    return this._size === 0 ? undefined : this._buffer[this._head];
  }

  peekLast(): T | undefined {
    return this._size === 0 ? undefined : this._buffer[this.slot(this._size - 1)];
  }

  getFirst(): T {
    if (this._size === 0) throw this.empty();
    return this._buffer[this._head];
  }

  getLast(): T {
    if (this._size === 0) throw this.empty();
    return this._buffer[this.slot(this._size - 1)];
  }

  /** Element `index` positions from the head. */
  get(index: number): T {
    if (!Number.isInteger(index) || index < 0 || index >= this._size) {
      throw Fault.indexOutOfBounds(`index ${index} out of bounds for size ${this._size}`);
    }
    return this._buffer[this.slot(index)];
  }

  // ==========================================================================
  // Queue and stack aliases
  // ==========================================================================

  /** Queue: add at the tail. */
  offer(value: T): boolean {
    return this.offerLast(value);
  }

  /** Queue: take from the head. */
  poll(): T | undefined {
    return this.pollFirst();
  }

  /** Stack: add at the head. */
  push(value: T): void {
    this.addFirst(value);
  }

  /** Stack: take from the head; fails with NotFound when empty. */
  pop(): T {
    return this.removeFirst();
  }

  peek(): T | undefined {
    return this.peekFirst();
  }

  // ==========================================================================
  // Iteration
  // ==========================================================================

  /** Head to tail. */
  iterator(): MutableIterator<T> {
    return this.walk(false);
  }

  /** Tail to head. */
  descendingIterator(): MutableIterator<T> {
    return this.walk(true);
  }

  [Symbol.iterator](): MutableIterator<T> {
    return this.walk(false);
  }

  toArray(): T[] {
    const result: T[] = [];
    for (let i = 0; i < this._size; i++) result.push(this._buffer[this.slot(i)]);
    return result;
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private get mask(): number {
    return this._buffer.length - 1;
  }

  private slot(index: number): number {
    return (this._head + index) & this.mask;
  }

  private walk(descending: boolean): MutableIterator<T> {
    return new IndexIterator(
      this,
      {
        size: () => this._size,
        at: (index) => this._buffer[this.slot(index)],
        removeAt: (index) => this.deleteAt(index),
      },
      descending
    );
  }

  /** Remove the element `index` positions from the head, closing the gap. */
  private deleteAt(index: number): void {
    for (let i = index; i < this._size - 1; i++) {
      this._buffer[this.slot(i)] = this._buffer[this.slot(i + 1)];
    }
    delete this._buffer[this.slot(this._size - 1)];
    this._size--;
    this._generation++;
  }

  private ensureRoom(): void {
    const capacity = this._buffer.length;
    if (this._size < capacity) return;
    if (capacity >= MAXIMUM_CAPACITY) {
      throw Fault.resourceExhausted(`deque cannot grow beyond ${MAXIMUM_CAPACITY} slots`);
    }
    const buffer = new Array<T>(capacity * 2);
    for (let i = 0; i < this._size; i++) buffer[i] = this._buffer[this.slot(i)];
    this._buffer = buffer;
    this._head = 0;
    log.debug(`resized deque from ${capacity} to ${buffer.length} slots`);
  }

  private full(): Fault {
    return Fault.capacityOverflow(`deque is full (bound ${this._bound})`);
  }

  private empty(): Fault {
    return Fault.notFound("deque is empty");
  }
}
