/**
 * Fail-fast iteration.
 *
 * Every mutable container keeps a generation counter that moves on each
 * structural mutation. Its iterators remember the generation they were
 * created at and refuse to continue once it has moved, unless the move was
 * made through the iterator's own `remove()`.
 */

import { Fault } from "@corral/scope";

export interface Versioned {
  readonly generation: number;
}

/**
 * An iterator that can remove the element it last returned.
 */
export interface MutableIterator<T> extends IterableIterator<T> {
  remove(): void;
}

export function done(): IteratorReturnResult<undefined> {
  return { done: true, value: undefined };
}

export function yielded<T>(value: T): IteratorYieldResult<T> {
  return { done: false, value };
}

// ============================================================================
// FailFastIterator
// ============================================================================

export abstract class FailFastIterator<T> implements MutableIterator<T> {
  private readonly _source: Versioned;
  private _expected: number;
  private _canRemove = false;
  private _finished = false;

  protected constructor(source: Versioned) {
    this._source = source;
    this._expected = source.generation;
  }

  /** Produce the next element; the generation has already been checked. */
  protected abstract advance(): IteratorResult<T, undefined>;

  /** Remove the element returned by the last `advance()`. */
  protected abstract removeLast(): void;

  /** Once exhausted, keeps answering done whatever happens to the container. */
  next(): IteratorResult<T, undefined> {
    if (this._finished) return done();
    this.checkGeneration();
    const result = this.advance();
    this._finished = result.done === true;
    this._canRemove = !this._finished;
    return result;
  }

  remove(): void {
    if (!this._canRemove) {
      throw Fault.illegalState("remove() must follow next() and may be called once per element");
    }
    this.checkGeneration();
    this._canRemove = false;
    this.removeLast();
    this._expected = this._source.generation;
  }

  [Symbol.iterator](): this {
    return this;
  }

  private checkGeneration(): void {
    const actual = this._source.generation;
    if (actual !== this._expected) {
      throw Fault.concurrentModification(
        `container modified during iteration (generation ${this._expected}, now ${actual})`
      );
    }
  }
}

// ============================================================================
// Linked-node iteration
// ============================================================================

/**
 * How to walk and unlink the nodes of a linked structure.
 */
export interface NodeWalk<N> {
  next(node: N): N | undefined;
  remove(node: N): void;
}

/**
 * Walks nodes one step ahead, so unlinking the returned node never loses
 * the position. Removal must keep the identity of the nodes it leaves.
 */
export class NodeIterator<N, T> extends FailFastIterator<T> {
  private _pending: N | undefined;
  private _last: N | undefined;

  constructor(
    source: Versioned,
    first: N | undefined,
    private readonly walk: NodeWalk<N>,
    private readonly project: (node: N) => T
  ) {
    super(source);
    this._pending = first;
  }

  protected override advance(): IteratorResult<T, undefined> {
    const node = this._pending;
    if (node === undefined) return done();
    this._pending = this.walk.next(node);
    this._last = node;
    return yielded(this.project(node));
  }

  protected override removeLast(): void {
    const node = this._last;
    if (node === undefined) throw Fault.illegalState("no element to remove");
    this._last = undefined;
    this.walk.remove(node);
  }
}

// ============================================================================
// Indexed iteration
// ============================================================================

/**
 * Positional access to a sequence.
 */
export interface IndexWalk<T> {
  size(): number;
  at(index: number): T;
  removeAt(index: number): void;
}

export class IndexIterator<T> extends FailFastIterator<T> {
  private _cursor: number;
  private _last = -1;

  constructor(
    source: Versioned,
    private readonly walk: IndexWalk<T>,
    private readonly descending = false
  ) {
    super(source);
    this._cursor = descending ? walk.size() - 1 : 0;
  }

  protected override advance(): IteratorResult<T, undefined> {
    if (this._cursor < 0 || this._cursor >= this.walk.size()) return done();
    this._last = this._cursor;
    this._cursor += this.descending ? -1 : 1;
    return yielded(this.walk.at(this._last));
  }

  protected override removeLast(): void {
    if (this._last < 0) throw Fault.illegalState("no element to remove");
    this.walk.removeAt(this._last);
    // Later elements shifted down by one
    if (!this.descending) this._cursor = this._last;
    this._last = -1;
  }
}
