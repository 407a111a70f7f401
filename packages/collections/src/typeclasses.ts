/**
 * Views over concrete containers, so the derived operations run unchanged on
 * arrays, native Set/Map and the corral containers.
 *
 * Each view names the kind of iterator it hands out. Native structures give
 * plain iterators; corral containers give fail-fast iterators that support
 * `remove()` and throw ConcurrentModificationFault after a structural change
 * the iterator did not make. Operations that remove while walking require the
 * fail-fast kind.
 *
 *   IterableOnce<I, A>
 *     └── Iterable<I, A, It>
 *           ├── Seq<S, A, It>
 *           ├── SetLike<S, K, It> → MutableSetLike
 *           └── MapLike<M, K, V, It> → MutableMapLike
 */

import type { MutableIterator } from "./fail-fast.js";

/** Iterator kinds a view can hand out, keyed by tag. */
export interface IteratorKinds<A> {
  plain: IterableIterator<A>;
  failFast: MutableIterator<A>;
}

export type IteratorKind = keyof IteratorKinds<unknown>;

export type IteratorOf<It extends IteratorKind, A> = IteratorKinds<A>[It];

/** Consumed by folding; the view decides the order. */
export interface IterableOnce<I, A> {
  fold<B>(i: I, z: B, f: (acc: B, a: A) => B): B;
}

/** Each call to `iterator` starts a fresh walk. */
export interface Iterable<I, A, It extends IteratorKind = "plain"> extends IterableOnce<I, A> {
  iterator(i: I): IteratorOf<It, A>;
}

/** Positional reads; `nth` answers undefined outside `[0, length)`. */
export interface Seq<S, A, It extends IteratorKind = "plain"> extends Iterable<S, A, It> {
  length(s: S): number;
  nth(s: S, index: number): A | undefined;
}

/** Membership under the container's own equality (Eq/Hash, Ord or SameValueZero). */
export interface SetLike<S, K, It extends IteratorKind = "plain"> extends Iterable<S, K, It> {
  has(s: S, k: K): boolean;
  size(s: S): number;
}

/** Iterates entries; the key and value views share the entry walk's kind. */
export interface MapLike<M, K, V, It extends IteratorKind = "plain"> extends Iterable<M, [K, V], It> {
  get(m: M, k: K): V | undefined;
  has(m: M, k: K): boolean;
  size(m: M): number;
  keys(m: M): IteratorOf<It, K>;
  values(m: M): IteratorOf<It, V>;
}

/**
 * `create()` returns an empty set configured like the instance's sets
 * (same equality, hashing or ordering, same options).
 */
export interface MutableSetLike<S, K, It extends IteratorKind = "plain"> extends SetLike<S, K, It> {
  create(): S;
  add(s: S, k: K): void;
  delete(s: S, k: K): boolean;
  clear(s: S): void;
}

export interface MutableMapLike<M, K, V, It extends IteratorKind = "plain"> extends MapLike<M, K, V, It> {
  create(): M;
  set(m: M, k: K, v: V): void;
  delete(m: M, k: K): boolean;
  clear(m: M): void;
}
