/**
 * Derived operations: free functions built on the typeclass interfaces.
 */

import type {
  Iterable,
  IterableOnce,
  MapLike,
  MutableMapLike,
  MutableSetLike,
  Seq,
  SetLike,
} from "./typeclasses.js";

// ============================================================================
// From IterableOnce
// ============================================================================

export function toArray<I, A>(i: I, IO: IterableOnce<I, A>): A[] {
  return IO.fold<A[]>(i, [], (acc, a) => {
    acc.push(a);
    return acc;
  });
}

/**
 * First element satisfying `p`, in the instance's iteration order.
 */
export function find<I, A>(i: I, p: (a: A) => boolean, IO: IterableOnce<I, A>): A | undefined {
  const found = IO.fold<{ readonly value: A } | undefined>(i, undefined, (acc, a) =>
    acc !== undefined ? acc : p(a) ? { value: a } : undefined
  );
  return found?.value;
}

export function exists<I, A>(i: I, p: (a: A) => boolean, IO: IterableOnce<I, A>): boolean {
  return IO.fold(i, false, (acc, a) => acc || p(a));
}

export function forAll<I, A>(i: I, p: (a: A) => boolean, IO: IterableOnce<I, A>): boolean {
  return IO.fold(i, true, (acc, a) => acc && p(a));
}

export function count<I, A>(i: I, IO: IterableOnce<I, A>): number {
  return IO.fold(i, 0, (acc) => acc + 1);
}

// ============================================================================
// From fail-fast views
// ============================================================================

/**
 * Removes every element matching `p` through the view's own iterator and
 * returns how many went. Only fail-fast views qualify, since removal goes
 * through `MutableIterator.remove`.
 */
export function removeIf<I, A>(i: I, p: (a: A) => boolean, IT: Iterable<I, A, "failFast">): number {
  let removed = 0;
  const it = IT.iterator(i);
  for (let r = it.next(); r.done !== true; r = it.next()) {
    if (p(r.value)) {
      it.remove();
      removed++;
    }
  }
  return removed;
}

// ============================================================================
// From Seq
// ============================================================================

export function head<S, A>(s: S, SQ: Seq<S, A>): A | undefined {
  return SQ.nth(s, 0);
}

export function last<S, A>(s: S, SQ: Seq<S, A>): A | undefined {
  const len = SQ.length(s);
  return len > 0 ? SQ.nth(s, len - 1) : undefined;
}

// ============================================================================
// From SetLike
// ============================================================================

export function union<S, K>(a: S, b: S, MSL: MutableSetLike<S, K>): S {
  const result = MSL.create();
  for (const k of MSL.iterator(a)) MSL.add(result, k);
  for (const k of MSL.iterator(b)) MSL.add(result, k);
  return result;
}

export function intersection<S, K>(a: S, b: S, MSL: MutableSetLike<S, K>): S {
  const result = MSL.create();
  for (const k of MSL.iterator(a)) {
    if (MSL.has(b, k)) MSL.add(result, k);
  }
  return result;
}

export function difference<S, K>(a: S, b: S, MSL: MutableSetLike<S, K>): S {
  const result = MSL.create();
  for (const k of MSL.iterator(a)) {
    if (!MSL.has(b, k)) MSL.add(result, k);
  }
  return result;
}

export function isSubsetOf<S, K>(a: S, b: S, SL: SetLike<S, K>): boolean {
  if (SL.size(a) > SL.size(b)) return false;
  for (const k of SL.iterator(a)) {
    if (!SL.has(b, k)) return false;
  }
  return true;
}

// ============================================================================
// From MapLike
// ============================================================================

/**
 * Value for `k`, or `fallback` when the key is absent or maps to undefined.
 */
export function getOrElse<M, K, V>(m: M, k: K, fallback: V, ML: MapLike<M, K, V>): V {
  const v = ML.get(m, k);
  return v !== undefined ? v : fallback;
}

export function mapValues<M, R, K, V, W>(
  m: M,
  f: (v: V, k: K) => W,
  ML: MapLike<M, K, V>,
  MML: MutableMapLike<R, K, W>
): R {
  const result = MML.create();
  for (const [k, v] of ML.iterator(m)) MML.set(result, k, f(v, k));
  return result;
}

export function filterEntries<M, K, V>(
  m: M,
  p: (k: K, v: V) => boolean,
  MML: MutableMapLike<M, K, V>
): M {
  const result = MML.create();
  for (const [k, v] of MML.iterator(m)) {
    if (p(k, v)) MML.set(result, k, v);
  }
  return result;
}
