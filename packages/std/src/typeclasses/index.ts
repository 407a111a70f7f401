/**
 * Capability Typeclasses
 *
 * Containers never reach for implicit `equals`/`hashCode`/`compareTo`
 * dispatch: every instance is handed the capability it needs.
 *
 * - Eq<A>: equality, for lookups in sequences and hash chains
 * - Hash<A>: hashing, paired with an Eq that it must agree with
 * - Ord<A>: strict total order, for trees and heaps
 */

// ============================================================================
// Eq
// Types supporting equality comparison.
// ============================================================================

/**
 * Eq typeclass - equality comparison.
 *
 * Laws:
 * - Reflexivity: `equals(x, x) === true`
 * - Symmetry: `equals(x, y) === equals(y, x)`
 * - Transitivity: `equals(x, y) && equals(y, z) => equals(x, z)`
 */
export interface Eq<A> {
  equals(a: A, b: A): boolean;
  notEquals(a: A, b: A): boolean;
}

/** `===`, except that NaN equals NaN. 0 and -0 stay equal. */
function sameNumber(a: number, b: number): boolean {
  return a === b || (Number.isNaN(a) && Number.isNaN(b));
}

export const eqNumber: Eq<number> = {
  equals: sameNumber,
  notEquals: (a, b) => !sameNumber(a, b),
};

export const eqBigInt: Eq<bigint> = {
  equals: (a, b) => a === b,
  notEquals: (a, b) => a !== b,
};

export const eqString: Eq<string> = {
  equals: (a, b) => a === b,
  notEquals: (a, b) => a !== b,
};

export const eqBoolean: Eq<boolean> = {
  equals: (a, b) => a === b,
  notEquals: (a, b) => a !== b,
};

/** Invalid Dates are equal to each other. */
export const eqDate: Eq<Date> = {
  equals: (a, b) => sameNumber(a.getTime(), b.getTime()),
  notEquals: (a, b) => !sameNumber(a.getTime(), b.getTime()),
};

/**
 * Create an Eq instance from a custom equality function.
 */
export function makeEq<A>(eq: (a: A, b: A) => boolean): Eq<A> {
  return {
    equals: eq,
    notEquals: (a, b) => !eq(a, b),
  };
}

/**
 * Create an Eq instance by mapping to a comparable value.
 */
export function eqBy<A, B>(f: (a: A) => B, E: Eq<B> = eqStrict()): Eq<A> {
  return {
    equals: (a, b) => E.equals(f(a), f(b)),
    notEquals: (a, b) => E.notEquals(f(a), f(b)),
  };
}

/**
 * Eq using strict equality (===).
 */
export function eqStrict<A>(): Eq<A> {
  return {
    equals: (a, b) => a === b,
    notEquals: (a, b) => a !== b,
  };
}

/**
 * Eq for arrays (element-wise comparison).
 */
export function eqArray<A>(E: Eq<A>): Eq<readonly A[]> {
  return makeEq<readonly A[]>((xs, ys) => xs.length === ys.length && xs.every((x, i) => E.equals(x, ys[i])));
}

// ============================================================================
// Ord
// Types supporting total ordering.
// ============================================================================

export type Ordering = -1 | 0 | 1;
export const LT: Ordering = -1;
export const EQ_ORD: Ordering = 0;
export const GT: Ordering = 1;

/**
 * Ord typeclass - strict total ordering.
 *
 * Laws (in addition to Eq laws):
 * - Antisymmetry: `compare(x, y) === -compare(y, x)`
 * - Transitivity: `compare(x, y) <= 0 && compare(y, z) <= 0 => compare(x, z) <= 0`
 * - Totality: `compare(x, y) <= 0 || compare(y, x) <= 0`
 *
 * A tree keeps using the instance it was built with; an instance whose
 * answers change between calls breaks the tree's invariants.
 */
export interface Ord<A> extends Eq<A> {
  compare(a: A, b: A): Ordering;
  lessThan(a: A, b: A): boolean;
  lessThanOrEqual(a: A, b: A): boolean;
  greaterThan(a: A, b: A): boolean;
  greaterThanOrEqual(a: A, b: A): boolean;
}

/**
 * Create an Ord instance from a compare function.
 */
export function makeOrd<A>(compare: (a: A, b: A) => Ordering): Ord<A> {
  return {
    equals: (a, b) => compare(a, b) === EQ_ORD,
    notEquals: (a, b) => compare(a, b) !== EQ_ORD,
    compare,
    lessThan: (a, b) => compare(a, b) === LT,
    lessThanOrEqual: (a, b) => compare(a, b) !== GT,
    greaterThan: (a, b) => compare(a, b) === GT,
    greaterThanOrEqual: (a, b) => compare(a, b) !== LT,
  };
}

/**
 * Adapt an `Array.prototype.sort`-style comparator. Only the sign of its
 * result is kept; NaN maps to EQ_ORD.
 */
export function fromCompare<A>(compare: (a: A, b: A) => number): Ord<A> {
  return makeOrd<A>((a, b) => {
    const c = compare(a, b);
    return c < 0 ? LT : c > 0 ? GT : EQ_ORD;
  });
}

/** Total order on numbers: NaN equals itself and sorts above everything else. */
function compareNumber(a: number, b: number): Ordering {
  if (a < b) return LT;
  if (a > b) return GT;
  if (sameNumber(a, b)) return EQ_ORD;
  return Number.isNaN(a) ? GT : LT;
}

const compareString = (a: string, b: string): Ordering => (a < b ? LT : a > b ? GT : EQ_ORD);
const compareBigInt = (a: bigint, b: bigint): Ordering => (a < b ? LT : a > b ? GT : EQ_ORD);

export const ordNumber: Ord<number> = makeOrd(compareNumber);
export const ordString: Ord<string> = makeOrd(compareString);
export const ordBigInt: Ord<bigint> = makeOrd(compareBigInt);

export const ordBoolean: Ord<boolean> = makeOrd<boolean>((a, b) => (a === b ? EQ_ORD : a ? GT : LT));

export const ordDate: Ord<Date> = makeOrd<Date>((a, b) => compareNumber(a.getTime(), b.getTime()));

/**
 * Create an Ord instance by mapping to a comparable value.
 */
export function ordBy<A, B>(f: (a: A) => B, O: Ord<B>): Ord<A> {
  return makeOrd<A>((a, b) => O.compare(f(a), f(b)));
}

/**
 * Reverse an Ord instance.
 */
export function reverseOrd<A>(O: Ord<A>): Ord<A> {
  return {
    equals: O.equals,
    notEquals: O.notEquals,
    compare: (a, b) => O.compare(b, a),
    lessThan: O.greaterThan,
    lessThanOrEqual: O.greaterThanOrEqual,
    greaterThan: O.lessThan,
    greaterThanOrEqual: O.lessThanOrEqual,
  };
}

/**
 * Ord for arrays (lexicographic comparison, shorter prefix first).
 */
export function ordArray<A>(O: Ord<A>): Ord<readonly A[]> {
  return makeOrd<readonly A[]>((xs, ys) => {
    const len = Math.min(xs.length, ys.length);
    for (let i = 0; i < len; i++) {
      const cmp = O.compare(xs[i], ys[i]);
      if (cmp !== EQ_ORD) return cmp;
    }
    return compareNumber(xs.length, ys.length);
  });
}

// ============================================================================
// Hash
// Types that can be reduced to a 32-bit bucket selector.
// ============================================================================

/**
 * Hash typeclass.
 *
 * Law (with its paired Eq): `equals(x, y) => hash(x) === hash(y)`.
 * Hash tables only use the low bits after spreading, so the result needs
 * no particular range; it is truncated to 32 bits.
 */
export interface Hash<A> {
  hash(a: A): number;
}

export function makeHash<A>(hash: (a: A) => number): Hash<A> {
  return { hash };
}

/**
 * Mix two hash codes (31-multiplier polynomial).
 */
export function hashCombine(h1: number, h2: number): number {
  return (Math.imul(h1, 31) + h2) | 0;
}

// djb2
export const hashString: Hash<string> = makeHash<string>((a) => {
  let hash = 5381;
  for (let i = 0; i < a.length; i++) {
    hash = ((hash << 5) + hash) ^ a.charCodeAt(i);
  }
  return hash | 0;
});

export const hashNumber: Hash<number> = makeHash<number>((a) => {
  if (Number.isNaN(a)) return 0x7fc00000;
  if (!Number.isFinite(a)) return a > 0 ? 0x7f800000 : 0xff800000 | 0;
  // -0 and 0 are equal under eqNumber and both land here
  if (Number.isInteger(a) && Math.abs(a) < 2 ** 31) return a | 0;
  return hashString.hash(String(a));
});

export const hashBoolean: Hash<boolean> = makeHash<boolean>((a) => (a ? 1231 : 1237));

export const hashBigInt: Hash<bigint> = makeHash<bigint>((a) => hashString.hash(a.toString()));

export const hashDate: Hash<Date> = makeHash<Date>((a) => hashNumber.hash(a.getTime()));

/**
 * Hash a value through a projection; pair with `eqBy` using the same projection.
 */
export function hashBy<A, B>(f: (a: A) => B, H: Hash<B>): Hash<A> {
  return makeHash<A>((a) => H.hash(f(a)));
}

/**
 * Order-sensitive hash for arrays; pairs with `eqArray`.
 */
export function hashArray<A>(H: Hash<A>): Hash<readonly A[]> {
  return makeHash<readonly A[]>((xs) => {
    let hash = xs.length;
    for (const x of xs) hash = hashCombine(hash, H.hash(x));
    return hash;
  });
}
