/**
 * Views for arrays, native Set/Map and the corral containers.
 *
 * Corral container views hand out fail-fast iterators. Mutable views that
 * create containers take the capabilities those containers are built with.
 */

import type { Eq, Hash, Ord } from "@corral/std";
import { ArrayDeque } from "./array-deque.js";
import { ArrayList } from "./array-list.js";
import { HashMap } from "./hash-map.js";
import { HashSet } from "./hash-set.js";
import type { HashTableOptions } from "./options.js";
import { TreeMap, type TreeMapOptions } from "./tree-map.js";
import { TreeSet } from "./tree-set.js";
import type {
  IterableOnce,
  MapLike,
  MutableMapLike,
  MutableSetLike,
  Seq,
  SetLike,
} from "./typeclasses.js";

function foldOver<I extends globalThis.Iterable<A>, A>(): IterableOnce<I, A> {
  return {
    fold: (i, z, f) => {
      let acc = z;
      for (const a of i) acc = f(acc, a);
      return acc;
    },
  };
}

// ============================================================================
// Sequences
// ============================================================================

export function arraySeq<A>(): Seq<readonly A[], A> {
  return {
    ...foldOver<readonly A[], A>(),
    iterator: (s) => s.values(),
    length: (s) => s.length,
    nth: (s, index) => (index >= 0 && index < s.length ? s[index] : undefined),
  };
}

export function arrayListSeq<A>(): Seq<ArrayList<A>, A, "failFast"> {
  return {
    ...foldOver<ArrayList<A>, A>(),
    iterator: (s) => s.iterator(),
    length: (s) => s.size,
    nth: (s, index) => (Number.isInteger(index) && index >= 0 && index < s.size ? s.get(index) : undefined),
  };
}

export function arrayDequeSeq<A>(): Seq<ArrayDeque<A>, A, "failFast"> {
  return {
    ...foldOver<ArrayDeque<A>, A>(),
    iterator: (s) => s.iterator(),
    length: (s) => s.size,
    nth: (s, index) => (Number.isInteger(index) && index >= 0 && index < s.size ? s.get(index) : undefined),
  };
}

// ============================================================================
// Native Set / Map
// ============================================================================

export function nativeSetLike<K>(): SetLike<Set<K>, K> {
  return {
    ...foldOver<Set<K>, K>(),
    iterator: (s) => s.values(),
    has: (s, k) => s.has(k),
    size: (s) => s.size,
  };
}

export function nativeMutableSetLike<K>(): MutableSetLike<Set<K>, K> {
  return {
    ...nativeSetLike<K>(),
    create: () => new Set<K>(),
    add: (s, k) => {
      s.add(k);
    },
    delete: (s, k) => s.delete(k),
    clear: (s) => s.clear(),
  };
}

export function nativeMapLike<K, V>(): MapLike<Map<K, V>, K, V> {
  return {
    ...foldOver<Map<K, V>, [K, V]>(),
    iterator: (m) => m.entries(),
    get: (m, k) => m.get(k),
    has: (m, k) => m.has(k),
    size: (m) => m.size,
    keys: (m) => m.keys(),
    values: (m) => m.values(),
  };
}

export function nativeMutableMapLike<K, V>(): MutableMapLike<Map<K, V>, K, V> {
  return {
    ...nativeMapLike<K, V>(),
    create: () => new Map<K, V>(),
    set: (m, k, v) => {
      m.set(k, v);
    },
    delete: (m, k) => m.delete(k),
    clear: (m) => m.clear(),
  };
}

// ============================================================================
// Hash containers
// ============================================================================

export function hashSetLike<K>(): SetLike<HashSet<K>, K, "failFast"> {
  return {
    ...foldOver<HashSet<K>, K>(),
    iterator: (s) => s.values(),
    has: (s, k) => s.has(k),
    size: (s) => s.size,
  };
}

export function hashMutableSetLike<K>(
  eq: Eq<K>,
  hash: Hash<K>,
  options: HashTableOptions = {}
): MutableSetLike<HashSet<K>, K, "failFast"> {
  return {
    ...hashSetLike<K>(),
    create: () => new HashSet<K>(eq, hash, options),
    add: (s, k) => {
      s.add(k);
    },
    delete: (s, k) => s.delete(k),
    clear: (s) => s.clear(),
  };
}

export function hashMapLike<K, V>(): MapLike<HashMap<K, V>, K, V, "failFast"> {
  return {
    ...foldOver<HashMap<K, V>, [K, V]>(),
    iterator: (m) => m.entries(),
    get: (m, k) => m.get(k),
    has: (m, k) => m.has(k),
    size: (m) => m.size,
    keys: (m) => m.keys(),
    values: (m) => m.values(),
  };
}

export function hashMutableMapLike<K, V>(
  eq: Eq<K>,
  hash: Hash<K>,
  options: HashTableOptions = {}
): MutableMapLike<HashMap<K, V>, K, V, "failFast"> {
  return {
    ...hashMapLike<K, V>(),
    create: () => new HashMap<K, V>(eq, hash, options),
    set: (m, k, v) => {
      m.set(k, v);
    },
    delete: (m, k) => m.delete(k),
    clear: (m) => m.clear(),
  };
}

// ============================================================================
// Tree containers
// ============================================================================

export function treeSetLike<K>(): SetLike<TreeSet<K>, K, "failFast"> {
  return {
    ...foldOver<TreeSet<K>, K>(),
    iterator: (s) => s.values(),
    has: (s, k) => s.has(k),
    size: (s) => s.size,
  };
}

export function treeMutableSetLike<K>(
  ord: Ord<K>,
  options: TreeMapOptions = {}
): MutableSetLike<TreeSet<K>, K, "failFast"> {
  return {
    ...treeSetLike<K>(),
    create: () => new TreeSet<K>(ord, options),
    add: (s, k) => {
      s.add(k);
    },
    delete: (s, k) => s.delete(k),
    clear: (s) => s.clear(),
  };
}

export function treeMapLike<K, V>(): MapLike<TreeMap<K, V>, K, V, "failFast"> {
  return {
    ...foldOver<TreeMap<K, V>, [K, V]>(),
    iterator: (m) => m.entries(),
    get: (m, k) => m.get(k),
    has: (m, k) => m.has(k),
    size: (m) => m.size,
    keys: (m) => m.keys(),
    values: (m) => m.values(),
  };
}

export function treeMutableMapLike<K, V>(
  ord: Ord<K>,
  options: TreeMapOptions = {}
): MutableMapLike<TreeMap<K, V>, K, V, "failFast"> {
  return {
    ...treeMapLike<K, V>(),
    create: () => new TreeMap<K, V>(ord, options),
    set: (m, k, v) => {
      m.set(k, v);
    },
    delete: (m, k) => m.delete(k),
    clear: (m) => m.clear(),
  };
}
