// Typeclasses
export type {
  IteratorKinds,
  IteratorKind,
  IteratorOf,
  IterableOnce,
  Iterable,
  Seq,
  SetLike,
  MapLike,
  MutableSetLike,
  MutableMapLike,
} from "./typeclasses.js";

// Iteration
export { FailFastIterator, NodeIterator, IndexIterator } from "./fail-fast.js";
export type { MutableIterator, Versioned, NodeWalk, IndexWalk } from "./fail-fast.js";

// Options
export { MAXIMUM_CAPACITY, tableSizeFor } from "./options.js";
export type { HashTableOptions, BoundedOptions, NullKeyPolicy } from "./options.js";

// Data structures
export { AbstractHashMap, HashMap } from "./hash-map.js";
export type { HashNode } from "./hash-map.js";
export { AbstractHashSet, HashSet } from "./hash-set.js";
export type { KeyTable } from "./hash-set.js";
export { LinkedHashMap } from "./linked-hash-map.js";
export type { LinkedHashMapOptions, LinkedOrder } from "./linked-hash-map.js";
export { LinkedHashSet } from "./linked-hash-set.js";
export { TreeMap } from "./tree-map.js";
export type { TreeMapOptions } from "./tree-map.js";
export { TreeSet } from "./tree-set.js";
export { PriorityQueue } from "./priority-queue.js";
export { ArrayList } from "./array-list.js";
export type { ArrayListOptions } from "./array-list.js";
export { ArrayDeque } from "./array-deque.js";
export type { ArrayDequeOptions } from "./array-deque.js";

// Instances
export {
  arraySeq,
  arrayListSeq,
  arrayDequeSeq,
  nativeSetLike,
  nativeMutableSetLike,
  nativeMapLike,
  nativeMutableMapLike,
  hashSetLike,
  hashMutableSetLike,
  hashMapLike,
  hashMutableMapLike,
  treeSetLike,
  treeMutableSetLike,
  treeMapLike,
  treeMutableMapLike,
} from "./instances.js";

// Derived operations
export {
  toArray,
  find,
  exists,
  forAll,
  count,
  removeIf,
  head,
  last,
  union,
  intersection,
  difference,
  isSubsetOf,
  getOrElse,
  mapValues,
  filterEntries,
} from "./derived.js";
