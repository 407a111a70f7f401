/**
 * HashSet<K>: a set of keys stored in a HashMap<K, true>.
 *
 * API mirrors native Set<K> where it can; `tryAdd` and `insert` report
 * whether the key was new.
 */

import type { Eq, Hash } from "@corral/std";
import type { MutableIterator } from "./fail-fast.js";
import { HashMap } from "./hash-map.js";
import type { HashTableOptions } from "./options.js";

/**
 * The part of a map a set needs.
 */
export interface KeyTable<K> {
  readonly size: number;
  readonly generation: number;
  putIfAbsent(k: K, v: true): true | undefined;
  insert(k: K, v: true): void;
  has(k: K): boolean;
  delete(k: K): boolean;
  clear(): void;
  keys(): MutableIterator<K>;
}

export abstract class AbstractHashSet<K> {
  protected readonly table: KeyTable<K>;

  protected constructor(table: KeyTable<K>) {
    this.table = table;
  }

  get size(): number {
    return this.table.size;
  }

  get generation(): number {
    return this.table.generation;
  }

  isEmpty(): boolean {
    return this.table.size === 0;
  }

  has(k: K): boolean {
    return this.table.has(k);
  }

  add(k: K): this {
    this.table.putIfAbsent(k, true);
    return this;
  }

  /**
   * Add `k`; false when an equal key was already present.
   */
  tryAdd(k: K): boolean {
    return this.table.putIfAbsent(k, true) === undefined;
  }

  /**
   * Add `k`; fails with DuplicateKeyViolation when it is already present.
   */
  insert(k: K): void {
    this.table.insert(k, true);
  }

  delete(k: K): boolean {
    return this.table.delete(k);
  }

  clear(): void {
    this.table.clear();
  }

  values(): MutableIterator<K> {
    return this.table.keys();
  }

  keys(): MutableIterator<K> {
    return this.table.keys();
  }

  iterator(): MutableIterator<K> {
    return this.table.keys();
  }

  [Symbol.iterator](): MutableIterator<K> {
    return this.table.keys();
  }

  forEach(fn: (value: K) => void): void {
    for (const k of this) fn(k);
  }

  toArray(): K[] {
    return [...this];
  }
}

export class HashSet<K> extends AbstractHashSet<K> {
  constructor(eq: Eq<K>, hash: Hash<K>, options: HashTableOptions = {}) {
    super(new HashMap<K, true>(eq, hash, options));
  }
}
