/**
 * TreeSet<K>: a sorted set stored in a TreeMap<K, true>.
 */

import type { Ord } from "@corral/std";
import type { MutableIterator } from "./fail-fast.js";
import { TreeMap, type TreeMapOptions } from "./tree-map.js";

export class TreeSet<K> {
  private readonly _map: TreeMap<K, true>;

  constructor(ord: Ord<K>, options: TreeMapOptions = {}) {
    this._map = new TreeMap<K, true>(ord, options);
  }

  static of<K>(ord: Ord<K>, ...keys: K[]): TreeSet<K> {
    const set = new TreeSet(ord);
    for (const k of keys) set.add(k);
    return set;
  }

  get size(): number {
    return this._map.size;
  }

  get generation(): number {
    return this._map.generation;
  }

  isEmpty(): boolean {
    return this._map.size === 0;
  }

  has(k: K): boolean {
    return this._map.has(k);
  }

  add(k: K): this {
    this._map.put(k, true);
    return this;
  }

  /** False when an equal key was already present. */
  tryAdd(k: K): boolean {
    return this._map.put(k, true) === undefined;
  }

  insert(k: K): void {
    this._map.insert(k, true);
  }

  delete(k: K): boolean {
    return this._map.delete(k);
  }

  clear(): void {
    this._map.clear();
  }

  first(): K | undefined {
    return this._map.firstKey();
  }

  last(): K | undefined {
    return this._map.lastKey();
  }

  floor(k: K): K | undefined {
    return this._map.floorKey(k);
  }

  ceiling(k: K): K | undefined {
    return this._map.ceilingKey(k);
  }

  higher(k: K): K | undefined {
    return this._map.higherKey(k);
  }

  lower(k: K): K | undefined {
    return this._map.lowerKey(k);
  }

  pollFirst(): K | undefined {
    return this._map.pollFirst()?.[0];
  }

  pollLast(): K | undefined {
    return this._map.pollLast()?.[0];
  }

  values(): MutableIterator<K> {
    return this._map.keys();
  }

  keys(): MutableIterator<K> {
    return this._map.keys();
  }

  iterator(): MutableIterator<K> {
    return this._map.keys();
  }

  [Symbol.iterator](): MutableIterator<K> {
    return this._map.keys();
  }

  descending(): MutableIterator<K> {
    return this._map.descendingKeys();
  }

  forEach(fn: (value: K) => void): void {
    for (const k of this) fn(k);
  }

  toArray(): K[] {
    return [...this];
  }

  /** Check the backing tree's invariants; returns its black height. */
  validate(): number {
    return this._map.validate();
  }
}
