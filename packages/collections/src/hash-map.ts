/**
 * HashMap<K, V>: a map backed by a chained bucket array using Eq<K> + Hash<K>.
 *
 * The bucket count is a power of two. The table doubles once
 * `size / capacity` reaches the load factor. Iteration order follows the
 * buckets: it is stable between structural mutations and not across a
 * resize.
 *
 * Keys must not change their hash or equality while stored.
 *
 * @example
 * ```typescript
 * const ages = new HashMap<string, number>(eqString, hashString);
 * ages.put("ada", 36);
 * ages.put("alan", 41);
 * ages.getOrElse("grace", 0); // 0
 * ```
 */

import { createLogger } from "@corral/core";
import { Fault } from "@corral/scope";
import { eqStrict, type Eq, type Hash } from "@corral/std";
import { NodeIterator, type MutableIterator, type NodeWalk } from "./fail-fast.js";
import {
  MAXIMUM_CAPACITY,
  describeValue,
  resolveHashTableOptions,
  type HashTableOptions,
  type NullKeyPolicy,
} from "./options.js";

const log = createLogger("collections");

export interface HashNode<K, V> {
  readonly key: K;
  value: V;
  /** Spread hash; 0 for the absent-marker key */
  readonly hash: number;
}

function isAbsentKey(key: unknown): boolean {
  return key === null || key === undefined;
}

function spread(h: number): number {
  const x = h | 0;
  return x ^ (x >>> 16);
}

// ============================================================================
// AbstractHashMap
// ============================================================================

/**
 * Bucket storage and the map operations. Subclasses choose the node type and
 * may keep extra structure in step through the `on*` hooks.
 */
export abstract class AbstractHashMap<K, V, N extends HashNode<K, V>> {
  private readonly _eq: Eq<K>;
  private readonly _hash: Hash<K>;
  private readonly _loadFactor: number;
  private readonly _nullKeys: NullKeyPolicy;
  private _buckets: Array<N[] | undefined>;
  private _size = 0;
  private _generation = 0;

  constructor(eq: Eq<K>, hash: Hash<K>, options: HashTableOptions = {}) {
    const resolved = resolveHashTableOptions(options);
    this._eq = eq;
    this._hash = hash;
    this._loadFactor = resolved.loadFactor;
    this._nullKeys = resolved.nullKeys;
    this._buckets = new Array<N[] | undefined>(resolved.capacity).fill(undefined);
  }

  protected abstract createNode(key: K, value: V, hash: number): N;

  /** Called after a node is linked into its bucket. */
  protected onInsert(_node: N): void {}

  /** Called on a successful lookup or a put that replaced a value. */
  protected onAccess(_node: N): void {}

  /** Called after a node is unlinked from its bucket. */
  protected onRemove(_node: N): void {}

  protected onClear(): void {}

  get size(): number {
    return this._size;
  }

  isEmpty(): boolean {
    return this._size === 0;
  }

  /** Number of buckets. */
  get capacity(): number {
    return this._buckets.length;
  }

  get loadFactor(): number {
    return this._loadFactor;
  }

  get generation(): number {
    return this._generation;
  }

  // --------------------------------------------------------------------------
  // Lookup
  // --------------------------------------------------------------------------

  get(k: K): V | undefined {
    const node = this.findNode(k);
    if (node === undefined) return undefined;
    this.onAccess(node);
    return node.value;
  }

  getOrElse(k: K, fallback: V): V {
    const node = this.findNode(k);
    if (node === undefined) return fallback;
    this.onAccess(node);
    return node.value;
  }

  getOrThrow(k: K): V {
    const node = this.findNode(k);
    if (node === undefined) throw Fault.notFound(`no value for key ${describeValue(k)}`);
    this.onAccess(node);
    return node.value;
  }

  has(k: K): boolean {
    return this.findNode(k) !== undefined;
  }

  containsKey(k: K): boolean {
    return this.has(k);
  }

  containsValue(v: V, eqV: Eq<V> = eqStrict<V>()): boolean {
    for (let node = this.firstNode(); node !== undefined; node = this.nextNode(node)) {
      if (eqV.equals(node.value, v)) return true;
    }
    return false;
  }

  // --------------------------------------------------------------------------
  // Mutation
  // --------------------------------------------------------------------------

  /**
   * Associate `v` with `k`. Returns the previous value, if any.
   * Replacing a value is not a structural mutation.
   */
  put(k: K, v: V): V | undefined {
    const node = this.findNode(k);
    if (node !== undefined) {
      const old = node.value;
      node.value = v;
      this.onAccess(node);
      return old;
    }
    this.insertNode(k, v);
    return undefined;
  }

  set(k: K, v: V): this {
    this.put(k, v);
    return this;
  }

  /**
   * Add a new key; fails with DuplicateKeyViolation if it is already present.
   */
  insert(k: K, v: V): void {
    if (this.findNode(k) !== undefined) {
      throw Fault.duplicateKey(`key ${describeValue(k)} is already present`);
    }
    this.insertNode(k, v);
  }

  /**
   * Add `k` only if absent. Returns the existing value, or undefined if added.
   */
  putIfAbsent(k: K, v: V): V | undefined {
    const node = this.findNode(k);
    if (node !== undefined) {
      this.onAccess(node);
      return node.value;
    }
    this.insertNode(k, v);
    return undefined;
  }

  computeIfAbsent(k: K, compute: (k: K) => V): V {
    const node = this.findNode(k);
    if (node !== undefined) {
      this.onAccess(node);
      return node.value;
    }
    const generation = this._generation;
    const v = compute(k);
    if (this._generation !== generation) {
      throw Fault.concurrentModification("map modified by computeIfAbsent callback");
    }
    this.insertNode(k, v);
    return v;
  }

  /**
   * Remove `k`. Returns the removed value, if any.
   */
  remove(k: K): V | undefined {
    const node = this.findNode(k);
    if (node === undefined) return undefined;
    this.removeNode(node);
    return node.value;
  }

  delete(k: K): boolean {
    const node = this.findNode(k);
    if (node === undefined) return false;
    this.removeNode(node);
    return true;
  }

  clear(): void {
    if (this._size === 0) return;
    this._buckets.fill(undefined);
    this._size = 0;
    this.onClear();
    this._generation++;
  }

  // --------------------------------------------------------------------------
  // Iteration
  // --------------------------------------------------------------------------

  keys(): MutableIterator<K> {
    return this.iterate((node) => node.key);
  }

  values(): MutableIterator<V> {
    return this.iterate((node) => node.value);
  }

  entries(): MutableIterator<[K, V]> {
    return this.iterate((node): [K, V] => [node.key, node.value]);
  }

  iterator(): MutableIterator<[K, V]> {
    return this.entries();
  }

  [Symbol.iterator](): MutableIterator<[K, V]> {
    return this.entries();
  }

  forEach(fn: (value: V, key: K) => void): void {
    for (const [k, v] of this) fn(v, k);
  }

  // --------------------------------------------------------------------------
  // For subclasses
  // --------------------------------------------------------------------------

  protected firstNode(): N | undefined {
    return this.scanFrom(0);
  }

  protected nextNode(node: N): N | undefined {
    const index = node.hash & (this._buckets.length - 1);
    const bucket = this._buckets[index];
    if (bucket !== undefined) {
      const position = bucket.indexOf(node);
      if (position >= 0 && position + 1 < bucket.length) return bucket[position + 1];
    }
    return this.scanFrom(index + 1);
  }

  protected removeNode(node: N): void {
    const index = node.hash & (this._buckets.length - 1);
    const bucket = this._buckets[index];
    const position = bucket === undefined ? -1 : bucket.indexOf(node);
    if (bucket === undefined || position < 0) {
      throw Fault.illegalState(`key ${describeValue(node.key)} is not in this map`);
    }
    bucket.splice(position, 1);
    if (bucket.length === 0) this._buckets[index] = undefined;
    this._size--;
    this._generation++;
    this.onRemove(node);
  }

  /** For reorderings that are structural without adding or removing. */
  protected bumpGeneration(): void {
    this._generation++;
  }

  protected iterate<T>(project: (node: N) => T): MutableIterator<T> {
    const walk: NodeWalk<N> = {
      next: (node) => this.nextNode(node),
      remove: (node) => this.removeNode(node),
    };
    return new NodeIterator(this, this.firstNode(), walk, project);
  }

  // --------------------------------------------------------------------------
  // Internals
  // --------------------------------------------------------------------------

  private hashOf(k: K): number {
    return isAbsentKey(k) ? 0 : spread(this._hash.hash(k));
  }

  private keysEqual(a: K, b: K): boolean {
    if (isAbsentKey(a) || isAbsentKey(b)) return isAbsentKey(a) && isAbsentKey(b);
    return this._eq.equals(a, b);
  }

  private findNode(k: K): N | undefined {
    if (isAbsentKey(k) && this._nullKeys === "reject") return undefined;
    const h = this.hashOf(k);
    const bucket = this._buckets[h & (this._buckets.length - 1)];
    if (bucket === undefined) return undefined;
    for (let i = 0; i < bucket.length; i++) {
      const node = bucket[i];
      if (node.hash === h && this.keysEqual(k, node.key)) return node;
    }
    return undefined;
  }

  private insertNode(k: K, v: V): N {
    if (isAbsentKey(k) && this._nullKeys === "reject") {
      throw Fault.invalidArgument(`${String(k)} keys are rejected by this map`);
    }
    const h = this.hashOf(k);
    const node = this.createNode(k, v, h);
    const index = h & (this._buckets.length - 1);
    const bucket = this._buckets[index];
    if (bucket === undefined) {
      this._buckets[index] = [node];
    } else {
      bucket.push(node);
    }
    this._size++;
    this._generation++;
    this.onInsert(node);
    if (this._size >= this._buckets.length * this._loadFactor) this.resize();
    return node;
  }

  private resize(): void {
    const oldCapacity = this._buckets.length;
    if (oldCapacity >= MAXIMUM_CAPACITY) return;
    const newCapacity = oldCapacity * 2;
    const mask = newCapacity - 1;
    const buckets = new Array<N[] | undefined>(newCapacity).fill(undefined);

    for (const bucket of this._buckets) {
      if (bucket === undefined) continue;
      for (const node of bucket) {
        const index = node.hash & mask;
        const target = buckets[index];
        if (target === undefined) {
          buckets[index] = [node];
        } else {
          target.push(node);
        }
      }
    }

    this._buckets = buckets;
    log.debug(`resized hash table from ${oldCapacity} to ${newCapacity} buckets (size ${this._size})`);
  }

  private scanFrom(index: number): N | undefined {
    for (let i = index; i < this._buckets.length; i++) {
      const bucket = this._buckets[i];
      if (bucket !== undefined && bucket.length > 0) return bucket[0];
    }
    return undefined;
  }
}

// ============================================================================
// HashMap
// ============================================================================

export class HashMap<K, V> extends AbstractHashMap<K, V, HashNode<K, V>> {
  protected override createNode(key: K, value: V, hash: number): HashNode<K, V> {
    return { key, value, hash };
  }
}
