/**
 * TreeMap<K, V>: a sorted map on a red-black tree ordered by Ord<K>.
 *
 * Lookups, inserts and removals are O(log n). Iteration is in ascending key
 * order. Navigation (`floor`, `ceiling`, `higher`, `lower`) answers with the
 * nearest entry.
 *
 * With `verifyComparator` on, every comparison is also made in the reverse
 * direction and must agree in sign; a disagreement is a
 * ComparatorContractViolation and leaves the tree unchanged.
 *
 * @example
 * ```typescript
 * const scores = new TreeMap<number, string>(ordNumber);
 * scores.set(70, "C").set(85, "B").set(95, "A");
 * scores.floorKey(90);  // 85
 * ```
 */

import { Fault } from "@corral/scope";
import type { Ord } from "@corral/std";
import { NodeIterator, type MutableIterator, type NodeWalk } from "./fail-fast.js";
import {
  RedBlackTree,
  maximum,
  minimum,
  predecessor,
  successor,
  validateRedBlack,
  type TreeNode,
} from "./internal/red-black.js";
import { defaultVerifyComparator, describeValue } from "./options.js";

export interface TreeMapOptions {
  /** Check comparator symmetry on every comparison; defaults from config */
  verifyComparator?: boolean;
}

function entryOf<K, V>(node: TreeNode<K, V> | undefined): readonly [K, V] | undefined {
  return node === undefined ? undefined : [node.key, node.value];
}

export class TreeMap<K, V> {
  private readonly _ord: Ord<K>;
  private readonly _verify: boolean;
  private readonly _tree = new RedBlackTree<K, V>();
  private _generation = 0;

  constructor(ord: Ord<K>, options: TreeMapOptions = {}) {
    this._ord = ord;
    this._verify = options.verifyComparator ?? defaultVerifyComparator();
  }

  get size(): number {
    return this._tree.size;
  }

  isEmpty(): boolean {
    return this._tree.size === 0;
  }

  get generation(): number {
    return this._generation;
  }

  // ==========================================================================
  // Lookup
  // ==========================================================================

  get(k: K): V | undefined {
    return this.findNode(k)?.value;
  }

  getOrElse(k: K, fallback: V): V {
    const node = this.findNode(k);
    return node === undefined ? fallback : node.value;
  }

  getOrThrow(k: K): V {
    const node = this.findNode(k);
    if (node === undefined) throw Fault.notFound(`no value for key ${describeValue(k)}`);
    return node.value;
  }

  has(k: K): boolean {
    return this.findNode(k) !== undefined;
  }

  // ==========================================================================
  // Mutation
  // ==========================================================================

  /**
   * Associate `v` with `k`. Returns the previous value, if any.
   */
  put(k: K, v: V): V | undefined {
    const root = this._tree.root;
    if (root === undefined) {
      if (this._verify) this.checkSelfEqual(k);
      this.attach(k, v, undefined, "left");
      return undefined;
    }

    let parent = root;
    for (;;) {
      const c = this.compare(k, parent.key);
      if (c === 0) {
        const old = parent.value;
        parent.value = v;
        return old;
      }
      const next = c < 0 ? parent.left : parent.right;
      if (next === undefined) {
        this.attach(k, v, parent, c < 0 ? "left" : "right");
        return undefined;
      }
      parent = next;
    }
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
    this.put(k, v);
  }

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
    if (this._tree.size === 0) return;
    this._tree.clear();
    this._generation++;
  }

  // ==========================================================================
  // Navigation
  // ==========================================================================

  first(): readonly [K, V] | undefined {
    return entryOf(this.firstNode());
  }

  last(): readonly [K, V] | undefined {
    return entryOf(this.lastNode());
  }

  /** Greatest entry with key ≤ k. */
  floor(k: K): readonly [K, V] | undefined {
    return entryOf(this.floorNode(k, true));
  }

  /** Least entry with key ≥ k. */
  ceiling(k: K): readonly [K, V] | undefined {
    return entryOf(this.ceilingNode(k, true));
  }

  /** Least entry with key > k. */
  higher(k: K): readonly [K, V] | undefined {
    return entryOf(this.ceilingNode(k, false));
  }

  /** Greatest entry with key < k. */
  lower(k: K): readonly [K, V] | undefined {
    return entryOf(this.floorNode(k, false));
  }

  firstKey(): K | undefined {
    return this.firstNode()?.key;
  }

  lastKey(): K | undefined {
    return this.lastNode()?.key;
  }

  floorKey(k: K): K | undefined {
    return this.floorNode(k, true)?.key;
  }

  ceilingKey(k: K): K | undefined {
    return this.ceilingNode(k, true)?.key;
  }

  higherKey(k: K): K | undefined {
    return this.ceilingNode(k, false)?.key;
  }

  lowerKey(k: K): K | undefined {
    return this.floorNode(k, false)?.key;
  }

  pollFirst(): readonly [K, V] | undefined {
    const node = this.firstNode();
    if (node === undefined) return undefined;
    this.removeNode(node);
    return [node.key, node.value];
  }

  pollLast(): readonly [K, V] | undefined {
    const node = this.lastNode();
    if (node === undefined) return undefined;
    this.removeNode(node);
    return [node.key, node.value];
  }

  // ==========================================================================
  // Iteration
  // ==========================================================================

  keys(): MutableIterator<K> {
    return this.iterate(this.firstNode(), successor, (node) => node.key);
  }

  values(): MutableIterator<V> {
    return this.iterate(this.firstNode(), successor, (node) => node.value);
  }

  entries(): MutableIterator<[K, V]> {
    return this.iterate(this.firstNode(), successor, (node): [K, V] => [node.key, node.value]);
  }

  iterator(): MutableIterator<[K, V]> {
    return this.entries();
  }

  [Symbol.iterator](): MutableIterator<[K, V]> {
    return this.entries();
  }

  descendingKeys(): MutableIterator<K> {
    return this.iterate(this.lastNode(), predecessor, (node) => node.key);
  }

  /**
   * Entries with `from ≤ key < to`, ascending.
   */
  range(from: K, to: K): MutableIterator<[K, V]> {
    if (this.compare(from, to) > 0) {
      throw Fault.invalidArgument(`range start ${describeValue(from)} is after its end ${describeValue(to)}`);
    }
    const below = (node: TreeNode<K, V> | undefined): TreeNode<K, V> | undefined =>
      node !== undefined && this.compare(node.key, to) < 0 ? node : undefined;
    return this.iterate(
      below(this.ceilingNode(from, true)),
      (node) => below(successor(node)),
      (node): [K, V] => [node.key, node.value]
    );
  }

  forEach(fn: (value: V, key: K) => void): void {
    for (const [k, v] of this) fn(v, k);
  }

  /**
   * Check the tree's structural invariants; returns its black height.
   */
  validate(): number {
    return validateRedBlack(this._tree, (a, b) => this._ord.compare(a, b));
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private compare(a: K, b: K): number {
    const c = this._ord.compare(a, b);
    if (this._verify) {
      const reverse = this._ord.compare(b, a);
      if (Math.sign(c) !== -Math.sign(reverse)) {
        throw Fault.comparatorContract(
          `compare(${describeValue(a)}, ${describeValue(b)}) is ${c} ` +
            `but compare(${describeValue(b)}, ${describeValue(a)}) is ${reverse}`
        );
      }
    }
    return c;
  }

  private checkSelfEqual(k: K): void {
    const c = this._ord.compare(k, k);
    if (c !== 0) {
      throw Fault.comparatorContract(`compare(${describeValue(k)}, ${describeValue(k)}) is ${c}, not 0`);
    }
  }

  private attach(k: K, v: V, parent: TreeNode<K, V> | undefined, side: "left" | "right"): void {
    this._tree.attach(k, v, parent, side);
    this._generation++;
  }

  private removeNode(node: TreeNode<K, V>): void {
    this._tree.detach(node);
    this._generation++;
  }

  private findNode(k: K): TreeNode<K, V> | undefined {
    let node = this._tree.root;
    while (node !== undefined) {
      const c = this.compare(k, node.key);
      if (c === 0) return node;
      node = c < 0 ? node.left : node.right;
    }
    return undefined;
  }

  private firstNode(): TreeNode<K, V> | undefined {
    const root = this._tree.root;
    return root === undefined ? undefined : minimum(root);
  }

  private lastNode(): TreeNode<K, V> | undefined {
    const root = this._tree.root;
    return root === undefined ? undefined : maximum(root);
  }

  /** Greatest node with key < k, or ≤ k when `inclusive`. */
  private floorNode(k: K, inclusive: boolean): TreeNode<K, V> | undefined {
    let node = this._tree.root;
    let best: TreeNode<K, V> | undefined;
    while (node !== undefined) {
      const c = this.compare(k, node.key);
      if (c === 0 && inclusive) return node;
      if (c > 0) {
        best = node;
        node = node.right;
      } else {
        node = node.left;
      }
    }
    return best;
  }

  /** Least node with key > k, or ≥ k when `inclusive`. */
  private ceilingNode(k: K, inclusive: boolean): TreeNode<K, V> | undefined {
    let node = this._tree.root;
    let best: TreeNode<K, V> | undefined;
    while (node !== undefined) {
      const c = this.compare(k, node.key);
      if (c === 0 && inclusive) return node;
      if (c < 0) {
        best = node;
        node = node.left;
      } else {
        node = node.right;
      }
    }
    return best;
  }

  private iterate<T>(
    first: TreeNode<K, V> | undefined,
    step: (node: TreeNode<K, V>) => TreeNode<K, V> | undefined,
    project: (node: TreeNode<K, V>) => T
  ): MutableIterator<T> {
    const walk: NodeWalk<TreeNode<K, V>> = {
      next: step,
      remove: (node) => this.removeNode(node),
    };
    return new NodeIterator(this, first, walk, project);
  }
}
