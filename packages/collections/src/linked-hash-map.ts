/**
 * LinkedHashMap<K, V>: a HashMap whose entries are also threaded on a doubly
 * linked list, so iteration follows insertion order or access order.
 *
 * In access order, a successful `get`, `getOrElse`, `getOrThrow`,
 * `putIfAbsent` or `computeIfAbsent` on a present key, and a `put` that
 * replaces a value, move the entry to the tail. Moving is a structural
 * mutation. `has` is not an access.
 *
 * Eviction is left to the caller:
 *
 * ```typescript
 * const lru = new LinkedHashMap<string, Page>(eqString, hashString, { order: "access" });
 * lru.put(url, page);
 * if (lru.size > 100) lru.pollFirst();
 * ```
 */

import type { Eq, Hash } from "@corral/std";
import { AbstractHashMap, type HashNode } from "./hash-map.js";
import type { HashTableOptions } from "./options.js";

export type LinkedOrder = "insertion" | "access";

export interface LinkedHashMapOptions extends HashTableOptions {
  order?: LinkedOrder;
}

interface LinkedNode<K, V> extends HashNode<K, V> {
  before: LinkedNode<K, V> | undefined;
  after: LinkedNode<K, V> | undefined;
}

export class LinkedHashMap<K, V> extends AbstractHashMap<K, V, LinkedNode<K, V>> {
  readonly order: LinkedOrder;
  private _head: LinkedNode<K, V> | undefined = undefined;
  private _tail: LinkedNode<K, V> | undefined = undefined;

  constructor(eq: Eq<K>, hash: Hash<K>, options: LinkedHashMapOptions = {}) {
    super(eq, hash, options);
    this.order = options.order ?? "insertion";
  }

  /** Eldest entry (least recently used in access order). */
  first(): readonly [K, V] | undefined {
    const head = this._head;
    return head === undefined ? undefined : [head.key, head.value];
  }

  last(): readonly [K, V] | undefined {
    const tail = this._tail;
    return tail === undefined ? undefined : [tail.key, tail.value];
  }

  /** Remove and return the eldest entry. */
  pollFirst(): readonly [K, V] | undefined {
    const head = this._head;
    if (head === undefined) return undefined;
    this.removeNode(head);
    return [head.key, head.value];
  }

  protected override createNode(key: K, value: V, hash: number): LinkedNode<K, V> {
    return { key, value, hash, before: undefined, after: undefined };
  }

  protected override onInsert(node: LinkedNode<K, V>): void {
    this.linkLast(node);
  }

  protected override onAccess(node: LinkedNode<K, V>): void {
    if (this.order !== "access" || node === this._tail) return;
    this.unlink(node);
    this.linkLast(node);
    this.bumpGeneration();
  }

  protected override onRemove(node: LinkedNode<K, V>): void {
    this.unlink(node);
  }

  protected override onClear(): void {
    this._head = undefined;
    this._tail = undefined;
  }

  protected override firstNode(): LinkedNode<K, V> | undefined {
    return this._head;
  }

  protected override nextNode(node: LinkedNode<K, V>): LinkedNode<K, V> | undefined {
    return node.after;
  }

  private linkLast(node: LinkedNode<K, V>): void {
    const tail = this._tail;
    node.before = tail;
    node.after = undefined;
    if (tail === undefined) {
      this._head = node;
    } else {
      tail.after = node;
    }
    this._tail = node;
  }

  private unlink(node: LinkedNode<K, V>): void {
    const { before, after } = node;
    if (before === undefined) {
      this._head = after;
    } else {
      before.after = after;
    }
    if (after === undefined) {
      this._tail = before;
    } else {
      after.before = before;
    }
    node.before = undefined;
    node.after = undefined;
  }
}
