/**
 * LinkedHashSet<K>: a HashSet that iterates in insertion order. Adding a key
 * that is already present keeps its position.
 */

import type { Eq, Hash } from "@corral/std";
import { AbstractHashSet } from "./hash-set.js";
import { LinkedHashMap } from "./linked-hash-map.js";
import type { HashTableOptions } from "./options.js";

export class LinkedHashSet<K> extends AbstractHashSet<K> {
  private readonly _map: LinkedHashMap<K, true>;

  constructor(eq: Eq<K>, hash: Hash<K>, options: HashTableOptions = {}) {
    const map = new LinkedHashMap<K, true>(eq, hash, { ...options, order: "insertion" });
    super(map);
    this._map = map;
  }

  first(): K | undefined {
    return this._map.first()?.[0];
  }

  last(): K | undefined {
    return this._map.last()?.[0];
  }
}
