import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { config } from "@corral/core";
import { isFault } from "@corral/scope";
import {
  eqNumber,
  eqString,
  hashNumber,
  hashString,
  makeEq,
  makeHash,
  type Eq,
  type Hash,
} from "@corral/std";
import { HashMap } from "../src/hash-map.js";

function faultKind(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    return isFault(error) ? error.kind : `not a fault: ${String(error)}`;
  }
  return undefined;
}

describe("HashMap", () => {
  beforeEach(() => {
    config.reset();
  });

  afterEach(() => {
    vi.restoreAllMocks();
    config.reset();
  });

  describe("with number keys", () => {
    it("finds a NaN key again", () => {
      const m = new HashMap<number, string>(eqNumber, hashNumber);
      m.put(NaN, "a");
      expect(m.put(NaN, "b")).toBe("a");
      expect(m.size).toBe(1);
      expect(m.get(NaN)).toBe("b");
      expect(m.delete(NaN)).toBe(true);
      expect(m.size).toBe(0);
    });

    it("treats 0 and -0 as one key", () => {
      const m = new HashMap<number, string>(eqNumber, hashNumber);
      m.put(0, "zero");
      m.put(-0, "minus zero");
      expect(m.size).toBe(1);
      expect(m.get(0)).toBe("minus zero");
    });
  });

  describe("with string keys", () => {
    function mkMap(): HashMap<string, number> {
      return new HashMap(eqString, hashString);
    }

    it("starts empty", () => {
      const m = mkMap();
      expect(m.size).toBe(0);
      expect(m.isEmpty()).toBe(true);
      expect(m.has("a")).toBe(false);
      expect(m.get("a")).toBeUndefined();
    });

    it("put replaces the value of an existing key", () => {
      const m = mkMap();
      expect(m.put("a", 1)).toBeUndefined();
      expect(m.put("b", 2)).toBeUndefined();
      expect(m.put("a", 3)).toBe(1);
      expect(m.size).toBe(2);
      expect(m.get("a")).toBe(3);
      expect(m.get("b")).toBe(2);
    });

    it("set chains", () => {
      const m = mkMap().set("x", 10).set("y", 20);
      expect(m.size).toBe(2);
      expect(m.containsKey("x")).toBe(true);
    });

    it("remove returns the removed value", () => {
      const m = mkMap();
      m.put("a", 1);
      m.put("b", 2);
      expect(m.remove("a")).toBe(1);
      expect(m.remove("a")).toBeUndefined();
      expect(m.has("a")).toBe(false);
      expect(m.size).toBe(1);
    });

    it("delete", () => {
      const m = mkMap();
      m.set("a", 1);
      expect(m.delete("a")).toBe(true);
      expect(m.delete("a")).toBe(false);
      expect(m.size).toBe(0);
    });

    it("clear", () => {
      const m = mkMap();
      m.set("a", 1);
      m.set("b", 2);
      m.clear();
      expect(m.size).toBe(0);
      expect(m.has("a")).toBe(false);
    });

    it("getOrElse", () => {
      const m = mkMap();
      m.set("a", 1);
      expect(m.getOrElse("a", 99)).toBe(1);
      expect(m.getOrElse("missing", 99)).toBe(99);
    });

    it("getOrThrow fails with NotFound", () => {
      const m = mkMap();
      m.set("a", 1);
      expect(m.getOrThrow("a")).toBe(1);
      expect(faultKind(() => m.getOrThrow("missing"))).toBe("NotFound");
    });

    it("insert refuses duplicates", () => {
      const m = mkMap();
      m.insert("a", 1);
      expect(faultKind(() => m.insert("a", 2))).toBe("DuplicateKeyViolation");
      expect(m.get("a")).toBe(1);
      expect(m.size).toBe(1);
    });

    it("putIfAbsent keeps the existing value", () => {
      const m = mkMap();
      expect(m.putIfAbsent("a", 1)).toBeUndefined();
      expect(m.putIfAbsent("a", 2)).toBe(1);
      expect(m.get("a")).toBe(1);
    });

    it("computeIfAbsent computes once", () => {
      const m = mkMap();
      const compute = vi.fn((k: string) => k.length);
      expect(m.computeIfAbsent("abc", compute)).toBe(3);
      expect(m.computeIfAbsent("abc", compute)).toBe(3);
      expect(compute).toHaveBeenCalledTimes(1);
    });

    it("computeIfAbsent rejects callbacks that mutate the map", () => {
      const m = mkMap();
      const kind = faultKind(() =>
        m.computeIfAbsent("a", () => {
          m.put("b", 2);
          return 1;
        })
      );
      expect(kind).toBe("ConcurrentModificationFault");
      expect(m.has("a")).toBe(false);
    });

    it("containsValue", () => {
      const m = mkMap();
      m.set("a", 1);
      expect(m.containsValue(1)).toBe(true);
      expect(m.containsValue(2)).toBe(false);
      expect(m.containsValue(1.0000001, makeEq<number>((x, y) => Math.abs(x - y) < 1e-3))).toBe(true);
    });

    it("entries iteration", () => {
      const m = mkMap();
      m.set("a", 1);
      m.set("b", 2);
      const entries = new Map<string, number>();
      for (const [k, v] of m) entries.set(k, v);
      expect(entries.get("a")).toBe(1);
      expect(entries.get("b")).toBe(2);
    });

    it("keys and values", () => {
      const m = mkMap();
      m.set("x", 10);
      m.set("y", 20);
      expect([...m.keys()].sort()).toEqual(["x", "y"]);
      expect([...m.values()].sort()).toEqual([10, 20]);
    });

    it("forEach visits every entry", () => {
      const m = mkMap();
      m.set("a", 1);
      m.set("b", 2);
      const seen: string[] = [];
      m.forEach((v, k) => seen.push(`${k}=${v}`));
      expect(seen.sort()).toEqual(["a=1", "b=2"]);
    });

    it("iterates in the same order until mutated", () => {
      const m = mkMap();
      for (const k of ["q", "w", "e", "r", "t", "y"]) m.set(k, k.charCodeAt(0));
      expect([...m.keys()]).toEqual([...m.keys()]);
    });
  });

  describe("sizing", () => {
    it("rounds the initial capacity up to a power of two", () => {
      expect(new HashMap(eqNumber, hashNumber).capacity).toBe(16);
      expect(new HashMap(eqNumber, hashNumber, { initialCapacity: 20 }).capacity).toBe(32);
      expect(new HashMap(eqNumber, hashNumber, { initialCapacity: 0 }).capacity).toBe(1);
    });

    it("doubles when size reaches capacity times the load factor", () => {
      const m = new HashMap<number, number>(eqNumber, hashNumber);
      for (let i = 0; i < 11; i++) m.put(i, i);
      expect(m.capacity).toBe(16);
      m.put(11, 11);
      expect(m.capacity).toBe(32);
      for (let i = 0; i < 12; i++) expect(m.get(i)).toBe(i);
    });

    it("logs each resize at debug level", () => {
      config.set({ log: { level: "debug" } });
      const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
      const m = new HashMap<number, number>(eqNumber, hashNumber);
      for (let i = 0; i < 12; i++) m.put(i, i);
      expect(debug).toHaveBeenCalledTimes(1);
      expect(debug).toHaveBeenCalledWith("[corral/collections] resized hash table from 16 to 32 buckets (size 12)");
    });

    it("takes the load factor from config", () => {
      config.set({ collections: { loadFactor: 0.5 } });
      const m = new HashMap<number, number>(eqNumber, hashNumber);
      expect(m.loadFactor).toBe(0.5);
      for (let i = 0; i < 8; i++) m.put(i, i);
      expect(m.capacity).toBe(32);
    });

    it("rejects bad options", () => {
      expect(faultKind(() => new HashMap(eqNumber, hashNumber, { loadFactor: 0 }))).toBe("InvalidArgument");
      expect(faultKind(() => new HashMap(eqNumber, hashNumber, { initialCapacity: -1 }))).toBe("InvalidArgument");
      expect(faultKind(() => new HashMap(eqNumber, hashNumber, { initialCapacity: 2.5 }))).toBe("InvalidArgument");
    });

    it("tracks size across puts and removes", () => {
      const m = new HashMap<number, number>(eqNumber, hashNumber);
      const model = new Map<number, number>();
      for (let i = 0; i < 1000; i++) {
        const key = (i * 7919) % 97;
        if (i % 3 === 0) {
          expect(m.remove(key)).toBe(model.get(key));
          model.delete(key);
        } else {
          m.put(key, i);
          model.set(key, i);
        }
        expect(m.size).toBe(model.size);
      }
      for (const [k, v] of model) expect(m.get(k)).toBe(v);
    });
  });

  describe("absent-marker keys", () => {
    const guardedEq = makeEq<string | null | undefined>((a, b) => {
      if (a === null || a === undefined || b === null || b === undefined) {
        throw new Error("eq called with an absent key");
      }
      return a === b;
    });
    const guardedHash = makeHash<string | null | undefined>((s) => {
      if (s === null || s === undefined) throw new Error("hash called with an absent key");
      return hashString.hash(s);
    });

    it("treats null and undefined as one key without calling the capabilities", () => {
      const m = new HashMap<string | null | undefined, number>(guardedEq, guardedHash);
      m.put("a", 1);
      m.put(null, 2);
      expect(m.put(undefined, 3)).toBe(2);
      expect(m.size).toBe(2);
      expect(m.get(null)).toBe(3);
      expect(m.has(undefined)).toBe(true);
      expect(m.remove(null)).toBe(3);
      expect(m.has(undefined)).toBe(false);
    });

    it("rejects them under the reject policy", () => {
      const m = new HashMap<string | null, number>(guardedEq, guardedHash, { nullKeys: "reject" });
      expect(faultKind(() => m.put(null, 1))).toBe("InvalidArgument");
      expect(m.get(null)).toBeUndefined();
      expect(m.has(null)).toBe(false);
      expect(m.size).toBe(0);
    });

    it("takes the policy from config", () => {
      config.set({ collections: { nullKeys: "reject" } });
      const m = new HashMap<string | null, number>(guardedEq, guardedHash);
      expect(faultKind(() => m.put(null, 1))).toBe("InvalidArgument");
    });
  });

  describe("generation", () => {
    it("moves on structural mutations only", () => {
      const m = new HashMap<string, number>(eqString, hashString);
      const g0 = m.generation;
      m.put("a", 1);
      expect(m.generation).toBe(g0 + 1);
      m.put("a", 2);
      expect(m.generation).toBe(g0 + 1);
      m.remove("missing");
      expect(m.generation).toBe(g0 + 1);
      m.remove("a");
      expect(m.generation).toBe(g0 + 2);
      m.clear();
      expect(m.generation).toBe(g0 + 2);
      m.put("b", 1);
      m.clear();
      expect(m.generation).toBe(g0 + 4);
    });
  });

  describe("fail-fast iteration", () => {
    it("fails on the step after a structural mutation", () => {
      const m = new HashMap<string, number>(eqString, hashString);
      m.set("a", 1).set("b", 2).set("c", 3);
      const iter = m.keys();
      iter.next();
      m.put("d", 4);
      expect(faultKind(() => iter.next())).toBe("ConcurrentModificationFault");
    });

    it("fails inside for-of when the body removes a key", () => {
      const m = new HashMap<string, number>(eqString, hashString);
      m.set("a", 1).set("b", 2).set("c", 3);
      const kind = faultKind(() => {
        for (const [k] of m) m.delete(k);
      });
      expect(kind).toBe("ConcurrentModificationFault");
    });

    it("allows value replacement while iterating", () => {
      const m = new HashMap<string, number>(eqString, hashString);
      m.set("a", 1).set("b", 2);
      for (const [k, v] of m) m.put(k, v * 10);
      expect(m.get("a")).toBe(10);
      expect(m.get("b")).toBe(20);
    });

    it("removes through the iterator", () => {
      const m = new HashMap<number, number>(eqNumber, hashNumber);
      for (let i = 0; i < 40; i++) m.put(i, i);
      const iter = m.keys();
      for (let r = iter.next(); r.done !== true; r = iter.next()) {
        if (r.value % 2 === 0) iter.remove();
      }
      expect(m.size).toBe(20);
      expect([...m.keys()].sort((a, b) => a - b)).toEqual(
        Array.from({ length: 20 }, (_, i) => 2 * i + 1)
      );
    });

    it("requires next() before each remove()", () => {
      const m = new HashMap<string, number>(eqString, hashString);
      m.set("a", 1).set("b", 2);
      const iter = m.entries();
      expect(faultKind(() => iter.remove())).toBe("IllegalState");
      iter.next();
      iter.remove();
      expect(faultKind(() => iter.remove())).toBe("IllegalState");
      expect(m.size).toBe(1);
    });
  });

  describe("with custom object keys (hash collisions)", () => {
    interface Pair {
      first: string;
      second: string;
    }

    const eqPair: Eq<Pair> = {
      equals: (a, b) => a.first === b.first && a.second === b.second,
      notEquals: (a, b) => a.first !== b.first || a.second !== b.second,
    };

    // Weak hash to force collisions
    const hashPair: Hash<Pair> = {
      hash: (p) => p.first.length + p.second.length,
    };

    it("handles collisions", () => {
      const m = new HashMap<Pair, string>(eqPair, hashPair);
      m.set({ first: "ab", second: "cd" }, "val1");
      m.set({ first: "ef", second: "gh" }, "val2");

      expect(m.size).toBe(2);
      expect(m.get({ first: "ab", second: "cd" })).toBe("val1");
      expect(m.get({ first: "ef", second: "gh" })).toBe("val2");
    });

    it("removes from the middle of a chain", () => {
      const m = new HashMap<Pair, string>(eqPair, hashPair);
      m.set({ first: "ab", second: "cd" }, "1");
      m.set({ first: "ef", second: "gh" }, "2");
      m.set({ first: "ij", second: "kl" }, "3");
      expect(m.delete({ first: "ef", second: "gh" })).toBe(true);
      expect([...m.values()]).toEqual(["1", "3"]);
    });
  });
});
