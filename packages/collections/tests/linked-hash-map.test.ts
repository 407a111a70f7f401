import { describe, it, expect } from "vitest";
import { isFault } from "@corral/scope";
import { eqString, hashString } from "@corral/std";
import { LinkedHashMap } from "../src/linked-hash-map.js";

function faultKind(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    return isFault(error) ? error.kind : `not a fault: ${String(error)}`;
  }
  return undefined;
}

function keysOf<V>(m: LinkedHashMap<string, V>): string[] {
  return [...m.keys()];
}

describe("LinkedHashMap", () => {
  describe("insertion order", () => {
    it("iterates in insertion order", () => {
      const m = new LinkedHashMap<string, number>(eqString, hashString);
      m.set("c", 3).set("a", 1).set("b", 2);
      expect(keysOf(m)).toEqual(["c", "a", "b"]);
      expect([...m.values()]).toEqual([3, 1, 2]);
      expect([...m.entries()]).toEqual([
        ["c", 3],
        ["a", 1],
        ["b", 2],
      ]);
    });

    it("keeps the position of a re-put key", () => {
      const m = new LinkedHashMap<string, number>(eqString, hashString);
      m.set("a", 1).set("b", 2).set("c", 3);
      expect(m.put("a", 10)).toBe(1);
      expect(keysOf(m)).toEqual(["a", "b", "c"]);
      expect(m.get("a")).toBe(10);
    });

    it("does not reorder on get", () => {
      const m = new LinkedHashMap<string, number>(eqString, hashString);
      m.set("a", 1).set("b", 2);
      const g = m.generation;
      m.get("a");
      expect(keysOf(m)).toEqual(["a", "b"]);
      expect(m.generation).toBe(g);
    });

    it("unlinks removed keys", () => {
      const m = new LinkedHashMap<string, number>(eqString, hashString);
      m.set("a", 1).set("b", 2).set("c", 3);
      m.delete("b");
      expect(keysOf(m)).toEqual(["a", "c"]);
      m.delete("a");
      m.delete("c");
      expect(keysOf(m)).toEqual([]);
      expect(m.first()).toBeUndefined();
      expect(m.last()).toBeUndefined();
    });

    it("keeps order across resizes", () => {
      const m = new LinkedHashMap<string, number>(eqString, hashString, { initialCapacity: 1 });
      const keys = ["k9", "k2", "k7", "k4", "k1", "k8", "k3", "k6", "k5", "k0"];
      keys.forEach((k, i) => m.put(k, i));
      expect(keysOf(m)).toEqual(keys);
    });

    it("clear empties the order list", () => {
      const m = new LinkedHashMap<string, number>(eqString, hashString);
      m.set("a", 1).set("b", 2);
      m.clear();
      m.set("z", 26);
      expect(keysOf(m)).toEqual(["z"]);
      expect(m.first()).toEqual(["z", 26]);
    });
  });

  describe("access order", () => {
    function mkLru(): LinkedHashMap<string, number> {
      const m = new LinkedHashMap<string, number>(eqString, hashString, { order: "access" });
      m.set("a", 1).set("b", 2).set("c", 3);
      return m;
    }

    it("moves a key to the end when it is read", () => {
      const m = mkLru();
      expect(m.get("a")).toBe(1);
      expect(keysOf(m)).toEqual(["b", "c", "a"]);
      expect(m.last()).toEqual(["a", 1]);
    });

    it("counts getOrElse, getOrThrow and re-put as accesses", () => {
      const m = mkLru();
      m.getOrElse("a", 0);
      expect(keysOf(m)).toEqual(["b", "c", "a"]);
      m.getOrThrow("b");
      expect(keysOf(m)).toEqual(["c", "a", "b"]);
      m.put("c", 30);
      expect(keysOf(m)).toEqual(["a", "b", "c"]);
    });

    it("does not count has or misses", () => {
      const m = mkLru();
      m.has("a");
      m.get("missing");
      expect(keysOf(m)).toEqual(["a", "b", "c"]);
    });

    it("treats a reorder as structural", () => {
      const m = mkLru();
      const g = m.generation;
      m.get("c");
      expect(m.generation).toBe(g);
      m.get("a");
      expect(m.generation).toBe(g + 1);
    });

    it("fails an iteration that reads out of order", () => {
      const m = mkLru();
      const kind = faultKind(() => {
        for (const k of m.keys()) m.get(k);
      });
      expect(kind).toBe("ConcurrentModificationFault");
    });

    it("evicts the least recently used entry with pollFirst", () => {
      const m = mkLru();
      m.get("a");
      m.put("d", 4);
      if (m.size > 3) m.pollFirst();
      expect(keysOf(m)).toEqual(["c", "a", "d"]);
    });
  });

  describe("pollFirst", () => {
    it("removes entries eldest first", () => {
      const m = new LinkedHashMap<string, number>(eqString, hashString);
      m.set("x", 1).set("y", 2);
      expect(m.pollFirst()).toEqual(["x", 1]);
      expect(m.pollFirst()).toEqual(["y", 2]);
      expect(m.pollFirst()).toBeUndefined();
      expect(m.size).toBe(0);
    });
  });

  describe("iterator remove", () => {
    it("unlinks through the iterator and keeps walking", () => {
      const m = new LinkedHashMap<string, number>(eqString, hashString);
      m.set("a", 1).set("b", 2).set("c", 3).set("d", 4);
      const iter = m.entries();
      const visited: string[] = [];
      for (let r = iter.next(); r.done !== true; r = iter.next()) {
        visited.push(r.value[0]);
        if (r.value[1] % 2 === 0) iter.remove();
      }
      expect(visited).toEqual(["a", "b", "c", "d"]);
      expect(keysOf(m)).toEqual(["a", "c"]);
    });
  });
});
