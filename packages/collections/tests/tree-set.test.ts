import { describe, it, expect } from "vitest";
import { isFault } from "@corral/scope";
import { ordBy, ordNumber, ordString, reverseOrd } from "@corral/std";
import { TreeSet } from "../src/tree-set.js";

function faultKind(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    return isFault(error) ? error.kind : `not a fault: ${String(error)}`;
  }
  return undefined;
}

describe("TreeSet", () => {
  it("keeps its keys sorted", () => {
    const s = new TreeSet<number>(ordNumber);
    s.add(5);
    s.add(1);
    s.add(10);
    expect(s.toArray()).toEqual([1, 5, 10]);
    expect(s.floor(6)).toBe(5);
    expect(s.ceiling(6)).toBe(10);
  });

  it("holds NaN as a distinct key", () => {
    const s = TreeSet.of(ordNumber, 1, 5, 10).add(NaN).add(NaN);
    expect(s.size).toBe(4);
    expect(s.has(NaN)).toBe(true);
    expect(s.toArray()).toEqual([1, 5, 10, NaN]);
    expect(s.ceiling(11)).toBeNaN();
    expect(s.floor(11)).toBe(10);
  });

  it("of builds from keys", () => {
    const s = TreeSet.of(ordString, "pear", "apple", "fig", "apple");
    expect(s.size).toBe(3);
    expect([...s]).toEqual(["apple", "fig", "pear"]);
  });

  it("tryAdd and insert report duplicates", () => {
    const s = TreeSet.of(ordNumber, 1, 2);
    expect(s.tryAdd(3)).toBe(true);
    expect(s.tryAdd(3)).toBe(false);
    expect(faultKind(() => s.insert(2))).toBe("DuplicateKeyViolation");
    expect(s.size).toBe(3);
  });

  it("navigates", () => {
    const s = TreeSet.of(ordNumber, 10, 20, 30);
    expect(s.first()).toBe(10);
    expect(s.last()).toBe(30);
    expect(s.higher(20)).toBe(30);
    expect(s.lower(20)).toBe(10);
    expect(s.floor(5)).toBeUndefined();
    expect(s.ceiling(31)).toBeUndefined();
  });

  it("polls from both ends", () => {
    const s = TreeSet.of(ordNumber, 3, 1, 2);
    expect(s.pollFirst()).toBe(1);
    expect(s.pollLast()).toBe(3);
    expect(s.toArray()).toEqual([2]);
    s.clear();
    expect(s.pollFirst()).toBeUndefined();
    expect(s.isEmpty()).toBe(true);
  });

  it("iterates descending", () => {
    const s = TreeSet.of(ordNumber, 4, 8, 2, 6);
    expect([...s.descending()]).toEqual([8, 6, 4, 2]);
  });

  it("follows the ordering it was given", () => {
    const s = TreeSet.of(reverseOrd(ordNumber), 4, 8, 2, 6);
    expect(s.toArray()).toEqual([8, 6, 4, 2]);
  });

  it("treats keys the ordering finds equal as one key", () => {
    const byLength = ordBy((w: string) => w.length, ordNumber);
    const s = TreeSet.of(byLength, "ab", "cd", "xyz");
    expect(s.toArray()).toEqual(["ab", "xyz"]);
    expect(s.has("zz")).toBe(true);
  });

  it("delete", () => {
    const s = TreeSet.of(ordNumber, 1, 2, 3);
    expect(s.delete(2)).toBe(true);
    expect(s.delete(2)).toBe(false);
    expect(s.toArray()).toEqual([1, 3]);
    expect(s.validate()).toBeGreaterThan(0);
  });

  it("removes through its iterator", () => {
    const s = TreeSet.of(ordNumber, 1, 2, 3, 4, 5, 6);
    const iter = s.iterator();
    for (let r = iter.next(); r.done !== true; r = iter.next()) {
      if (r.value % 2 === 1) iter.remove();
    }
    expect(s.toArray()).toEqual([2, 4, 6]);
  });

  it("fails fast on modification during iteration", () => {
    const s = TreeSet.of(ordNumber, 1, 2, 3);
    const kind = faultKind(() => {
      for (const k of s) if (k === 1) s.delete(3);
    });
    expect(kind).toBe("ConcurrentModificationFault");
  });
});
