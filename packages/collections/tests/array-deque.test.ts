import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { config } from "@corral/core";
import { isFault } from "@corral/scope";
import { ArrayDeque } from "../src/array-deque.js";

function faultKind(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    return isFault(error) ? error.kind : `not a fault: ${String(error)}`;
  }
  return undefined;
}

describe("ArrayDeque", () => {
  beforeEach(() => {
    config.reset();
  });

  afterEach(() => {
    vi.restoreAllMocks();
    config.reset();
  });

  it("adds and removes at both ends", () => {
    const d = new ArrayDeque<number>();
    d.addLast(2);
    d.addFirst(1);
    d.addLast(3);
    expect(d.toArray()).toEqual([1, 2, 3]);
    expect(d.peekFirst()).toBe(1);
    expect(d.peekLast()).toBe(3);
    expect(d.pollFirst()).toBe(1);
    expect(d.pollLast()).toBe(3);
    expect(d.toArray()).toEqual([2]);
  });

  it("answers undefined or NotFound when empty", () => {
    const d = new ArrayDeque<number>();
    expect(d.pollFirst()).toBeUndefined();
    expect(d.pollLast()).toBeUndefined();
    expect(d.peekFirst()).toBeUndefined();
    expect(d.peekLast()).toBeUndefined();
    expect(faultKind(() => d.removeFirst())).toBe("NotFound");
    expect(faultKind(() => d.removeLast())).toBe("NotFound");
    expect(faultKind(() => d.getFirst())).toBe("NotFound");
    expect(faultKind(() => d.getLast())).toBe("NotFound");
  });

  it("works as a queue", () => {
    const d = new ArrayDeque<string>();
    d.offer("a");
    d.offer("b");
    expect(d.peek()).toBe("a");
    expect(d.poll()).toBe("a");
    expect(d.poll()).toBe("b");
    expect(d.poll()).toBeUndefined();
  });

  it("works as a stack", () => {
    const d = new ArrayDeque<string>();
    d.push("a");
    d.push("b");
    expect(d.pop()).toBe("b");
    expect(d.pop()).toBe("a");
    expect(faultKind(() => d.pop())).toBe("NotFound");
  });

  it("rounds the initial capacity up to a power of two", () => {
    expect(new ArrayDeque<number>().capacity).toBe(16);
    expect(new ArrayDeque<number>({ initialCapacity: 5 }).capacity).toBe(8);
    expect(new ArrayDeque<number>({ initialCapacity: 0 }).capacity).toBe(1);
  });

  it("keeps order when growing across the wrap point", () => {
    const d = new ArrayDeque<number>({ initialCapacity: 4 });
    d.addLast(1);
    d.addLast(2);
    d.pollFirst();
    d.addLast(3);
    d.addLast(4);
    d.addLast(5);
    expect(d.capacity).toBe(4);
    expect(d.toArray()).toEqual([2, 3, 4, 5]);
    d.addFirst(0);
    expect(d.capacity).toBe(8);
    expect(d.toArray()).toEqual([0, 2, 3, 4, 5]);
    expect(d.getFirst()).toBe(0);
    expect(d.getLast()).toBe(5);
  });

  it("logs growth at debug level", () => {
    config.set({ log: { level: "debug" } });
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const d = new ArrayDeque<number>({ initialCapacity: 2 });
    d.addLast(1);
    d.addLast(2);
    d.addLast(3);
    expect(debug).toHaveBeenCalledWith("[corral/collections] resized deque from 2 to 4 slots");
  });

  it("get reads from the head", () => {
    const d = new ArrayDeque<string>({ initialCapacity: 2 });
    d.addLast("b");
    d.addFirst("a");
    d.addLast("c");
    expect(d.get(0)).toBe("a");
    expect(d.get(2)).toBe("c");
    expect(faultKind(() => d.get(3))).toBe("IndexOutOfBounds");
  });

  describe("bound", () => {
    it("offer refuses and add fails at the bound", () => {
      const d = new ArrayDeque<number>({ bound: 2 });
      expect(d.offerLast(1)).toBe(true);
      expect(d.offerFirst(0)).toBe(true);
      expect(d.offerLast(2)).toBe(false);
      expect(d.offerFirst(-1)).toBe(false);
      expect(faultKind(() => d.addLast(2))).toBe("CapacityOverflowFault");
      expect(faultKind(() => d.addFirst(2))).toBe("CapacityOverflowFault");
      expect(d.toArray()).toEqual([0, 1]);
    });

    it("drops the oldest to make room", () => {
      const history = new ArrayDeque<string>({ bound: 3 });
      for (const command of ["ls", "cd", "pwd", "cat"]) {
        if (!history.offerLast(command)) {
          history.pollFirst();
          history.offerLast(command);
        }
      }
      expect(history.toArray()).toEqual(["cd", "pwd", "cat"]);
    });
  });

  it("clear keeps the buffer size", () => {
    const d = new ArrayDeque<number>({ initialCapacity: 4 });
    for (let i = 0; i < 6; i++) d.addLast(i);
    d.clear();
    expect(d.size).toBe(0);
    expect(d.capacity).toBe(8);
    d.addFirst(9);
    expect(d.toArray()).toEqual([9]);
  });

  describe("iteration", () => {
    function wrapped(): ArrayDeque<number> {
      const d = new ArrayDeque<number>({ initialCapacity: 8 });
      for (let i = 3; i < 7; i++) d.addLast(i);
      for (let i = 2; i >= 0; i--) d.addFirst(i);
      return d;
    }

    it("walks head to tail and back", () => {
      const d = wrapped();
      expect([...d]).toEqual([0, 1, 2, 3, 4, 5, 6]);
      expect([...d.descendingIterator()]).toEqual([6, 5, 4, 3, 2, 1, 0]);
    });

    it("removes through the iterator across the wrap point", () => {
      const d = wrapped();
      const iter = d.iterator();
      for (let r = iter.next(); r.done !== true; r = iter.next()) {
        if (r.value % 2 === 0) iter.remove();
      }
      expect(d.toArray()).toEqual([1, 3, 5]);
      expect(d.peekFirst()).toBe(1);
      expect(d.peekLast()).toBe(5);
    });

    it("removes through the descending iterator", () => {
      const d = wrapped();
      const iter = d.descendingIterator();
      const visited: number[] = [];
      for (let r = iter.next(); r.done !== true; r = iter.next()) {
        visited.push(r.value);
        if (r.value > 3) iter.remove();
      }
      expect(visited).toEqual([6, 5, 4, 3, 2, 1, 0]);
      expect(d.toArray()).toEqual([0, 1, 2, 3]);
    });

    it("keeps answering done once exhausted", () => {
      const d = wrapped();
      const iter = d.descendingIterator();
      while (iter.next().done !== true);
      d.pollFirst();
      expect(iter.next().done).toBe(true);
    });

    it("fails fast on structural change", () => {
      const d = wrapped();
      const kind = faultKind(() => {
        for (const n of d) if (n === 2) d.pollLast();
      });
      expect(kind).toBe("ConcurrentModificationFault");
    });
  });
});
