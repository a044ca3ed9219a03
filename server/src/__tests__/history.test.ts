// @vitest-environment node
import { describe, it, expect } from "vitest";
import { UndoHistory } from "../history";

describe("UndoHistory", () => {
  it("pops entries in reverse push order", () => {
    const history = new UndoHistory<string>(3);
    history.push("a");
    history.push("b");

    expect(history.pop()).toBe("b");
    expect(history.pop()).toBe("a");
    expect(history.pop()).toBeUndefined();
  });

  it("evicts the oldest entry once full", () => {
    const history = new UndoHistory<number>(3);
    expect(history.push(1)).toBeUndefined();
    history.push(2);
    history.push(3);

    expect(history.push(4)).toBe(1);
    expect(history.size).toBe(3);
    expect([history.pop(), history.pop(), history.pop(), history.pop()]).toEqual([4, 3, 2, undefined]);
  });

  it("never grows past its capacity", () => {
    const history = new UndoHistory<number>(2);
    for (let i = 0; i < 10; i += 1) {
      history.push(i);
      expect(history.size).toBeLessThanOrEqual(2);
    }
    expect([history.pop(), history.pop(), history.pop()]).toEqual([9, 8, undefined]);
  });

  it("keeps order when pushes and pops interleave across the wrap point", () => {
    const history = new UndoHistory<string>(2);
    history.push("a");
    history.push("b");
    history.push("c");
    expect(history.pop()).toBe("c");
    history.push("d");

    expect(history.peek()).toBe("d");
    expect([history.pop(), history.pop(), history.pop()]).toEqual(["d", "b", undefined]);
  });

  it("peek does not remove the entry", () => {
    const history = new UndoHistory<string>(1);
    history.push("only");

    expect(history.peek()).toBe("only");
    expect(history.size).toBe(1);
  });

  it("retains nothing with capacity 0", () => {
    const history = new UndoHistory<string>(0);
    expect(history.push("x")).toBe("x");
    expect(history.size).toBe(0);
    expect(history.pop()).toBeUndefined();
  });

  it("rejects a negative capacity", () => {
    expect(() => new UndoHistory(-1)).toThrow(RangeError);
  });
});
