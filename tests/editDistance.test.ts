import { describe, expect, it } from "vitest";
import { computeEditScript, editDistance } from "../src/core/diff/editDistance.js";
import { applyPatch } from "../src/core/patch/patchApplier.js";

const lcsLength = (left: string[], right: string[]): number => {
  let previous = new Array<number>(right.length + 1).fill(0);
  for (const item of left) {
    const current = [0];
    right.forEach((other, j) => {
      current.push(item === other ? previous[j] + 1 : Math.max(previous[j + 1], current[j]));
    });
    previous = current;
  }
  return previous[right.length];
};

const seededLines = (seed: number) => {
  let state = seed;
  const next = (): number => {
    state = (state * 48271) % 2147483647;
    return state;
  };
  return (maxLength: number): string[] =>
    Array.from({ length: next() % (maxLength + 1) }, () => ["a", "b", "c", "d"][next() % 4]);
};

describe("computeEditScript", () => {
  it("returns an empty script for equal inputs", () => {
    expect(computeEditScript(["a", "b", "c"], ["a", "b", "c"])).toEqual([]);
    expect(computeEditScript([], [])).toEqual([]);
  });

  it("adds every line of a new file", () => {
    expect(computeEditScript([], ["x", "y"])).toEqual([
      { type: "add", index: 0, value: "x" },
      { type: "add", index: 1, value: "y" },
    ]);
  });

  it("removes every line of an emptied file", () => {
    expect(computeEditScript(["x", "y"], [])).toEqual([
      { type: "remove", index: 0, value: "x" },
      { type: "remove", index: 1, value: "y" },
    ]);
  });

  it("removes the changed line and adds the appended one", () => {
    expect(computeEditScript(["foo", "bar", "baz"], ["foo", "baz", "qux"])).toEqual([
      { type: "remove", index: 1, value: "bar" },
      { type: "add", index: 2, value: "qux" },
    ]);
  });

  it("prefers removal when removing and adding cost the same", () => {
    expect(computeEditScript(["x", "y"], ["y", "x"])).toEqual([
      { type: "add", index: 0, value: "y" },
      { type: "remove", index: 1, value: "y" },
    ]);
  });

  it("lists the addition before the removal for a replaced line", () => {
    expect(computeEditScript(["line 1", "old", "line 3"], ["line 1", "new", "line 3"])).toEqual([
      { type: "add", index: 1, value: "new" },
      { type: "remove", index: 1, value: "old" },
    ]);
  });

  it("uses the supplied equality", () => {
    const caseInsensitive = (left: string, right: string): boolean => left.toLowerCase() === right.toLowerCase();
    expect(computeEditScript(["Alpha", "Beta"], ["alpha", "beta"], caseInsensitive)).toEqual([]);
  });

  it("works over characters", () => {
    expect(editDistance([..."dif"], [..."diff"])).toBe(1);
    expect(editDistance([..."halp"], [..."help"])).toBe(2);
  });

  it("matches the insert/delete distance and round-trips on generated inputs", () => {
    const lines = seededLines(42);
    for (let run = 0; run < 60; run++) {
      const source = lines(8);
      const target = lines(8);
      const script = computeEditScript(source, target);
      expect(script.length).toBe(source.length + target.length - 2 * lcsLength(source, target));
      expect(script.length).toBeLessThanOrEqual(source.length + target.length);
      expect(applyPatch(source, script)).toEqual(target);
    }
  });
});
