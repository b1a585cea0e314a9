import { describe, expect, it } from "vitest";
import {
  extendDown,
  extendUp,
  moveDown,
  moveUp,
  normalizeSelection,
  resolveSelection,
  selectAll,
  selectFirst,
  selectLast,
  type SelectionRange,
} from "../src/range.js";

const repeat = (
  range: SelectionRange,
  times: number,
  step: (range: SelectionRange) => SelectionRange
): SelectionRange[] => {
  const seen: SelectionRange[] = [];
  let current = range;
  for (let i = 0; i < times; i++) {
    current = step(current);
    seen.push(current);
  }
  return seen;
};

describe("selection transitions", () => {
  it("selects first, last and all", () => {
    expect(selectFirst()).toEqual({ start: 0, stop: 1 });
    expect(selectLast(10)).toEqual({ start: 10, stop: 11 });
    expect(selectAll(10)).toEqual({ start: 0, stop: 11 });
  });

  it("returns (0, 1) after select-all then select-first for any size", () => {
    for (let n = 1; n <= 12; n++) {
      selectAll(n);
      expect(selectFirst()).toEqual({ start: 0, stop: 1 });
    }
  });

  it("moves by one and by a page", () => {
    expect(moveUp({ start: 4, stop: 5 })).toEqual({ start: 3, stop: 4 });
    expect(moveDown({ start: 4, stop: 5 })).toEqual({ start: 5, stop: 6 });
    expect(moveUp({ start: 7, stop: 8 }, 5)).toEqual({ start: 2, stop: 3 });
    expect(moveDown({ start: 2, stop: 3 }, 5)).toEqual({ start: 7, stop: 8 });
  });

  it("returns to the start when moving down then up without clamping", () => {
    for (let k = 1; k < 9; k++) {
      const range = { start: k, stop: k + 1 };
      expect(moveUp(moveDown(range))).toEqual(range);
    }
  });

  it("keeps overshoot past the top instead of clamping", () => {
    expect(moveUp({ start: 0, stop: 1 })).toEqual({ start: -1, stop: 0 });
    expect(moveUp({ start: 1, stop: 2 }, 5)).toEqual({ start: -4, stop: -3 });
  });

  it("grows a forward range upwards without flipping", () => {
    expect(repeat({ start: 5, stop: 6 }, 3, extendUp)).toEqual([
      { start: 4, stop: 6 },
      { start: 3, stop: 6 },
      { start: 2, stop: 6 },
    ]);
  });

  it("flips a backward range exactly once when extending up", () => {
    const steps = repeat({ start: 7, stop: 5 }, 5, extendUp);
    expect(steps).toEqual([
      { start: 6, stop: 5 },
      { start: 5, stop: 7 },
      { start: 4, stop: 7 },
      { start: 3, stop: 7 },
      { start: 2, stop: 7 },
    ]);
    const flips = steps.filter((range, i) => {
      const prev = i === 0 ? { start: 7, stop: 5 } : steps[i - 1];
      return prev !== undefined && prev.stop !== range.stop;
    });
    expect(flips).toHaveLength(1);
  });

  it("mirrors the flip when extending down", () => {
    expect(extendDown({ start: 3, stop: 4 })).toEqual({ start: 4, stop: 2 });
    expect(extendDown({ start: 4, stop: 2 })).toEqual({ start: 5, stop: 2 });
    expect(extendDown({ start: 3, stop: 1 })).toEqual({ start: 4, stop: 1 });
  });

  it("extends up from the select-last sentinel", () => {
    const last = selectLast(10);
    expect(last).toEqual({ start: 10, stop: 11 });
    expect(repeat(last, 5, extendUp)).toEqual([
      { start: 9, stop: 11 },
      { start: 8, stop: 11 },
      { start: 7, stop: 11 },
      { start: 6, stop: 11 },
      { start: 5, stop: 11 },
    ]);
  });
});

describe("resolveSelection", () => {
  it("maps the select-last sentinel onto the last real cell", () => {
    expect(resolveSelection(selectLast(10), 10)).toEqual([9]);
  });

  it("covers every cell for select-all", () => {
    expect(resolveSelection(selectAll(4), 4)).toEqual([0, 1, 2, 3]);
  });

  it("clamps ranges that grew past the last cell", () => {
    expect(resolveSelection({ start: 5, stop: 11 }, 10)).toEqual([
      5, 6, 7, 8, 9,
    ]);
  });

  it("resolves backward ranges in ascending order", () => {
    expect(resolveSelection({ start: 4, stop: 2 }, 10)).toEqual([3, 4]);
  });

  it("clamps negative ranges to the first cell", () => {
    expect(resolveSelection({ start: -4, stop: -3 }, 10)).toEqual([0]);
  });

  it("selects nothing in an empty notebook", () => {
    expect(resolveSelection(selectFirst(), 0)).toEqual([]);
    expect(normalizeSelection(selectFirst(), 0)).toBeUndefined();
  });
});

describe("normalizeSelection", () => {
  it("is idempotent and keeps direction", () => {
    const backward = normalizeSelection({ start: 12, stop: 3 }, 10);
    expect(backward).toEqual({ start: 9, stop: 3 });
    expect(backward && normalizeSelection(backward, 10)).toEqual(backward);

    const forward = normalizeSelection({ start: -3, stop: -2 }, 5);
    expect(forward).toEqual({ start: 0, stop: 1 });
    expect(forward && normalizeSelection(forward, 5)).toEqual(forward);
  });

  it("snaps the select-last sentinel onto the last cell", () => {
    expect(normalizeSelection(selectLast(10), 10)).toEqual({
      start: 9,
      stop: 10,
    });
  });
});
