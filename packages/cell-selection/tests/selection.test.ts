import { describe, expect, it } from "vitest";
import { CellSelection, transition } from "../src/selection.js";

describe("CellSelection", () => {
  it("applies commands against the live cell count", () => {
    let count = 10;
    const selection = new CellSelection(() => count);
    expect(selection.range).toEqual({ start: 0, stop: 1 });

    selection.apply("select-last");
    expect(selection.range).toEqual({ start: 10, stop: 11 });
    expect(selection.resolve()).toEqual([9]);

    count = 3;
    expect(selection.resolve()).toEqual([2]);
    selection.apply("select-all");
    expect(selection.range).toEqual({ start: 0, stop: 4 });
  });

  it("treats commands as no-ops in an empty notebook", () => {
    const selection = new CellSelection(() => 0);
    for (const command of ["move-down", "extend-up", "select-last"] as const) {
      expect(selection.apply(command)).toEqual({ start: 0, stop: 1 });
    }
    expect(selection.resolve()).toEqual([]);
    expect(selection.anchor()).toBeUndefined();
    expect(selection.normalize()).toBeUndefined();
  });

  it("pages through the notebook", () => {
    const selection = new CellSelection(() => 20, { start: 2, stop: 3 });
    selection.apply("page-down");
    expect(selection.range).toEqual({ start: 7, stop: 8 });
    selection.apply("page-up");
    selection.apply("page-up");
    expect(selection.range).toEqual({ start: -3, stop: -2 });
    expect(selection.anchor()).toBe(0);
    expect(selection.normalize()).toEqual({ start: 0, stop: 1 });
    expect(selection.range).toEqual({ start: 0, stop: 1 });
  });

  it("does not share range objects with callers", () => {
    const selection = new CellSelection(() => 5);
    const range = selection.range;
    range.start = 4;
    expect(selection.range).toEqual({ start: 0, stop: 1 });
  });

  it("dispatches every command to its transition", () => {
    const range = { start: 3, stop: 4 };
    expect(transition("move-up", range, 10)).toEqual({ start: 2, stop: 3 });
    expect(transition("move-down", range, 10)).toEqual({ start: 4, stop: 5 });
    expect(transition("extend-up", range, 10)).toEqual({ start: 2, stop: 4 });
    expect(transition("extend-down", range, 10)).toEqual({ start: 4, stop: 2 });
    expect(transition("select-first", range, 10)).toEqual({ start: 0, stop: 1 });
  });
});
