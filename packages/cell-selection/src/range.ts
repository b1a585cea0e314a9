/**
 * Half-open `[start, stop)` range over cell indices. When `stop < start` the
 * range runs backwards from the anchor at `start`, covering
 * `start, start - 1, ..., stop + 1`.
 *
 * Transitions compute the *intended* range: they do not clamp, so values may
 * be negative or lie past the last cell. `resolveSelection` and
 * `normalizeSelection` clamp when a concrete cell is needed.
 */
export interface SelectionRange {
  start: number;
  stop: number;
}

export const PAGE_SIZE = 5;

export const isBackward = (range: SelectionRange): boolean =>
  range.stop < range.start;

export const selectFirst = (): SelectionRange => ({ start: 0, stop: 1 });

/**
 * `(N, N+1)`: one past the last index. The render layer clamps this onto the
 * last cell, so keep the arithmetic as is.
 */
export const selectLast = (count: number): SelectionRange => ({
  start: count,
  stop: count + 1,
});

export const selectAll = (count: number): SelectionRange => ({
  start: 0,
  stop: count + 1,
});

export const moveUp = (
  range: SelectionRange,
  cells: number = 1
): SelectionRange => ({
  start: range.start - cells,
  stop: range.start - cells + 1,
});

export const moveDown = (
  range: SelectionRange,
  cells: number = 1
): SelectionRange => ({
  start: range.start + cells,
  stop: range.start + cells + 1,
});

export const extendUp = (range: SelectionRange): SelectionRange => {
  if (range.start - 1 === range.stop) {
    return { start: range.stop, stop: range.start + 1 };
  }
  return { start: range.start - 1, stop: range.stop };
};

export const extendDown = (range: SelectionRange): SelectionRange => {
  if (range.start + 1 === range.stop) {
    return { start: range.stop, stop: range.start - 1 };
  }
  return { start: range.start + 1, stop: range.stop };
};

const clamp = (value: number, lo: number, hi: number) =>
  Math.min(Math.max(value, lo), hi);

/** Inclusive low/high cell indices covered by `range`, unclamped. */
const bounds = (range: SelectionRange): [number, number] => {
  if (isBackward(range)) {
    return [range.stop + 1, range.start];
  }
  // An empty forward range still points at its start cell.
  return [range.start, Math.max(range.start, range.stop - 1)];
};

/**
 * Concrete cell indices, ascending, for `range` over `count` cells. Both
 * edges are clamped into `[0, count)`; an empty notebook selects nothing.
 */
export const resolveSelection = (
  range: SelectionRange,
  count: number
): number[] => {
  if (count <= 0) return [];
  const [lo, hi] = bounds(range);
  const first = clamp(lo, 0, count - 1);
  const last = clamp(hi, 0, count - 1);
  const indices: number[] = [];
  for (let i = first; i <= last; i++) {
    indices.push(i);
  }
  return indices;
};

/**
 * The clamped equivalent of `range`, keeping its direction. Applying it twice
 * gives the same result as applying it once.
 */
export const normalizeSelection = (
  range: SelectionRange,
  count: number
): SelectionRange | undefined => {
  const indices = resolveSelection(range, count);
  const first = indices[0];
  const last = indices[indices.length - 1];
  if (first === undefined || last === undefined) return undefined;
  if (isBackward(range) && first !== last) {
    return { start: last, stop: first - 1 };
  }
  return { start: first, stop: last + 1 };
};
