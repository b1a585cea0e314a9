import {
  PAGE_SIZE,
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
} from "./range.js";

export type SelectionCommand =
  | "select-first"
  | "select-last"
  | "select-all"
  | "move-up"
  | "move-down"
  | "page-up"
  | "page-down"
  | "extend-up"
  | "extend-down";

export const transition = (
  command: SelectionCommand,
  range: SelectionRange,
  count: number
): SelectionRange => {
  switch (command) {
    case "select-first":
      return selectFirst();
    case "select-last":
      return selectLast(count);
    case "select-all":
      return selectAll(count);
    case "move-up":
      return moveUp(range);
    case "move-down":
      return moveDown(range);
    case "page-up":
      return moveUp(range, PAGE_SIZE);
    case "page-down":
      return moveDown(range, PAGE_SIZE);
    case "extend-up":
      return extendUp(range);
    case "extend-down":
      return extendDown(range);
  }
};

/**
 * Holds the intended selection range of a notebook. The cell count is read
 * on demand so the holder never goes stale as cells are added or removed.
 */
export class CellSelection {
  private current: SelectionRange;

  constructor(
    private readonly cellCount: () => number,
    initial: SelectionRange = selectFirst()
  ) {
    this.current = { ...initial };
  }

  get range(): SelectionRange {
    return { ...this.current };
  }

  /** Applies `command`; with no cells the range is left untouched. */
  apply(command: SelectionCommand): SelectionRange {
    const count = this.cellCount();
    if (count > 0) {
      this.current = transition(command, this.current, count);
    }
    return this.range;
  }

  set(range: SelectionRange): void {
    this.current = { ...range };
  }

  /** Selected cell indices, clamped to the current cell count. */
  resolve(): number[] {
    return resolveSelection(this.current, this.cellCount());
  }

  /** Index of the cell the selection is anchored on, if any. */
  anchor(): number | undefined {
    const normalized = normalizeSelection(this.current, this.cellCount());
    return normalized?.start;
  }

  /** Snaps the stored range onto real cells, dropping any overshoot. */
  normalize(): SelectionRange | undefined {
    const normalized = normalizeSelection(this.current, this.cellCount());
    if (normalized) this.current = normalized;
    return normalized;
  }
}
