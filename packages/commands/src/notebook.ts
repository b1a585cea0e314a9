import type { SelectionCommand } from "@cellterm/cell-selection";
import {
  and,
  bufferHasFocus,
  cellHasFocus,
  not,
  notebookCommandMode,
  notebookHasFocus,
} from "./filters.js";
import type { CommandRegistry, CommandSpec, KeyBinding } from "./registry.js";

const GROUP = "notebook";

const navigationMode = and(notebookHasFocus, not(bufferHasFocus));

const navigation = (
  name: string,
  description: string,
  command: SelectionCommand,
  keys: KeyBinding[]
): CommandSpec => ({
  name,
  description,
  keys,
  filter: navigationMode,
  group: GROUP,
  handler: (state) => {
    state.tab()?.selection.apply(command);
  },
});

export const notebookCommands: CommandSpec[] = [
  {
    name: "run-selected-cells",
    description: "Run or render the current cells.",
    keys: ["c-enter", "c-e"],
    filter: cellHasFocus,
    group: GROUP,
    handler: async (state) => {
      await state.tab()?.runSelectedCells();
    },
  },
  {
    name: "run-selected-cells-and-select-next-cell",
    description: "Run or render the current cells and select the next cell.",
    keys: ["s-enter", "c-r"],
    filter: cellHasFocus,
    group: GROUP,
    handler: async (state) => {
      await state.tab()?.runSelectedCells({ advance: true });
    },
  },
  {
    name: "run-all-cells",
    description: "Run or render all the cells in the current notebook.",
    filter: notebookHasFocus,
    group: GROUP,
    handler: async (state) => {
      await state.tab()?.runAll();
    },
  },
  {
    name: "interrupt-kernel",
    description: "Interrupt the notebook's kernel.",
    keys: [["I", "I"]],
    filter: notebookCommandMode,
    group: GROUP,
    handler: (state) => {
      state.tab()?.interruptKernel();
    },
  },
  {
    name: "restart-kernel",
    description: "Restart the notebook's kernel.",
    keys: [["0", "0"]],
    filter: notebookCommandMode,
    group: GROUP,
    handler: (state) => {
      state.tab()?.restartKernel();
    },
  },
  {
    name: "change-kernel",
    description: "Change the notebook's kernel.",
    filter: notebookCommandMode,
    group: GROUP,
    handler: async (state) => {
      await state.tab()?.changeKernel();
    },
  },
  navigation("select-first-cell", "Select the first cell in the notebook.", "select-first", [
    "home",
    "c-up",
  ]),
  navigation("select-5th-previous-cell", "Go up 5 cells.", "page-up", ["pageup"]),
  navigation("select-previous-cell", "Go up one cell.", "move-up", ["up", "k"]),
  navigation(
    "extend-cell-selection-up",
    "Extend the cell selection up one cell.",
    "extend-up",
    ["s-up", "K"]
  ),
  navigation(
    "extend-cell-selection-down",
    "Extend the cell selection down one cell.",
    "extend-down",
    ["s-down", "J"]
  ),
  navigation("select-next-cell", "Select the next cell.", "move-down", ["down", "j"]),
  navigation("select-5th-next-cell", "Go down 5 cells.", "page-down", ["pagedown"]),
  navigation("select-last-cell", "Select the last cell in the notebook.", "select-last", [
    "end",
    "c-down",
  ]),
  navigation("select-all-cells", "Select all cells in the notebook.", "select-all", ["c-a"]),
];

export const registerNotebookCommands = (registry: CommandRegistry): void => {
  for (const spec of notebookCommands) {
    registry.add(spec);
  }
};
