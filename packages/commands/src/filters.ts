import type { NotebookTab } from "@cellterm/kernel-tab";

export interface FocusState {
  /** A notebook is the active document. */
  notebook: boolean;
  /** A cell, rather than the notebook chrome, has focus. */
  cell: boolean;
  /** A text buffer is being edited. */
  buffer: boolean;
  /** A cell's output area has focus. */
  output: boolean;
}

export interface EditorState {
  tab(): NotebookTab | undefined;
  focus(): FocusState;
}

export type Filter = (state: EditorState) => boolean;

export const always: Filter = () => true;

export const and =
  (...filters: Filter[]): Filter =>
  (state) =>
    filters.every((filter) => filter(state));

export const or =
  (...filters: Filter[]): Filter =>
  (state) =>
    filters.some((filter) => filter(state));

export const not =
  (filter: Filter): Filter =>
  (state) =>
    !filter(state);

export const notebookHasFocus: Filter = (state) =>
  state.focus().notebook && state.tab() !== undefined;

export const cellHasFocus: Filter = (state) =>
  notebookHasFocus(state) && state.focus().cell;

export const bufferHasFocus: Filter = (state) => state.focus().buffer;

export const cellOutputHasFocus: Filter = (state) => state.focus().output;

export const multipleCellsSelected: Filter = (state) =>
  (state.tab()?.selection.resolve().length ?? 0) > 1;

/** Notebook focused, not typing into a buffer or an output. */
export const notebookCommandMode: Filter = and(
  notebookHasFocus,
  not(bufferHasFocus),
  not(cellOutputHasFocus)
);
