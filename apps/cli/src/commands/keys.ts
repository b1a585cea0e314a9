import type { Command } from "commander";
import chalk from "chalk";
import {
  CommandRegistry,
  registerNotebookCommands,
  type EditorState,
  type KeyBindingEntry,
} from "@cellterm/commands";
import { createLogger } from "@cellterm/log-queue";

export interface KeyBindingGroup {
  group: string;
  rows: Array<{ keys: string; title: string }>;
}

/** Groups bindings in first-seen order, keeping each group's key order. */
export const groupKeyBindings = (entries: KeyBindingEntry[]): KeyBindingGroup[] => {
  const groups = new Map<string, KeyBindingGroup>();
  for (const entry of entries) {
    let group = groups.get(entry.group);
    if (!group) {
      group = { group: entry.group, rows: [] };
      groups.set(entry.group, group);
    }
    group.rows.push({ keys: entry.keys, title: entry.title });
  }
  return [...groups.values()];
};

export const formatKeyBindingRows = (group: KeyBindingGroup): string[] => {
  const width = Math.max(0, ...group.rows.map((row) => row.keys.length));
  return group.rows.map((row) => `  ${row.keys.padEnd(width)}  ${row.title}`);
};

// Nothing is open from the command line; every command reads as inactive.
const detachedState: EditorState = {
  tab: () => undefined,
  focus: () => ({ notebook: false, cell: false, buffer: false, output: false }),
};

export const createDefaultRegistry = (): CommandRegistry => {
  const registry = new CommandRegistry(detachedState, {
    logger: createLogger("commands"),
  });
  registerNotebookCommands(registry);
  return registry;
};

export const registerKeysCommand = (program: Command) => {
  program
    .command("keys")
    .description("List the notebook key bindings")
    .action(() => {
      const registry = createDefaultRegistry();
      for (const group of groupKeyBindings(registry.keyBindings())) {
        console.log(chalk.bold(group.group));
        for (const line of formatKeyBindingRows(group)) {
          console.log(line);
        }
      }
    });
};
