import type { Logger } from "pino";
import { createLogger } from "@cellterm/log-queue";
import { always, type EditorState, type Filter } from "./filters.js";

/** A single key (`"c-enter"`) or a sequence pressed in turn (`["I", "I"]`). */
export type KeyBinding = string | string[];

export type CommandHandler = (state: EditorState) => void | Promise<void>;

export interface CommandSpec {
  name: string;
  title?: string;
  description?: string;
  keys?: KeyBinding[];
  filter?: Filter;
  group?: string;
  handler: CommandHandler;
}

export interface Command {
  name: string;
  title: string;
  description?: string;
  keys: string[][];
  filter: Filter;
  group: string;
  handler: CommandHandler;
}

export interface KeyBindingEntry {
  keys: string;
  name: string;
  title: string;
  group: string;
}

export class DuplicateCommandError extends Error {
  constructor(public readonly commandName: string) {
    super(`Command "${commandName}" is already registered`);
    this.name = "DuplicateCommandError";
  }
}

export const titleFromName = (name: string): string => {
  const words = name.split("-").join(" ");
  return words.charAt(0).toUpperCase() + words.slice(1);
};

export const formatKeys = (keys: string[]): string => keys.join(" ");

/** Named commands with key bindings and activation filters. */
export class CommandRegistry {
  private readonly commands = new Map<string, Command>();
  private readonly log: Logger;

  constructor(
    private readonly state: EditorState,
    options: { logger?: Logger } = {}
  ) {
    this.log = options.logger ?? createLogger("commands");
  }

  add(spec: CommandSpec): Command {
    if (this.commands.has(spec.name)) {
      throw new DuplicateCommandError(spec.name);
    }
    const command: Command = {
      name: spec.name,
      title: spec.title ?? titleFromName(spec.name),
      description: spec.description,
      keys: (spec.keys ?? []).map((binding) =>
        typeof binding === "string" ? [binding] : [...binding]
      ),
      filter: spec.filter ?? always,
      group: spec.group ?? "general",
      handler: spec.handler,
    };
    this.commands.set(command.name, command);
    return command;
  }

  get(name: string): Command | undefined {
    return this.commands.get(name);
  }

  list(group?: string): Command[] {
    const commands = [...this.commands.values()];
    return group ? commands.filter((command) => command.group === group) : commands;
  }

  /** Whether the command exists and its filter currently passes. */
  isActive(name: string): boolean {
    const command = this.commands.get(name);
    return command !== undefined && command.filter(this.state);
  }

  /**
   * Runs a command if its filter passes. Resolves to whether the handler
   * ran to completion; failures are logged, never thrown.
   */
  async run(name: string): Promise<boolean> {
    const command = this.commands.get(name);
    if (!command) {
      this.log.warn({ command: name }, "Unknown command");
      return false;
    }
    if (!command.filter(this.state)) {
      this.log.debug({ command: name }, "Command filter rejected");
      return false;
    }
    try {
      await command.handler(this.state);
      return true;
    } catch (err) {
      this.log.error({ err, command: name }, "Command failed");
      return false;
    }
  }

  /** Key bindings in registration order, one entry per binding. */
  keyBindings(): KeyBindingEntry[] {
    return [...this.commands.values()].flatMap((command) =>
      command.keys.map((keys) => ({
        keys: formatKeys(keys),
        name: command.name,
        title: command.title,
        group: command.group,
      }))
    );
  }
}
