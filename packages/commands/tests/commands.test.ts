import { describe, expect, it, vi } from "vitest";
import pino from "pino";
import { loadEditorConfig } from "@cellterm/config";
import { createMemoryConnector, type MemoryTransport } from "@cellterm/kernel-protocol";
import { NotebookTab, StaticKernelSpecSource } from "@cellterm/kernel-tab";
import {
  CommandRegistry,
  DuplicateCommandError,
  registerNotebookCommands,
  titleFromName,
  type EditorState,
  type FocusState,
} from "../src/index.js";

const logger = pino({ level: "silent" });

const createState = (tab: NotebookTab | undefined, focus: Partial<FocusState> = {}) => {
  const current: FocusState = {
    notebook: true,
    cell: true,
    buffer: false,
    output: false,
    ...focus,
  };
  const state: EditorState = { tab: () => tab, focus: () => current };
  return { state, focus: current };
};

const createNotebook = (cellCount: number) => {
  const transports: MemoryTransport[] = [];
  const connect = createMemoryConnector(
    (request, kernel) => {
      if (request.header.msg_type === "kernel_info_request") {
        kernel.reply(request, "kernel_info_reply", { language_info: {} });
      }
    },
    (transport) => transports.push(transport)
  );
  const tab = new NotebookTab({
    config: loadEditorConfig({}),
    connect,
    specs: new StaticKernelSpecSource(),
    notices: { noKernelsShown: false },
    logger,
    cells: Array.from({ length: cellCount }, (_, i) => ({
      cellType: "code" as const,
      source: `cell ${i}`,
    })),
  });
  return { tab, transports };
};

describe("CommandRegistry", () => {
  it("rejects duplicate names", () => {
    const registry = new CommandRegistry(createState(undefined).state, { logger });
    registry.add({ name: "save", handler: () => undefined });
    expect(() => registry.add({ name: "save", handler: () => undefined })).toThrow(
      DuplicateCommandError
    );
  });

  it("derives titles and default groups", () => {
    const registry = new CommandRegistry(createState(undefined).state, { logger });
    const command = registry.add({ name: "run-all-cells", handler: () => undefined });
    expect(command.title).toBe("Run all cells");
    expect(command.group).toBe("general");
    expect(titleFromName("interrupt-kernel")).toBe("Interrupt kernel");
  });

  it("runs handlers only while their filter passes", async () => {
    const { state, focus } = createState(undefined);
    const registry = new CommandRegistry(state, { logger });
    const handler = vi.fn();
    registry.add({ name: "act", filter: (s) => s.focus().cell, handler });

    await expect(registry.run("act")).resolves.toBe(true);
    focus.cell = false;
    await expect(registry.run("act")).resolves.toBe(false);
    expect(registry.isActive("act")).toBe(false);
    expect(handler).toHaveBeenCalledTimes(1);
  });

  it("reports unknown and failing commands without throwing", async () => {
    const registry = new CommandRegistry(createState(undefined).state, { logger });
    registry.add({
      name: "explode",
      handler: async () => {
        throw new Error("boom");
      },
    });
    await expect(registry.run("missing")).resolves.toBe(false);
    await expect(registry.run("explode")).resolves.toBe(false);
  });

  it("lists key bindings with sequences joined by spaces", () => {
    const registry = new CommandRegistry(createState(undefined).state, { logger });
    registry.add({ name: "one", keys: ["c-a", ["I", "I"]], handler: () => undefined });
    expect(registry.keyBindings()).toEqual([
      { keys: "c-a", name: "one", title: "One", group: "general" },
      { keys: "I I", name: "one", title: "One", group: "general" },
    ]);
  });
});

describe("notebook commands", () => {
  it("binds the notebook keys", () => {
    const registry = new CommandRegistry(createState(undefined).state, { logger });
    registerNotebookCommands(registry);
    const bindings = Object.fromEntries(
      registry.keyBindings().map((entry) => [entry.keys, entry.name])
    );
    expect(bindings["I I"]).toBe("interrupt-kernel");
    expect(bindings["0 0"]).toBe("restart-kernel");
    expect(bindings["c-enter"]).toBe("run-selected-cells");
    expect(bindings["s-enter"]).toBe("run-selected-cells-and-select-next-cell");
    expect(bindings.K).toBe("extend-cell-selection-up");
    expect(bindings.end).toBe("select-last-cell");
    expect(registry.get("change-kernel")?.keys).toEqual([]);
    expect(registry.list("notebook")).toHaveLength(15);
  });

  it("are no-ops without an active notebook", async () => {
    const { state } = createState(undefined);
    const registry = new CommandRegistry(state, { logger });
    registerNotebookCommands(registry);
    await expect(registry.run("select-next-cell")).resolves.toBe(false);
    await expect(registry.run("interrupt-kernel")).resolves.toBe(false);
  });

  it("moves the selection of the active notebook", async () => {
    const { tab } = createNotebook(10);
    const registry = new CommandRegistry(createState(tab).state, { logger });
    registerNotebookCommands(registry);

    await registry.run("select-last-cell");
    expect(tab.selection.range).toEqual({ start: 10, stop: 11 });
    await registry.run("extend-cell-selection-up");
    await registry.run("extend-cell-selection-up");
    expect(tab.selection.range).toEqual({ start: 8, stop: 11 });
    await registry.run("select-first-cell");
    await registry.run("select-5th-next-cell");
    expect(tab.selection.range).toEqual({ start: 5, stop: 6 });
  });

  it("ignores navigation while a buffer is being edited", async () => {
    const { tab } = createNotebook(3);
    const registry = new CommandRegistry(createState(tab, { buffer: true }).state, {
      logger,
    });
    registerNotebookCommands(registry);
    await expect(registry.run("select-next-cell")).resolves.toBe(false);
    expect(tab.selection.range).toEqual({ start: 0, stop: 1 });
  });

  it("interrupts the notebook's kernel", async () => {
    const { tab, transports } = createNotebook(1);
    await tab.startKernel({ wait: true });
    const registry = new CommandRegistry(createState(tab).state, { logger });
    registerNotebookCommands(registry);

    await expect(registry.run("interrupt-kernel")).resolves.toBe(true);

    const interrupts = transports[0]?.requests("interrupt_request") ?? [];
    expect(interrupts).toHaveLength(1);
  });
});
