import { CellSelection } from "@cellterm/cell-selection";
import {
  ExecuteReplyContentSchema,
  type KernelEnvelope,
} from "@cellterm/kernel-protocol";
import { KernelSessionError, type ReplyOutcome } from "@cellterm/kernel-session";
import { KernelTab, type KernelTabOptions } from "./kernel-tab.js";

export type CellType = "code" | "markdown" | "raw";

export interface CellOutput {
  outputType: string;
  content: Record<string, unknown>;
}

export interface NotebookCell {
  cellType: CellType;
  source: string;
  executionCount?: number | null;
  outputs?: CellOutput[];
}

export type CellRunStatus = "ok" | "error" | "aborted";

export interface CellRunResult {
  index: number;
  status: CellRunStatus;
  executionCount?: number | null;
  outputs: CellOutput[];
  error?: Error;
}

export interface NotebookTabOptions extends KernelTabOptions {
  cells?: NotebookCell[];
}

export interface RunOptions {
  /** Move the selection below the last cell run, adding a cell at the end. */
  advance?: boolean;
}

// Messages on a request's output route that are not cell outputs.
const NON_OUTPUT_TYPES = new Set(["execute_input"]);

/** A kernel tab holding cells, with a selection and cell execution. */
export class NotebookTab extends KernelTab {
  readonly cells: NotebookCell[];
  readonly selection: CellSelection;

  constructor(options: NotebookTabOptions) {
    super(options);
    this.cells = options.cells ? [...options.cells] : [];
    this.selection = new CellSelection(() => this.cells.length);
  }

  addCell(cell: NotebookCell, index: number = this.cells.length): void {
    this.cells.splice(index, 0, cell);
  }

  /**
   * Runs the code cells of the current selection in order, stopping at the
   * first that does not finish cleanly.
   */
  async runSelectedCells(options: RunOptions = {}): Promise<CellRunResult[]> {
    const indices = this.selection.resolve();
    const results = await this.runIndices(indices);
    const last = indices[indices.length - 1];
    if (options.advance && last !== undefined) {
      const next = last + 1;
      if (next >= this.cells.length) {
        this.addCell({ cellType: "code", source: "" });
      }
      this.selection.set({ start: next, stop: next + 1 });
    }
    return results;
  }

  runAll(): Promise<CellRunResult[]> {
    return this.runIndices(this.cells.map((_, index) => index));
  }

  /** Executes one cell; resolves once its reply and outputs are in. */
  runCell(index: number): Promise<CellRunResult> {
    const cell = this.cells[index];
    return new Promise<CellRunResult>((resolve) => {
      const outputs: CellOutput[] = [];
      if (!cell || cell.cellType !== "code") {
        resolve({ index, status: "ok", outputs });
        return;
      }

      let reply: ReplyOutcome | undefined;
      let done = false;
      let settled = false;
      const settle = () => {
        if (settled || !reply) return;
        if (reply.status === "ok" && !done) return;
        settled = true;
        const result = this.toResult(index, reply, outputs);
        cell.executionCount = result.executionCount;
        cell.outputs = outputs;
        resolve(result);
      };

      const id = this.session.execute(cell.source, {
        onReply: (outcome) => {
          reply = outcome;
          settle();
        },
        onOutput: (envelope) => this.collectOutput(outputs, envelope),
        onDone: () => {
          done = true;
          settle();
        },
      });
      if (id === undefined) {
        settled = true;
        resolve({
          index,
          status: "error",
          outputs,
          error: new KernelSessionError(
            "KERNEL_NOT_CONNECTED",
            "Kernel is not connected"
          ),
        });
      }
    });
  }

  private async runIndices(indices: number[]): Promise<CellRunResult[]> {
    const results: CellRunResult[] = [];
    for (const index of indices) {
      if (this.cells[index]?.cellType !== "code") continue;
      const result = await this.runCell(index);
      results.push(result);
      if (result.status !== "ok") break;
    }
    return results;
  }

  private collectOutput(outputs: CellOutput[], envelope: KernelEnvelope) {
    const outputType = envelope.header.msg_type;
    if (NON_OUTPUT_TYPES.has(outputType)) return;
    if (outputType === "clear_output") {
      outputs.length = 0;
      return;
    }
    outputs.push({ outputType, content: envelope.content });
  }

  private toResult(
    index: number,
    reply: ReplyOutcome,
    outputs: CellOutput[]
  ): CellRunResult {
    if (reply.status === "error") {
      return { index, status: "error", outputs, error: reply.error };
    }
    const parsed = ExecuteReplyContentSchema.safeParse(reply.reply.content);
    if (!parsed.success) {
      this.log.warn(
        { content: reply.reply.content },
        "Malformed execute_reply"
      );
      return { index, status: "error", outputs };
    }
    const { status, execution_count } = parsed.data;
    return {
      index,
      status: status === "ok" ? "ok" : status === "error" ? "error" : "aborted",
      executionCount: execution_count,
      outputs,
    };
  }
}
