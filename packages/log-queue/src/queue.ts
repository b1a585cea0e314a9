export const DEFAULT_LOG_QUEUE_CAPACITY = 1000;

export interface LogRecord {
  /** Milliseconds since the epoch. */
  timestamp: number;
  level: string;
  message: string;
  /** Logger name, plus the emitting function when the call site passed one. */
  source: string;
}

export type LogHook = (record: LogRecord) => void;

/**
 * Fixed-capacity FIFO of log records. Once full, each push evicts the oldest
 * record. Hooks run synchronously for every pushed record.
 */
export class LogQueue {
  readonly capacity: number;
  private readonly slots: Array<LogRecord | undefined>;
  private head = 0;
  private count = 0;
  private readonly hooks = new Map<number, LogHook>();
  private nextHookId = 0;

  constructor(capacity: number = DEFAULT_LOG_QUEUE_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(
        `Log queue capacity must be a positive integer, got ${capacity}`
      );
    }
    this.capacity = capacity;
    this.slots = new Array<LogRecord | undefined>(capacity);
  }

  get size(): number {
    return this.count;
  }

  push(record: LogRecord): void {
    const tail = (this.head + this.count) % this.capacity;
    this.slots[tail] = record;
    if (this.count < this.capacity) {
      this.count += 1;
    } else {
      this.head = (this.head + 1) % this.capacity;
    }
    for (const [id, hook] of [...this.hooks]) {
      try {
        hook(record);
      } catch (err) {
        // Logging from here would re-enter the queue.
        process.emitWarning(
          `Log hook ${id} failed: ${err instanceof Error ? err.message : String(err)}`
        );
      }
    }
  }

  /** Oldest first. */
  records(): LogRecord[] {
    const out: LogRecord[] = [];
    for (let i = 0; i < this.count; i++) {
      const record = this.slots[(this.head + i) % this.capacity];
      if (record) out.push(record);
    }
    return out;
  }

  addHook(hook: LogHook): number {
    const id = this.nextHookId;
    this.nextHookId += 1;
    this.hooks.set(id, hook);
    return id;
  }

  removeHook(id: number): void {
    this.hooks.delete(id);
  }

  clear(): void {
    this.slots.fill(undefined);
    this.head = 0;
    this.count = 0;
  }
}
