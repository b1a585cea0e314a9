import pino, {
  type DestinationStream,
  type LevelWithSilent,
  type Logger,
  type StreamEntry,
} from "pino";
import { z } from "zod";
import { LogQueue, type LogRecord } from "./queue.js";

/** Process-wide queue backing the log view; lives until exit. */
export const logQueue = new LogQueue();

const DEFAULT_SOURCE = "cellterm";

const LogLineSchema = z
  .object({
    time: z.number(),
    level: z.number(),
    msg: z.string().optional(),
    name: z.string().optional(),
    fn: z.string().optional(),
    err: z
      .object({ message: z.string().optional() })
      .passthrough()
      .optional(),
  })
  .passthrough();

export const parseLogLine = (line: string): LogRecord | null => {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    return null;
  }
  const parsed = LogLineSchema.safeParse(raw);
  if (!parsed.success) return null;
  const { time, level, msg, name, fn, err } = parsed.data;
  const errorMessage = err?.message;
  const message =
    msg && errorMessage && msg !== errorMessage
      ? `${msg}: ${errorMessage}`
      : (msg ?? errorMessage ?? "");
  const source = name ?? DEFAULT_SOURCE;
  return {
    timestamp: time,
    level: pino.levels.labels[level] ?? String(level),
    message,
    source: fn ? `${source}.${fn}` : source,
  };
};

export const createQueueStream = (queue: LogQueue): DestinationStream => ({
  write(line: string) {
    const record = parseLogLine(line);
    if (record) queue.push(record);
  },
});

export interface LoggingSettings {
  level?: LevelWithSilent;
  /** Extra file destination; "-" writes to stdout. */
  logFile?: string;
  queue?: LogQueue;
}

let rootLogger: Logger | undefined;

export const configureLogging = (settings: LoggingSettings = {}): Logger => {
  const streams: StreamEntry[] = [
    { level: "trace", stream: createQueueStream(settings.queue ?? logQueue) },
  ];
  if (settings.logFile) {
    streams.push({
      level: "trace",
      stream:
        settings.logFile === "-"
          ? pino.destination(1)
          : pino.destination({ dest: settings.logFile, mkdir: true, sync: false }),
    });
  }
  rootLogger = pino({ level: settings.level ?? "info" }, pino.multistream(streams));
  return rootLogger;
};

export const getRootLogger = (): Logger => rootLogger ?? configureLogging();

export const createLogger = (name: string): Logger =>
  getRootLogger().child({ name });

export type { Logger, LevelWithSilent };
