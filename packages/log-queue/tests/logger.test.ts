import { describe, it, expect } from "vitest";
import { configureLogging, parseLogLine } from "../src/logger.js";
import { LogQueue } from "../src/queue.js";

describe("parseLogLine", () => {
  it("maps a pino line to a log record", () => {
    const record = parseLogLine(
      JSON.stringify({ time: 1000, level: 40, msg: "careful", name: "kernel-session" })
    );
    expect(record).toEqual({
      timestamp: 1000,
      level: "warn",
      message: "careful",
      source: "kernel-session",
    });
  });

  it("appends the error message and the function name", () => {
    const record = parseLogLine(
      JSON.stringify({
        time: 5,
        level: 50,
        msg: "Kernel failed to start",
        name: "kernel-session",
        fn: "start",
        err: { type: "Error", message: "connection refused" },
      })
    );
    expect(record?.message).toBe("Kernel failed to start: connection refused");
    expect(record?.source).toBe("kernel-session.start");
  });

  it("returns null for lines that are not log records", () => {
    expect(parseLogLine("not json")).toBeNull();
    expect(parseLogLine(JSON.stringify({ level: 30 }))).toBeNull();
  });
});

describe("configureLogging", () => {
  it("writes records into the given queue", () => {
    const queue = new LogQueue(5);
    const root = configureLogging({ level: "debug", queue });
    root.child({ name: "tests" }).debug({ fn: "run" }, "hello");
    const records = queue.records();
    expect(records).toHaveLength(1);
    expect(records[0]?.level).toBe("debug");
    expect(records[0]?.message).toBe("hello");
    expect(records[0]?.source).toBe("tests.run");
  });

  it("drops records below the configured level", () => {
    const queue = new LogQueue(5);
    const root = configureLogging({ level: "warn", queue });
    root.info("ignored");
    root.error("kept");
    expect(queue.records().map((r) => r.message)).toEqual(["kept"]);
    expect(queue.records()[0]?.source).toBe("cellterm");
  });
});
