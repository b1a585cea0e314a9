import { describe, it, expect, vi } from "vitest";
import { LogQueue, type LogRecord } from "../src/queue.js";

const makeRecord = (n: number): LogRecord => ({
  timestamp: 1_700_000_000_000 + n,
  level: "info",
  message: `record ${n}`,
  source: "tests",
});

describe("LogQueue", () => {
  it("keeps records oldest first", () => {
    const queue = new LogQueue(3);
    queue.push(makeRecord(1));
    queue.push(makeRecord(2));
    expect(queue.size).toBe(2);
    expect(queue.records().map((r) => r.message)).toEqual([
      "record 1",
      "record 2",
    ]);
  });

  it("evicts the oldest records beyond capacity and fires hooks for each push", () => {
    const capacity = 10;
    const queue = new LogQueue(capacity);
    const first = vi.fn();
    const second = vi.fn();
    queue.addHook(first);
    queue.addHook(second);

    for (let i = 0; i < capacity + 5; i++) {
      queue.push(makeRecord(i));
    }

    const records = queue.records();
    expect(records).toHaveLength(capacity);
    expect(records[0]?.message).toBe("record 5");
    expect(records[capacity - 1]?.message).toBe("record 14");
    expect(first).toHaveBeenCalledTimes(capacity + 5);
    expect(second).toHaveBeenCalledTimes(capacity + 5);
    expect(first).toHaveBeenNthCalledWith(1, makeRecord(0));
  });

  it("stops calling a hook once removed", () => {
    const queue = new LogQueue(4);
    const hook = vi.fn();
    const id = queue.addHook(hook);
    queue.push(makeRecord(1));
    queue.removeHook(id);
    queue.push(makeRecord(2));
    expect(hook).toHaveBeenCalledTimes(1);
  });

  it("hands out distinct hook ids", () => {
    const queue = new LogQueue(4);
    const a = queue.addHook(() => {});
    const b = queue.addHook(() => {});
    expect(a).not.toBe(b);
  });

  it("keeps delivering to other hooks when one throws", () => {
    const queue = new LogQueue(2);
    const warn = vi
      .spyOn(process, "emitWarning")
      .mockImplementation(() => undefined);
    const healthy = vi.fn();
    queue.addHook(() => {
      throw new Error("boom");
    });
    queue.addHook(healthy);
    queue.push(makeRecord(1));
    expect(healthy).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith("Log hook 0 failed: boom");
    warn.mockRestore();
  });

  it("rejects a non-positive capacity", () => {
    expect(() => new LogQueue(0)).toThrow(RangeError);
  });

  it("clears all records", () => {
    const queue = new LogQueue(2);
    queue.push(makeRecord(1));
    queue.clear();
    expect(queue.size).toBe(0);
    expect(queue.records()).toEqual([]);
  });
});
