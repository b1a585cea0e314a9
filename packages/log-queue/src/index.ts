export * from "./queue.js";
export * from "./logger.js";
