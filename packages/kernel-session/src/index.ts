export * from "./errors.js";
export * from "./session.js";
export type * from "./types.js";
