export * from "./range.js";
export * from "./selection.js";
