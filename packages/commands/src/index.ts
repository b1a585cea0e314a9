export * from "./filters.js";
export * from "./registry.js";
export * from "./notebook.js";
