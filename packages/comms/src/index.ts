export * from "./comm.js";
export * from "./registry.js";
