export * from "./metadata.js";
export * from "./specs.js";
export * from "./surfaces.js";
export * from "./kernel-tab.js";
export * from "./notebook-tab.js";
