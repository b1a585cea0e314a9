export * from "./messages.js";
export * from "./envelope.js";
export * from "./transport.js";
export * from "./ws-codec.js";
export * from "./ws-transport.js";
export * from "./jupyter-rest.js";
export * from "./memory-transport.js";
