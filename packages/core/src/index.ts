export * from "./transport/index.js";
export * from "./http/index.js";
export * from "./resources/index.js";
export * from "./errors/index.js";
