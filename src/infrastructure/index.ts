/**
 * Infrastructure module - external dependencies and implementations.
 */

export * from "./storage/index.js";
export * from "./graph/index.js";
export * from "./blob/index.js";
export * from "./channels/index.js";
export * from "./rpc/index.js";
export * from "./config/index.js";
