/**
 * Core type exports.
 */

export * from "./report.js";
export * from "./job.js";
export * from "./storage.js";
export * from "./scheduler.js";
