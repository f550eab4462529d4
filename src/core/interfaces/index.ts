/**
 * Core interface exports.
 */

export * from "./report-store.js";
export * from "./export-client.js";
export * from "./storage.js";
export * from "./channel.js";
export * from "./scheduler.js";
export * from "./service.js";
