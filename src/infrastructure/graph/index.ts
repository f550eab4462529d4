/**
 * Graph infrastructure exports.
 */

export { GraphExportClient, createGraphExportClient, type GraphExportClientOptions } from "./export-client.js";
