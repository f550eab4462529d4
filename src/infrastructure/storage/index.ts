/**
 * Storage infrastructure exports.
 */

export {
  FileReportStore,
  INDEX_FILE_NAME,
  reportFileName,
  isDefinitionFileName,
} from "./report-store.js";
export {
  ScheduledReportSchema,
  ReportIndexSchema,
  TriggerSchema,
  parseReport,
  parseIndex,
  serializeReport,
} from "./report-schema.js";
