/**
 * Application module - report execution layer.
 */

export { nextRun, triggerToCron } from "./schedule-clock.js";
export { effectiveNextRun, isDue, resolveDueSet } from "./due-set.js";
export {
  buildExportRequest,
  buildFilterExpression,
  getDefaultColumns,
  getReportTypes,
} from "./report-query.js";
export { JobPoller, type JobPollerOptions } from "./job-poller.js";
export { extractReport, countRecords, type ExtractedReport } from "./archive-extractor.js";
export { StorageUploader, buildBlobName } from "./storage-uploader.js";
export {
  NotificationDispatcher,
  renderMessage,
  type ReportOutcome,
} from "./notification-dispatcher.js";
export { ExecutionCoordinator, emptySummary } from "./execution-coordinator.js";
export { OperationLock } from "./operation-lock.js";
export { ReportService } from "./report-service.js";
export { Scheduler } from "./scheduler.js";
