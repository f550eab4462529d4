/**
 * Scheduled report types.
 */

/** Output encoding requested from the remote export job. */
export type ReportFormat = "csv" | "json";

/**
 * A single trigger rule. Weekday 1 = Sunday … 7 = Saturday; omitted means every day.
 */
export interface Trigger {
  weekday?: number;
  hour: number;
  minute: number;
}

/**
 * Where and how the extracted report is delivered.
 */
export interface DeliverySettings {
  /** Named storage configuration to upload with */
  storageConfigName: string;
  /** Folder template, e.g. "reports/{reportType}/" */
  folderPath: string;
  /** File name template, e.g. "{reportName}_{date}_{time}.{extension}" */
  fileNameTemplate: string;
  createShareableLink: boolean;
  linkExpirationDays?: number;
}

/**
 * Webhook notification settings.
 */
export interface NotificationSettings {
  enabled: boolean;
  useGlobalWebhook: boolean;
  customWebhookURL?: string;
  messageTemplate?: string;
}

/**
 * Outcome of the most recent execution attempt.
 */
export interface RunResult {
  success: boolean;
  format: ReportFormat;
  error?: string;
  /** Seconds */
  runDuration: number;
  fileName?: string;
  fileSize?: number;
  recordCount?: number;
  downloadLink?: string;
  completedAt: Date;
}

/**
 * A persisted report definition.
 */
export interface ScheduledReport {
  id: string;
  name: string;
  description?: string;
  reportType: string;
  format: ReportFormat;
  /** Field name → filter value, in insertion order */
  filters: Record<string, string>;
  /** Explicit column selection; falls back to the report type's defaults */
  selectedColumns?: string[];
  schedule: Trigger[];
  isEnabled: boolean;
  delivery: DeliverySettings;
  notifications: NotificationSettings;
  createdAt: Date;
  modifiedAt: Date;
  lastRun?: Date;
  lastRunResult?: RunResult;
  nextRun?: Date;
}

/**
 * Lightweight entry in the report index.
 */
export interface ReportIndexEntry {
  id: string;
  name: string;
  reportType: string;
  isEnabled: boolean;
  nextRun?: Date;
  lastRun?: Date;
}

/**
 * Index of all stored reports.
 */
export interface ReportIndex {
  reports: ReportIndexEntry[];
  lastUpdated: Date;
}

/**
 * Result of loading the store: valid reports plus files that were skipped.
 */
export interface LoadedReports {
  reports: ScheduledReport[];
  skipped: Array<{ fileName: string; reason: string }>;
}
