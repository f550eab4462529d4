/**
 * Sweep and scheduler status types.
 */

/**
 * Per-report entry in a sweep summary.
 */
export interface SweepResultEntry {
  reportId: string;
  reportName: string;
  reportType: string;
  success: boolean;
  /** Seconds */
  executionTime: number;
  timestamp: Date;
  error?: string;
}

/**
 * Summary returned to the caller that triggered a sweep.
 */
export interface SweepSummary {
  timestamp: Date;
  totalReportsChecked: number;
  reportsExecuted: number;
  successfulExecutions: number;
  failedExecutions: number;
  results: SweepResultEntry[];
  /** Set when the sweep aborted before executing anything */
  error?: string;
}

export interface SchedulerStatus {
  schedulerEnabled: boolean;
  intervalMinutes: number;
  totalReports: number;
  enabledReports: number;
  nextReportDue?: Date;
  overdueReports: number;
  /** Seconds, averaged over reports that have run */
  averageExecutionTime?: number;
  lastSweepAt?: Date;
}

/**
 * Callback run on each scheduler tick.
 */
export type SweepCallback = () => Promise<SweepSummary>;
