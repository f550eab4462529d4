/**
 * Report service contract, independent of any transport.
 */

import type { SchedulerStatus, SweepResultEntry, SweepSummary } from "../types/scheduler.js";

/**
 * Privileged operations exposed to the front-end process.
 */
export interface IReportService {
  ping(): Promise<boolean>;

  /**
   * Run one full sweep over the stored reports.
   */
  executeScheduledReports(): Promise<SweepSummary>;

  getSchedulerStatus(): Promise<SchedulerStatus>;

  /**
   * Execute one report now, regardless of its schedule.
   */
  runScheduledReport(reportId: string): Promise<SweepResultEntry | undefined>;

  saveScheduledReportConfiguration(reportData: Buffer, fileName: string): Promise<boolean>;

  deleteScheduledReportConfiguration(fileName: string): Promise<boolean>;

  updateScheduledReportsIndex(indexData: Buffer): Promise<boolean>;

  /**
   * Disable every report that delivers to the given storage configuration.
   */
  disableReportsForStorageConfig(configName: string): Promise<boolean>;

  /**
   * Poll an existing export job and return its archive bytes, or null on failure.
   */
  pollAndDownloadExportJob(
    jobId: string,
    maxWaitSeconds: number,
    pollIntervalSeconds: number,
  ): Promise<Buffer | null>;

  beginOperation(identifier: string, timeoutSeconds?: number): Promise<boolean>;

  endOperation(identifier: string): Promise<boolean>;
}
