/**
 * Report store interface.
 */

import type { LoadedReports, ReportIndex, ScheduledReport } from "../types/report.js";

/**
 * Persistence for report definitions: one document per report plus an index.
 */
export interface IReportStore {
  /**
   * Load every valid report. Malformed files are reported in `skipped`.
   * Throws ReportStoreUnavailableError when the directory cannot be read.
   */
  loadAll(): Promise<LoadedReports>;

  /**
   * Load a single report by id.
   */
  get(id: string): Promise<ScheduledReport | undefined>;

  /**
   * Persist a report and refresh its index entry.
   */
  save(report: ScheduledReport): Promise<void>;

  /**
   * Remove a report and its index entry.
   */
  delete(id: string): Promise<boolean>;

  /**
   * Write a serialized report under the given file name.
   */
  writeDefinition(fileName: string, contents: Buffer): Promise<void>;

  /**
   * Remove a serialized report by file name.
   */
  removeDefinition(fileName: string): Promise<boolean>;

  /**
   * Replace the index document.
   */
  writeIndex(contents: Buffer): Promise<void>;

  /**
   * Read the index document.
   */
  readIndex(): Promise<ReportIndex | undefined>;
}
