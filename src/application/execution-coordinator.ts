/**
 * Sweep orchestration: due reports through export, extraction, upload, notification.
 */

import type { IReportStore } from "../core/interfaces/report-store.js";
import type { ReportFormat, RunResult, ScheduledReport } from "../core/types/report.js";
import type { SchedulerStatus, SweepResultEntry, SweepSummary } from "../core/types/scheduler.js";
import { errorMessage } from "../core/errors.js";
import { buildExportRequest } from "./report-query.js";
import { effectiveNextRun, isDue, resolveDueSet } from "./due-set.js";
import { nextRun } from "./schedule-clock.js";
import { countRecords, extractReport } from "./archive-extractor.js";
import type { JobPoller } from "./job-poller.js";
import type { StorageUploader } from "./storage-uploader.js";
import type { NotificationDispatcher, ReportOutcome } from "./notification-dispatcher.js";
import logger from "../utils/logger.js";

export interface ExecutionCoordinatorOptions {
  store: IReportStore;
  poller: JobPoller;
  uploader: StorageUploader;
  dispatcher: NotificationDispatcher;
  timeZone?: string;
  now?: () => Date;
}

function payloadFormat(fileName: string, requested: ReportFormat): ReportFormat {
  const lower = fileName.toLowerCase();
  if (lower.endsWith(".json")) return "json";
  if (lower.endsWith(".csv")) return "csv";
  return requested;
}

export function emptySummary(timestamp: Date, error: string): SweepSummary {
  return {
    timestamp,
    totalReportsChecked: 0,
    reportsExecuted: 0,
    successfulExecutions: 0,
    failedExecutions: 0,
    results: [],
    error,
  };
}

/**
 * Executes due reports strictly one after another and is the only writer of
 * a report's run bookkeeping.
 */
export class ExecutionCoordinator {
  private store: IReportStore;
  private poller: JobPoller;
  private uploader: StorageUploader;
  private dispatcher: NotificationDispatcher;
  private timeZone: string;
  private now: () => Date;
  private _lastSweepAt: Date | undefined;

  constructor(options: ExecutionCoordinatorOptions) {
    this.store = options.store;
    this.poller = options.poller;
    this.uploader = options.uploader;
    this.dispatcher = options.dispatcher;
    this.timeZone = options.timeZone ?? "UTC";
    this.now = options.now ?? (() => new Date());
  }

  get lastSweepAt(): Date | undefined {
    return this._lastSweepAt;
  }

  /**
   * Run every due report once.
   */
  async sweep(): Promise<SweepSummary> {
    const timestamp = this.now();

    let reports: ScheduledReport[];
    try {
      const loaded = await this.store.loadAll();
      reports = loaded.reports;
      if (loaded.skipped.length > 0) {
        logger.warn({ skipped: loaded.skipped.length }, "Some report definitions were skipped");
      }
    } catch (error) {
      logger.error({ error: errorMessage(error) }, "Sweep aborted: report store unavailable");
      return emptySummary(timestamp, errorMessage(error));
    }

    const due = resolveDueSet(reports, timestamp, this.timeZone);
    logger.info({ checked: reports.length, due: due.length }, "Sweep started");

    const results: SweepResultEntry[] = [];
    for (const report of due) {
      results.push(await this.execute(report));
    }

    this._lastSweepAt = timestamp;
    const successful = results.filter((r) => r.success).length;
    const summary: SweepSummary = {
      timestamp,
      totalReportsChecked: reports.length,
      reportsExecuted: results.length,
      successfulExecutions: successful,
      failedExecutions: results.length - successful,
      results,
    };

    logger.info(
      { executed: summary.reportsExecuted, succeeded: successful, failed: summary.failedExecutions },
      "Sweep finished",
    );
    return summary;
  }

  /**
   * Execute one report immediately, regardless of whether it is due.
   *
   * Bookkeeping matches a scheduled run: the next run is computed after the
   * later of now and the stored next run, so running a report ahead of its
   * slot consumes that slot.
   */
  async runReport(reportId: string): Promise<SweepResultEntry | undefined> {
    const report = await this.store.get(reportId);
    if (!report) {
      logger.warn({ reportId }, "Report not found for manual run");
      return undefined;
    }
    return this.execute(report);
  }

  /**
   * Disable every enabled report that delivers to `configName`. Returns how many changed.
   */
  async disableReportsByStorageConfig(configName: string): Promise<number> {
    const { reports } = await this.store.loadAll();
    let changed = 0;

    for (const report of reports) {
      if (!report.isEnabled || report.delivery.storageConfigName !== configName) {
        continue;
      }
      await this.store.save({ ...report, isEnabled: false, modifiedAt: this.now() });
      changed++;
    }

    if (changed > 0) {
      logger.info({ configName, disabled: changed }, "Disabled reports for removed storage configuration");
    }
    return changed;
  }

  /**
   * Aggregate view of the stored reports.
   */
  async status(scheduler: { enabled: boolean; intervalMinutes: number }): Promise<SchedulerStatus> {
    const { reports } = await this.store.loadAll();
    const now = this.now();
    const enabled = reports.filter((r) => r.isEnabled);

    let nextReportDue: Date | undefined;
    for (const report of enabled) {
      const next = effectiveNextRun(report, this.timeZone);
      if (next && (!nextReportDue || next.getTime() < nextReportDue.getTime())) {
        nextReportDue = next;
      }
    }

    const durations = reports
      .map((r) => r.lastRunResult?.runDuration)
      .filter((d): d is number => d !== undefined);

    return {
      schedulerEnabled: scheduler.enabled,
      intervalMinutes: scheduler.intervalMinutes,
      totalReports: reports.length,
      enabledReports: enabled.length,
      nextReportDue,
      overdueReports: enabled.filter((r) => isDue(r, now, this.timeZone)).length,
      averageExecutionTime:
        durations.length > 0 ? durations.reduce((sum, d) => sum + d, 0) / durations.length : undefined,
      lastSweepAt: this._lastSweepAt,
    };
  }

  private async execute(report: ScheduledReport): Promise<SweepResultEntry> {
    const startedAt = this.now();
    const log = logger.child({ reportId: report.id, reportName: report.name });
    log.info({ reportType: report.reportType }, "Executing scheduled report");

    let outcome: ReportOutcome;
    let fileName: string | undefined;

    try {
      const polled = await this.poller.run(buildExportRequest(report));
      if (polled.state !== "completed") {
        outcome = {
          success: false,
          timestamp: this.now(),
          format: report.format,
          error: errorMessage(polled.error),
          jobId: polled.jobId,
        };
      } else {
        const archive = await this.poller.download(polled.jobId, polled.downloadHandle);
        const extracted = await extractReport(archive, report.format);
        const format = payloadFormat(extracted.fileName, report.format);
        const recordCount = countRecords(extracted.data, format);
        const uploaded = await this.uploader.upload(report, extracted, {
          jobId: polled.jobId,
          now: this.now(),
        });

        fileName = uploaded.fileName;
        outcome = {
          success: true,
          timestamp: this.now(),
          format,
          jobId: polled.jobId,
          recordCount,
          fileSize: extracted.data.length,
          downloadLink: uploaded.downloadLink,
          linkExpiresAt: uploaded.linkExpiresAt,
        };
      }
    } catch (error) {
      log.error({ error: errorMessage(error) }, "Scheduled report failed");
      outcome = {
        success: false,
        timestamp: this.now(),
        format: report.format,
        error: errorMessage(error),
      };
    }

    await this.dispatcher.notify(report, outcome);

    const completedAt = this.now();
    const runDuration = Math.max(0, (completedAt.getTime() - startedAt.getTime()) / 1000);
    const result: RunResult = {
      success: outcome.success,
      format: outcome.format,
      error: outcome.error,
      runDuration,
      fileName,
      fileSize: outcome.fileSize,
      recordCount: outcome.recordCount,
      downloadLink: outcome.downloadLink,
      completedAt,
    };

    await this.recordAttempt(report, startedAt, completedAt, result);

    if (outcome.success) {
      log.info({ runDuration, recordCount: outcome.recordCount }, "Scheduled report completed");
    }

    return {
      reportId: report.id,
      reportName: report.name,
      reportType: report.reportType,
      success: outcome.success,
      executionTime: runDuration,
      timestamp: completedAt,
      error: outcome.error,
    };
  }

  private async recordAttempt(
    report: ScheduledReport,
    startedAt: Date,
    completedAt: Date,
    result: RunResult,
  ): Promise<void> {
    const previous = effectiveNextRun(report, this.timeZone);
    const anchor =
      previous && previous.getTime() > completedAt.getTime() ? previous : completedAt;

    const updated: ScheduledReport = {
      ...report,
      lastRun: startedAt,
      lastRunResult: result,
      nextRun: nextRun(report.schedule, anchor, this.timeZone),
      modifiedAt: completedAt,
    };

    try {
      await this.store.save(updated);
    } catch (error) {
      logger.error({ reportId: report.id, error: errorMessage(error) }, "Failed to persist report run state");
    }
  }
}
