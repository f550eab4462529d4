/**
 * Transport-independent implementation of the privileged report operations.
 */

import type { IReportService } from "../core/interfaces/service.js";
import type { IReportStore } from "../core/interfaces/report-store.js";
import type { IScheduler } from "../core/interfaces/scheduler.js";
import type { SchedulerStatus, SweepResultEntry, SweepSummary } from "../core/types/scheduler.js";
import { errorMessage } from "../core/errors.js";
import type { ExecutionCoordinator } from "./execution-coordinator.js";
import type { JobPoller } from "./job-poller.js";
import { DEFAULT_OPERATION_TIMEOUT_MS, OperationLock } from "./operation-lock.js";
import logger from "../utils/logger.js";

export interface ReportServiceOptions {
  store: IReportStore;
  coordinator: ExecutionCoordinator;
  scheduler: IScheduler;
  poller: JobPoller;
  lock?: OperationLock;
  schedulerEnabled: boolean;
}

export class ReportService implements IReportService {
  private store: IReportStore;
  private coordinator: ExecutionCoordinator;
  private scheduler: IScheduler;
  private poller: JobPoller;
  private lock: OperationLock;
  private schedulerEnabled: boolean;

  constructor(options: ReportServiceOptions) {
    this.store = options.store;
    this.coordinator = options.coordinator;
    this.scheduler = options.scheduler;
    this.poller = options.poller;
    this.lock = options.lock ?? new OperationLock();
    this.schedulerEnabled = options.schedulerEnabled;
  }

  async ping(): Promise<boolean> {
    return true;
  }

  async executeScheduledReports(): Promise<SweepSummary> {
    return this.scheduler.trigger();
  }

  async getSchedulerStatus(): Promise<SchedulerStatus> {
    const { intervalMinutes } = this.scheduler.status();
    return this.coordinator.status({ enabled: this.schedulerEnabled, intervalMinutes });
  }

  async runScheduledReport(reportId: string): Promise<SweepResultEntry | undefined> {
    return this.scheduler.runExclusive(() => this.coordinator.runReport(reportId));
  }

  async saveScheduledReportConfiguration(reportData: Buffer, fileName: string): Promise<boolean> {
    try {
      await this.store.writeDefinition(fileName, reportData);
      logger.info({ fileName }, "Saved scheduled report configuration");
      return true;
    } catch (error) {
      logger.error({ fileName, error: errorMessage(error) }, "Failed to save scheduled report configuration");
      return false;
    }
  }

  async deleteScheduledReportConfiguration(fileName: string): Promise<boolean> {
    try {
      const removed = await this.store.removeDefinition(fileName);
      logger.info({ fileName, removed }, "Deleted scheduled report configuration");
      return removed;
    } catch (error) {
      logger.error({ fileName, error: errorMessage(error) }, "Failed to delete scheduled report configuration");
      return false;
    }
  }

  async updateScheduledReportsIndex(indexData: Buffer): Promise<boolean> {
    try {
      await this.store.writeIndex(indexData);
      return true;
    } catch (error) {
      logger.error({ error: errorMessage(error) }, "Failed to update scheduled reports index");
      return false;
    }
  }

  async disableReportsForStorageConfig(configName: string): Promise<boolean> {
    try {
      await this.scheduler.runExclusive(() => this.coordinator.disableReportsByStorageConfig(configName));
      return true;
    } catch (error) {
      logger.error({ configName, error: errorMessage(error) }, "Failed to disable reports for storage configuration");
      return false;
    }
  }

  async pollAndDownloadExportJob(
    jobId: string,
    maxWaitSeconds: number,
    pollIntervalSeconds: number,
  ): Promise<Buffer | null> {
    try {
      return await this.poller.pollAndDownload(jobId, {
        timeoutMs: maxWaitSeconds * 1000,
        pollIntervalMs: pollIntervalSeconds * 1000,
      });
    } catch (error) {
      logger.error({ jobId, error: errorMessage(error) }, "Export job poll and download failed");
      return null;
    }
  }

  async beginOperation(identifier: string, timeoutSeconds?: number): Promise<boolean> {
    const timeoutMs = timeoutSeconds === undefined ? DEFAULT_OPERATION_TIMEOUT_MS : timeoutSeconds * 1000;
    return this.lock.begin(identifier, timeoutMs);
  }

  async endOperation(identifier: string): Promise<boolean> {
    return this.lock.end(identifier);
  }

  /**
   * Release held operations.
   */
  close(): void {
    this.lock.clear();
  }
}
