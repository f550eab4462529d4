/**
 * Export job lifecycle: create, poll until terminal, download.
 */

import { setTimeout as delay } from "timers/promises";
import type { IExportJobClient } from "../core/interfaces/export-client.js";
import type { ExportJob, ExportJobRequest, PollOptions, PollOutcome } from "../core/types/job.js";
import { JobTimeoutError, RemoteJobError, errorMessage } from "../core/errors.js";
import logger from "../utils/logger.js";

/** Default poll interval: 10 seconds */
export const DEFAULT_POLL_INTERVAL_MS = 10 * 1000;

/** Default pipeline cap: 5 minutes */
export const DEFAULT_JOB_TIMEOUT_MS = 5 * 60 * 1000;

export interface JobPollerOptions extends PollOptions {
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

function asRemoteError(error: unknown, stage: "create" | "status" | "download", jobId?: string): Error {
  if (error instanceof RemoteJobError) {
    return error;
  }
  return new RemoteJobError(stage, errorMessage(error), { cause: error, jobId });
}

/**
 * Drives a single export job to a terminal state.
 *
 * Waiting is a non-blocking timer; a single failed status check ends the job.
 */
export class JobPoller {
  private client: IExportJobClient;
  private pollIntervalMs: number;
  private timeoutMs: number;
  private sleep: (ms: number) => Promise<void>;
  private now: () => number;

  constructor(client: IExportJobClient, options: JobPollerOptions = {}) {
    this.client = client;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_JOB_TIMEOUT_MS;
    this.sleep = options.sleep ?? ((ms) => delay(ms).then(() => undefined));
    this.now = options.now ?? Date.now;
  }

  /**
   * Create a job and poll it until completion, failure, or timeout.
   */
  async run(request: ExportJobRequest, options: PollOptions = {}): Promise<PollOutcome> {
    const startedAt = this.now();

    let jobId: string;
    try {
      jobId = await this.client.createJob(request);
    } catch (error) {
      logger.error({ reportType: request.reportType, error: errorMessage(error) }, "Export job creation failed");
      return { state: "failed", error: asRemoteError(error, "create"), elapsedMs: this.now() - startedAt };
    }

    logger.info({ jobId, reportType: request.reportType }, "Export job created");
    return this.poll(jobId, startedAt, options);
  }

  /**
   * Poll an existing job and download its archive.
   * Throws on failure, timeout, or download error.
   */
  async pollAndDownload(jobId: string, options: PollOptions = {}): Promise<Buffer> {
    const outcome = await this.poll(jobId, this.now(), options);
    if (outcome.state !== "completed") {
      throw outcome.error;
    }
    return this.download(outcome.jobId, outcome.downloadHandle);
  }

  /**
   * Fetch the archive for a completed job.
   */
  async download(jobId: string, downloadHandle: string): Promise<Buffer> {
    try {
      return await this.client.download(downloadHandle);
    } catch (error) {
      throw asRemoteError(error, "download", jobId);
    }
  }

  private async poll(jobId: string, startedAt: number, options: PollOptions): Promise<PollOutcome> {
    const pollIntervalMs = options.pollIntervalMs ?? this.pollIntervalMs;
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;

    while (true) {
      await this.sleep(pollIntervalMs);

      let status: ExportJob;
      try {
        status = await this.client.getJob(jobId);
      } catch (error) {
        logger.error({ jobId, error: errorMessage(error) }, "Export job status check failed");
        return {
          state: "failed",
          jobId,
          error: asRemoteError(error, "status", jobId),
          elapsedMs: this.now() - startedAt,
        };
      }

      const elapsedMs = this.now() - startedAt;
      logger.debug({ jobId, status: status.status, elapsedMs }, "Export job status");

      if (status.status === "completed") {
        if (!status.downloadHandle) {
          return {
            state: "failed",
            jobId,
            error: new RemoteJobError("status", `Export job ${jobId} completed without a download URL`, { jobId }),
            elapsedMs,
          };
        }
        return { state: "completed", jobId, downloadHandle: status.downloadHandle, elapsedMs };
      }

      if (status.status === "failed") {
        return {
          state: "failed",
          jobId,
          error: new RemoteJobError("status", `Export job ${jobId} failed`, { jobId }),
          elapsedMs,
        };
      }

      if (elapsedMs >= timeoutMs) {
        logger.warn({ jobId, elapsedMs }, "Export job timed out");
        return { state: "timedOut", jobId, error: new JobTimeoutError(jobId, timeoutMs), elapsedMs };
      }
    }
  }
}
