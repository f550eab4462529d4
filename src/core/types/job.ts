/**
 * Remote export job types.
 */

import type { ReportFormat } from "./report.js";

export type ExportJobStatus = "queued" | "inProgress" | "completed" | "failed";

/**
 * Transient view of a remote export job.
 */
export interface ExportJob {
  id: string;
  status: ExportJobStatus;
  /** Present once the job completed */
  downloadHandle?: string;
}

/**
 * Parameters submitted when creating an export job.
 */
export interface ExportJobRequest {
  reportType: string;
  filter?: string;
  select: string[];
  format: ReportFormat;
}

/**
 * Terminal state of a polled job.
 */
export type PollOutcome =
  | { state: "completed"; jobId: string; downloadHandle: string; elapsedMs: number }
  | { state: "failed"; jobId?: string; error: Error; elapsedMs: number }
  | { state: "timedOut"; jobId: string; error: Error; elapsedMs: number };

export interface PollOptions {
  pollIntervalMs?: number;
  timeoutMs?: number;
}
