/**
 * Remote export job client interface.
 */

import type { ExportJob, ExportJobRequest } from "../types/job.js";

/**
 * Client for the device-management export job API.
 */
export interface IExportJobClient {
  /**
   * Submit a new export job, returning its identifier.
   */
  createJob(request: ExportJobRequest): Promise<string>;

  /**
   * Fetch the current status of a job.
   */
  getJob(jobId: string): Promise<ExportJob>;

  /**
   * Download the archive behind a completed job's handle.
   */
  download(downloadHandle: string): Promise<Buffer>;
}
