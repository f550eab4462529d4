/**
 * Microsoft Graph device-management export job client.
 */

import { ClientSecretCredential } from "@azure/identity";
import { z } from "zod";
import type { IExportJobClient } from "../../core/interfaces/export-client.js";
import type { ExportJob, ExportJobRequest, ExportJobStatus } from "../../core/types/job.js";
import { RemoteJobError, errorMessage } from "../../core/errors.js";
import type { GraphConfig } from "../config/schema.js";
import type { FetchLike } from "../channels/base.js";
import logger from "../../utils/logger.js";

const ExportJobResponseSchema = z.object({
  id: z.string(),
  status: z.string().optional(),
  url: z.string().nullish(),
});

const STATUS_MAP: Record<string, ExportJobStatus> = {
  notStarted: "queued",
  inProgress: "inProgress",
  completed: "completed",
  failed: "failed",
};

export interface GraphExportClientOptions {
  baseUrl: string;
  getAccessToken: () => Promise<string>;
  fetch?: FetchLike;
}

/**
 * Export job client over the Graph REST API.
 */
export class GraphExportClient implements IExportJobClient {
  private baseUrl: string;
  private getAccessToken: () => Promise<string>;
  private fetchImpl: FetchLike;

  constructor(options: GraphExportClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.getAccessToken = options.getAccessToken;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async createJob(request: ExportJobRequest): Promise<string> {
    const body: Record<string, unknown> = {
      reportName: request.reportType,
      format: request.format,
      localizationType: "LocalizedValuesAsAdditionalColumn",
    };
    if (request.filter) {
      body.filter = request.filter;
    }
    if (request.select.length > 0) {
      body.select = request.select;
    }

    const job = await this.requestJson("create", `${this.baseUrl}/deviceManagement/reports/exportJobs`, {
      method: "POST",
      body: JSON.stringify(body),
    });
    logger.debug({ jobId: job.id, reportName: request.reportType }, "Graph export job submitted");
    return job.id;
  }

  async getJob(jobId: string): Promise<ExportJob> {
    const job = await this.requestJson(
      "status",
      `${this.baseUrl}/deviceManagement/reports/exportJobs('${encodeURIComponent(jobId)}')`,
      { method: "GET" },
      jobId,
    );

    return {
      id: job.id,
      status: STATUS_MAP[job.status ?? ""] ?? "inProgress",
      downloadHandle: job.url ?? undefined,
    };
  }

  /**
   * Fetch the archive. The handle is a pre-signed URL and takes no bearer token.
   */
  async download(downloadHandle: string): Promise<Buffer> {
    let response: Response;
    try {
      response = await this.fetchImpl(downloadHandle, { method: "GET" });
    } catch (error) {
      throw new RemoteJobError("download", `Archive download failed: ${errorMessage(error)}`, { cause: error });
    }
    if (!response.ok) {
      throw new RemoteJobError("download", `Archive download returned HTTP ${response.status}`);
    }
    return Buffer.from(await response.arrayBuffer());
  }

  private async requestJson(
    stage: "create" | "status",
    url: string,
    init: { method: string; body?: string },
    jobId?: string,
  ): Promise<z.infer<typeof ExportJobResponseSchema>> {
    let response: Response;
    try {
      const token = await this.getAccessToken();
      response = await this.fetchImpl(url, {
        method: init.method,
        body: init.body,
        headers: {
          Authorization: `Bearer ${token}`,
          "Content-Type": "application/json",
        },
      });
    } catch (error) {
      throw new RemoteJobError(stage, `Graph request failed: ${errorMessage(error)}`, { cause: error, jobId });
    }

    const text = await response.text();
    if (!response.ok) {
      throw new RemoteJobError(stage, `Graph returned HTTP ${response.status}: ${text.slice(0, 500)}`, { jobId });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      throw new RemoteJobError(stage, "Graph returned a non-JSON response", { cause: error, jobId });
    }

    const result = ExportJobResponseSchema.safeParse(parsed);
    if (!result.success) {
      throw new RemoteJobError(stage, `Unexpected export job response: ${result.error.message}`, { jobId });
    }
    return result.data;
  }
}

/**
 * Client authenticated with the configured app registration. The credential
 * is created on first use so an unconfigured service can still start.
 */
export function createGraphExportClient(config: GraphConfig, fetchImpl?: FetchLike): GraphExportClient {
  let credential: ClientSecretCredential | null = null;

  return new GraphExportClient({
    baseUrl: config.baseUrl,
    fetch: fetchImpl,
    getAccessToken: async () => {
      if (!config.tenantId || !config.clientId || !config.clientSecret) {
        throw new Error("Graph credentials are not configured");
      }
      if (!credential) {
        credential = new ClientSecretCredential(config.tenantId, config.clientId, config.clientSecret);
      }
      const token = await credential.getToken(config.scope);
      if (!token) {
        throw new Error("No access token returned for Graph");
      }
      return token.token;
    },
  });
}
