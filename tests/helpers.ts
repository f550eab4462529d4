/**
 * Shared fixtures and in-process fakes.
 */

import AdmZip from "adm-zip";
import type {
  IBlobStorageClient,
  IChannel,
  IExportJobClient,
  IReportStore,
  IStorageConfigRegistry,
  OutboundNotification,
} from "../src/core/interfaces/index.js";
import type {
  ExportJob,
  ExportJobRequest,
  LoadedReports,
  NamedStorageConfiguration,
  ReportIndex,
  ScheduledReport,
} from "../src/core/types/index.js";

export function makeReport(overrides: Partial<ScheduledReport> = {}): ScheduledReport {
  return {
    id: "weekly-compliance",
    name: "Weekly Compliance",
    reportType: "DeviceCompliance",
    format: "csv",
    filters: {},
    schedule: [{ hour: 9, minute: 0 }],
    isEnabled: true,
    delivery: {
      storageConfigName: "primary",
      folderPath: "reports/{reportType}/",
      fileNameTemplate: "{reportName}_{date}_{time}.{extension}",
      createShareableLink: false,
    },
    notifications: {
      enabled: true,
      useGlobalWebhook: true,
    },
    createdAt: new Date("2023-12-01T00:00:00Z"),
    modifiedAt: new Date("2023-12-01T00:00:00Z"),
    ...overrides,
  };
}

export function buildZip(entries: Record<string, string>): Buffer {
  const zip = new AdmZip();
  for (const [name, content] of Object.entries(entries)) {
    zip.addFile(name, Buffer.from(content, "utf-8"));
  }
  return zip.toBuffer();
}

/**
 * Report store held in memory.
 */
export class InMemoryReportStore implements IReportStore {
  reports: Map<string, ScheduledReport> = new Map();
  saved: ScheduledReport[] = [];
  index: ReportIndex | undefined;
  failLoad: Error | null = null;
  failSave: Error | null = null;

  constructor(reports: ScheduledReport[] = []) {
    for (const report of reports) {
      this.reports.set(report.id, report);
    }
  }

  async loadAll(): Promise<LoadedReports> {
    if (this.failLoad) throw this.failLoad;
    return { reports: Array.from(this.reports.values()), skipped: [] };
  }

  async get(id: string): Promise<ScheduledReport | undefined> {
    return this.reports.get(id);
  }

  async save(report: ScheduledReport): Promise<void> {
    if (this.failSave) throw this.failSave;
    this.reports.set(report.id, report);
    this.saved.push(report);
  }

  async delete(id: string): Promise<boolean> {
    return this.reports.delete(id);
  }

  async writeDefinition(): Promise<void> {}

  async removeDefinition(fileName: string): Promise<boolean> {
    return this.reports.delete(fileName.replace(/\.json$/, ""));
  }

  async writeIndex(): Promise<void> {}

  async readIndex(): Promise<ReportIndex | undefined> {
    return this.index;
  }
}

/**
 * Export client that replays scripted statuses per job.
 */
export class FakeExportClient implements IExportJobClient {
  requests: ExportJobRequest[] = [];
  statusCalls = 0;
  downloads: string[] = [];
  statuses: Array<ExportJob["status"]>;
  archive: Buffer;
  createError: Error | null = null;
  statusError: Error | null = null;
  private nextId = 1;

  constructor(options: { statuses?: Array<ExportJob["status"]>; archive?: Buffer } = {}) {
    this.statuses = options.statuses ?? ["completed"];
    this.archive = options.archive ?? buildZip({ "DeviceCompliance.csv": "DeviceName,OS\nlaptop-1,Windows\nlaptop-2,macOS\n" });
  }

  async createJob(request: ExportJobRequest): Promise<string> {
    if (this.createError) throw this.createError;
    this.requests.push(request);
    return `job-${this.nextId++}`;
  }

  async getJob(jobId: string): Promise<ExportJob> {
    if (this.statusError) throw this.statusError;
    const index = Math.min(this.statusCalls, this.statuses.length - 1);
    this.statusCalls++;
    const status = this.statuses[index];
    return {
      id: jobId,
      status,
      downloadHandle: status === "completed" ? `https://download.test/${jobId}.zip` : undefined,
    };
  }

  async download(downloadHandle: string): Promise<Buffer> {
    this.downloads.push(downloadHandle);
    return this.archive;
  }
}

export const primaryStorage: NamedStorageConfiguration = {
  name: "primary",
  accountName: "reportsaccount",
  containerName: "exports",
  auth: { method: "sasToken", sasToken: "sv=test" },
};

export class FakeStorageRegistry implements IStorageConfigRegistry {
  private configs: NamedStorageConfiguration[];

  constructor(configs: NamedStorageConfiguration[] = [primaryStorage]) {
    this.configs = configs;
  }

  async get(name: string): Promise<NamedStorageConfiguration | undefined> {
    return this.configs.find((c) => c.name === name);
  }

  async names(): Promise<string[]> {
    return this.configs.map((c) => c.name);
  }
}

export class FakeBlobClient implements IBlobStorageClient {
  uploads: Array<{ config: string; blobName: string; data: Buffer; contentType: string }> = [];
  uploadError: Error | null = null;
  linkError: Error | null = null;

  async upload(config: NamedStorageConfiguration, blobName: string, data: Buffer, contentType: string): Promise<void> {
    if (this.uploadError) throw this.uploadError;
    this.uploads.push({ config: config.name, blobName, data, contentType });
  }

  async createDownloadLink(config: NamedStorageConfiguration, blobName: string, expiresOn: Date): Promise<string> {
    if (this.linkError) throw this.linkError;
    return `https://${config.accountName}.blob.test/${config.containerName}/${blobName}?se=${expiresOn.toISOString()}`;
  }
}

export class RecordingChannel implements IChannel {
  readonly name = "recording";
  sent: OutboundNotification[] = [];
  result = true;
  error: Error | null = null;

  async send(msg: OutboundNotification): Promise<boolean> {
    if (this.error) throw this.error;
    this.sent.push(msg);
    return this.result;
  }
}
