/**
 * Report service procedures: ping, sweeps, status, definitions, export polling, operation locks.
 */

import { z } from "zod";
import type { IReportService } from "../../core/interfaces/service.js";
import { Procedure } from "./procedure.js";
import { ProcedureRegistry } from "./registry.js";

const base64 = z
  .string()
  .regex(/^[A-Za-z0-9+/]*={0,2}$/, "Expected base64")
  .transform((value) => Buffer.from(value, "base64"));

const identifier = z.string().min(1);

/** Lock timeouts must fit a Node.js timer */
const MAX_TIMEOUT_SECONDS = 2_147_483;

/**
 * Procedure backed by the report service.
 */
abstract class ServiceProcedure extends Procedure {
  protected service: IReportService;

  constructor(service: IReportService) {
    super();
    this.service = service;
  }
}

/**
 * Liveness check.
 */
export class PingProcedure extends ServiceProcedure {
  readonly name = "ping";
  readonly description = "Check that the service is reachable.";
  readonly parameters = z.object({});

  async execute(): Promise<boolean> {
    return this.service.ping();
  }
}

export class ExecuteScheduledReportsProcedure extends ServiceProcedure {
  readonly name = "executeScheduledReports";
  readonly description = "Run one sweep over all stored reports and return its summary.";
  readonly parameters = z.object({});

  async execute(): Promise<unknown> {
    return this.service.executeScheduledReports();
  }
}

export class GetSchedulerStatusProcedure extends ServiceProcedure {
  readonly name = "getSchedulerStatus";
  readonly description = "Report counts, next due time and average execution time.";
  readonly parameters = z.object({});

  async execute(): Promise<unknown> {
    return this.service.getSchedulerStatus();
  }
}

export class RunScheduledReportProcedure extends ServiceProcedure {
  readonly name = "runScheduledReport";
  readonly description = "Execute one report immediately, ignoring its schedule.";
  readonly parameters = z.object({
    reportId: identifier.describe("Report id"),
  });

  async execute(params: { reportId: string }): Promise<unknown> {
    return (await this.service.runScheduledReport(params.reportId)) ?? null;
  }
}

export class SaveScheduledReportConfigurationProcedure extends ServiceProcedure {
  readonly name = "saveScheduledReportConfiguration";
  readonly description = "Store a serialized report definition under the given file name.";
  readonly parameters = z.object({
    reportData: base64.describe("Report definition JSON, base64 encoded"),
    fileName: identifier.describe("Target file name, <id>.json"),
  });

  async execute(params: { reportData: Buffer; fileName: string }): Promise<boolean> {
    return this.service.saveScheduledReportConfiguration(params.reportData, params.fileName);
  }
}

export class DeleteScheduledReportConfigurationProcedure extends ServiceProcedure {
  readonly name = "deleteScheduledReportConfiguration";
  readonly description = "Remove a stored report definition by file name.";
  readonly parameters = z.object({
    fileName: identifier.describe("File name, <id>.json"),
  });

  async execute(params: { fileName: string }): Promise<boolean> {
    return this.service.deleteScheduledReportConfiguration(params.fileName);
  }
}

export class UpdateScheduledReportsIndexProcedure extends ServiceProcedure {
  readonly name = "updateScheduledReportsIndex";
  readonly description = "Replace the report index document.";
  readonly parameters = z.object({
    indexData: base64.describe("Index JSON, base64 encoded"),
  });

  async execute(params: { indexData: Buffer }): Promise<boolean> {
    return this.service.updateScheduledReportsIndex(params.indexData);
  }
}

export class DisableReportsForStorageConfigProcedure extends ServiceProcedure {
  readonly name = "disableReportsForStorageConfig";
  readonly description = "Disable every report that delivers to a storage configuration.";
  readonly parameters = z.object({
    configName: identifier.describe("Storage configuration name"),
  });

  async execute(params: { configName: string }): Promise<boolean> {
    return this.service.disableReportsForStorageConfig(params.configName);
  }
}

export class PollAndDownloadExportJobProcedure extends ServiceProcedure {
  readonly name = "pollAndDownloadExportJob";
  readonly description = "Wait for an existing export job and return its archive as base64, or null.";
  readonly parameters = z.object({
    jobId: identifier.describe("Export job id"),
    maxWaitSeconds: z.number().positive().default(300),
    pollIntervalSeconds: z.number().positive().default(10),
  });

  async execute(params: {
    jobId: string;
    maxWaitSeconds: number;
    pollIntervalSeconds: number;
  }): Promise<string | null> {
    const data = await this.service.pollAndDownloadExportJob(
      params.jobId,
      params.maxWaitSeconds,
      params.pollIntervalSeconds,
    );
    return data ? data.toString("base64") : null;
  }
}

export class BeginOperationProcedure extends ServiceProcedure {
  readonly name = "beginOperation";
  readonly description = "Acquire a named operation lock. False while it is held.";
  readonly parameters = z.object({
    identifier: identifier.describe("Operation name"),
    timeoutSeconds: z.number().positive().max(MAX_TIMEOUT_SECONDS).optional(),
  });

  async execute(params: { identifier: string; timeoutSeconds?: number }): Promise<boolean> {
    return this.service.beginOperation(params.identifier, params.timeoutSeconds);
  }
}

export class EndOperationProcedure extends ServiceProcedure {
  readonly name = "endOperation";
  readonly description = "Release a named operation lock.";
  readonly parameters = z.object({
    identifier: identifier.describe("Operation name"),
  });

  async execute(params: { identifier: string }): Promise<boolean> {
    return this.service.endOperation(params.identifier);
  }
}

/**
 * Registry with every report service procedure.
 */
export function createServiceRegistry(service: IReportService): ProcedureRegistry {
  const registry = new ProcedureRegistry();
  registry.register(new PingProcedure(service));
  registry.register(new ExecuteScheduledReportsProcedure(service));
  registry.register(new GetSchedulerStatusProcedure(service));
  registry.register(new RunScheduledReportProcedure(service));
  registry.register(new SaveScheduledReportConfigurationProcedure(service));
  registry.register(new DeleteScheduledReportConfigurationProcedure(service));
  registry.register(new UpdateScheduledReportsIndexProcedure(service));
  registry.register(new DisableReportsForStorageConfigProcedure(service));
  registry.register(new PollAndDownloadExportJobProcedure(service));
  registry.register(new BeginOperationProcedure(service));
  registry.register(new EndOperationProcedure(service));
  return registry;
}
