/**
 * Wiring of the report service from a loaded configuration.
 */

import type { FastifyInstance } from "fastify";
import {
  AzureBlobStorageClient,
  FileReportStore,
  FileStorageConfigRegistry,
  TeamsWebhookChannel,
  createGraphExportClient,
  createRpcServer,
  createServiceRegistry,
  getDataDir,
  getReportsPath,
  getStorageConfigsPath,
  type Config,
} from "../infrastructure/index.js";
import {
  ExecutionCoordinator,
  JobPoller,
  NotificationDispatcher,
  ReportService,
  Scheduler,
  StorageUploader,
} from "../application/index.js";

export interface Runtime {
  config: Config;
  store: FileReportStore;
  coordinator: ExecutionCoordinator;
  scheduler: Scheduler;
  service: ReportService;
  server: FastifyInstance;
}

export function createRuntime(config: Config): Runtime {
  getDataDir(config);
  const timeZone = config.scheduler.timezone;

  const store = new FileReportStore(getReportsPath(config));
  const poller = new JobPoller(createGraphExportClient(config.graph), {
    pollIntervalMs: config.scheduler.jobPollIntervalSeconds * 1000,
    timeoutMs: config.scheduler.jobTimeoutSeconds * 1000,
  });
  const uploader = new StorageUploader({
    registry: new FileStorageConfigRegistry(getStorageConfigsPath(config)),
    client: new AzureBlobStorageClient(),
    timeZone,
  });
  const dispatcher = new NotificationDispatcher({
    channel: new TeamsWebhookChannel(),
    globalWebhookUrl: config.notifications.globalWebhookUrl,
  });

  const coordinator = new ExecutionCoordinator({ store, poller, uploader, dispatcher, timeZone });
  const scheduler = new Scheduler({
    onSweep: () => coordinator.sweep(),
    intervalMinutes: config.scheduler.intervalMinutes,
  });
  const service = new ReportService({
    store,
    coordinator,
    scheduler,
    poller,
    schedulerEnabled: config.scheduler.enabled,
  });
  const server = createRpcServer({
    registry: createServiceRegistry(service),
    authToken: config.rpc.authToken,
  });

  return { config, store, coordinator, scheduler, service, server };
}
