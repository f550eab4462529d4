import { describe, it, expect } from "vitest";
import { ExecutionCoordinator } from "../src/application/execution-coordinator.js";
import { JobPoller } from "../src/application/job-poller.js";
import { StorageUploader } from "../src/application/storage-uploader.js";
import { NotificationDispatcher } from "../src/application/notification-dispatcher.js";
import type { ScheduledReport, RunResult } from "../src/core/types/report.js";
import type { ExportJob } from "../src/core/types/job.js";
import {
  FakeBlobClient,
  FakeExportClient,
  FakeStorageRegistry,
  InMemoryReportStore,
  RecordingChannel,
  buildZip,
  makeReport,
} from "./helpers.js";

const now = new Date("2024-01-01T09:30:00Z");

function setup(
  reports: ScheduledReport[],
  options: { statuses?: Array<ExportJob["status"]>; archive?: Buffer } = {},
) {
  const store = new InMemoryReportStore(reports);
  const exportClient = new FakeExportClient(options);
  const blob = new FakeBlobClient();
  const channel = new RecordingChannel();
  const coordinator = new ExecutionCoordinator({
    store,
    poller: new JobPoller(exportClient, { sleep: async () => {}, now: () => now.getTime() }),
    uploader: new StorageUploader({ registry: new FakeStorageRegistry(), client: blob }),
    dispatcher: new NotificationDispatcher({ channel, globalWebhookUrl: "https://hooks.test/global" }),
    now: () => now,
  });
  return { store, exportClient, blob, channel, coordinator };
}

function runResult(runDuration: number): RunResult {
  return { success: true, format: "csv", runDuration, completedAt: new Date("2023-12-31T09:00:00Z") };
}

describe("ExecutionCoordinator.sweep", () => {
  it("executes a due report end to end and advances its next run", async () => {
    const report = makeReport({ nextRun: new Date("2024-01-01T09:00:00Z") });
    const { store, exportClient, blob, channel, coordinator } = setup([report]);

    const summary = await coordinator.sweep();

    expect(summary).toMatchObject({
      totalReportsChecked: 1,
      reportsExecuted: 1,
      successfulExecutions: 1,
      failedExecutions: 0,
    });
    expect(summary.error).toBeUndefined();
    expect(exportClient.requests).toEqual([
      {
        reportType: "DeviceCompliance",
        filter: undefined,
        select: expect.any(Array),
        format: "csv",
      },
    ]);
    expect(exportClient.downloads).toEqual(["https://download.test/job-1.zip"]);
    expect(blob.uploads[0].blobName).toBe("reports/devicecompliance/WeeklyCompliance_2024-01-01_09-30-00.csv");
    expect(channel.sent).toHaveLength(1);

    const saved = store.saved[0];
    expect(saved.lastRun).toEqual(now);
    expect(saved.nextRun?.toISOString()).toBe("2024-01-02T09:00:00.000Z");
    expect(saved.lastRunResult).toMatchObject({
      success: true,
      format: "csv",
      recordCount: 2,
      runDuration: 0,
      fileName: "WeeklyCompliance_2024-01-01_09-30-00.csv",
    });
  });

  it("skips reports that are not due or disabled", async () => {
    const future = makeReport({ id: "future", nextRun: new Date("2024-01-01T10:00:00Z") });
    const disabled = makeReport({ id: "off", isEnabled: false, nextRun: new Date("2024-01-01T08:00:00Z") });
    const { exportClient, coordinator } = setup([future, disabled]);

    const summary = await coordinator.sweep();

    expect(summary.totalReportsChecked).toBe(2);
    expect(summary.reportsExecuted).toBe(0);
    expect(exportClient.requests).toHaveLength(0);
  });

  it("records a failed job, skips the upload and notifies with the failure", async () => {
    const report = makeReport({
      nextRun: new Date("2024-01-01T09:00:00Z"),
      notifications: { enabled: true, useGlobalWebhook: true, messageTemplate: "{status}|{error}" },
    });
    const { store, blob, channel, coordinator } = setup([report], { statuses: ["inProgress", "failed"] });

    const summary = await coordinator.sweep();

    expect(summary.failedExecutions).toBe(1);
    expect(summary.results[0]).toMatchObject({ reportId: "weekly-compliance", success: false, error: "Export job job-1 failed" });
    expect(blob.uploads).toHaveLength(0);
    expect(channel.sent[0].text).toBe("❌ FAILED|Export job job-1 failed");
    expect(store.saved[0].lastRunResult?.success).toBe(false);
    expect(store.saved[0].nextRun?.toISOString()).toBe("2024-01-02T09:00:00.000Z");
  });

  it("records extraction failures", async () => {
    const report = makeReport({ nextRun: new Date("2024-01-01T09:00:00Z") });
    const { store, coordinator } = setup([report], { archive: buildZip({ "readme.txt": "nothing" }) });

    const summary = await coordinator.sweep();

    expect(summary.results[0].error).toBe("No CSV file found in export archive");
    expect(store.saved[0].lastRunResult?.error).toBe("No CSV file found in export archive");
  });

  it("returns an error summary when the store is unavailable", async () => {
    const { store, coordinator } = setup([]);
    store.failLoad = new Error("EACCES: permission denied");

    const summary = await coordinator.sweep();

    expect(summary).toEqual({
      timestamp: now,
      totalReportsChecked: 0,
      reportsExecuted: 0,
      successfulExecutions: 0,
      failedExecutions: 0,
      results: [],
      error: "EACCES: permission denied",
    });
    expect(coordinator.lastSweepAt).toBeUndefined();
  });

  it("keeps going when run state cannot be persisted", async () => {
    const report = makeReport({ nextRun: new Date("2024-01-01T09:00:00Z") });
    const { store, coordinator } = setup([report]);
    store.failSave = new Error("disk full");

    const summary = await coordinator.sweep();

    expect(summary.successfulExecutions).toBe(1);
    expect(coordinator.lastSweepAt).toEqual(now);
  });
});

describe("ExecutionCoordinator.runReport", () => {
  it("runs a report that is not due", async () => {
    const report = makeReport({ nextRun: new Date("2024-02-01T09:00:00Z") });
    const { coordinator, exportClient } = setup([report]);

    const entry = await coordinator.runReport("weekly-compliance");

    expect(entry?.success).toBe(true);
    expect(exportClient.requests).toHaveLength(1);
  });

  it("consumes the pending slot when run ahead of it", async () => {
    const report = makeReport({ nextRun: new Date("2024-01-02T09:00:00Z") });
    const { store, coordinator } = setup([report]);

    await coordinator.runReport("weekly-compliance");

    expect(store.reports.get("weekly-compliance")?.nextRun).toEqual(new Date("2024-01-03T09:00:00Z"));
  });

  it("returns undefined for an unknown report", async () => {
    const { coordinator } = setup([]);
    expect(await coordinator.runReport("missing")).toBeUndefined();
  });
});

describe("ExecutionCoordinator.disableReportsByStorageConfig", () => {
  it("disables enabled reports that use the configuration", async () => {
    const secondary = makeReport().delivery;
    const { store, coordinator } = setup([
      makeReport({ id: "a" }),
      makeReport({ id: "b" }),
      makeReport({ id: "c", isEnabled: false }),
      makeReport({ id: "d", delivery: { ...secondary, storageConfigName: "secondary" } }),
    ]);

    expect(await coordinator.disableReportsByStorageConfig("primary")).toBe(2);
    expect(store.saved.map((r) => r.id)).toEqual(["a", "b"]);
    expect(store.reports.get("a")?.isEnabled).toBe(false);
    expect(store.reports.get("d")?.isEnabled).toBe(true);
  });
});

describe("ExecutionCoordinator.status", () => {
  it("aggregates the stored reports", async () => {
    const { coordinator } = setup([
      makeReport({ id: "a", nextRun: new Date("2024-01-01T09:00:00Z"), lastRunResult: runResult(4) }),
      makeReport({ id: "b", nextRun: new Date("2024-01-02T09:00:00Z"), lastRunResult: runResult(2) }),
      makeReport({ id: "c", isEnabled: false, nextRun: new Date("2023-12-01T09:00:00Z") }),
    ]);

    const status = await coordinator.status({ enabled: true, intervalMinutes: 5 });

    expect(status).toEqual({
      schedulerEnabled: true,
      intervalMinutes: 5,
      totalReports: 3,
      enabledReports: 2,
      nextReportDue: new Date("2024-01-01T09:00:00Z"),
      overdueReports: 1,
      averageExecutionTime: 3,
      lastSweepAt: undefined,
    });
  });
});
