import { describe, it, expect } from "vitest";
import {
  NotificationDispatcher,
  renderMessage,
  templateValues,
  type ReportOutcome,
} from "../src/application/notification-dispatcher.js";
import { RecordingChannel, makeReport } from "./helpers.js";

const timestamp = new Date("2024-01-01T09:00:05Z");

const success: ReportOutcome = {
  success: true,
  timestamp,
  format: "csv",
  jobId: "job-1",
  recordCount: 2,
  fileSize: 2048,
  downloadLink: "https://reportsaccount.blob.test/exports/out.csv",
  linkExpiresAt: new Date("2024-01-08T09:00:05Z"),
};

const failure: ReportOutcome = {
  success: false,
  timestamp,
  format: "json",
  error: "Export job job-1 failed",
  jobId: "job-1",
};

describe("templateValues", () => {
  it("fills every placeholder for a successful run", () => {
    expect(templateValues(makeReport(), success)).toEqual({
      reportName: "Weekly Compliance",
      reportType: "DeviceCompliance",
      status: "✅ SUCCESS",
      timestamp: "2024-01-01T09:00:05.000Z",
      error: "",
      jobId: "job-1",
      format: "CSV",
      recordCount: "2",
      fileSize: "2.0 KB",
      downloadLink: "https://reportsaccount.blob.test/exports/out.csv",
      azureLink: "https://reportsaccount.blob.test/exports/out.csv",
      expirationDate: "2024-01-08T09:00:05.000Z",
    });
  });

  it("uses fallbacks when facts are missing", () => {
    const values = templateValues(makeReport(), failure);
    expect(values.recordCount).toBe("Unknown");
    expect(values.fileSize).toBe("Unknown");
    expect(values.downloadLink).toBe("Not available");
    expect(values.expirationDate).toBe("N/A");
  });

  it("reports a link without expiry as never expiring", () => {
    const values = templateValues(makeReport(), { ...success, linkExpiresAt: undefined });
    expect(values.expirationDate).toBe("Never");
  });
});

describe("renderMessage", () => {
  it("renders a custom template", () => {
    const report = makeReport({
      notifications: { enabled: true, useGlobalWebhook: true, messageTemplate: "{status}|{error}|{unknown}" },
    });
    expect(renderMessage(report, failure)).toBe("❌ FAILED|Export job job-1 failed|{unknown}");
  });

  it("uses the failure template for failed runs", () => {
    const text = renderMessage(makeReport(), failure);
    expect(text).toContain("**Weekly Compliance** (DeviceCompliance) could not be generated");
    expect(text).toContain("- **Error:** Export job job-1 failed");
  });

  it("uses the success template for successful runs", () => {
    const text = renderMessage(makeReport(), success);
    expect(text).toContain("📊 **Scheduled Report Complete: ✅ SUCCESS**");
    expect(text).toContain("- **Records:** 2");
  });
});

describe("NotificationDispatcher", () => {
  it("sends to the global webhook", async () => {
    const channel = new RecordingChannel();
    const dispatcher = new NotificationDispatcher({ channel, globalWebhookUrl: "https://hooks.test/global" });

    expect(await dispatcher.notify(makeReport(), failure)).toBe(true);
    expect(channel.sent).toHaveLength(1);
    expect(channel.sent[0].target).toBe("https://hooks.test/global");
    expect(channel.sent[0].card).toBeUndefined();
  });

  it("sends to the report's own webhook when configured", async () => {
    const channel = new RecordingChannel();
    const dispatcher = new NotificationDispatcher({ channel, globalWebhookUrl: "https://hooks.test/global" });
    const report = makeReport({
      notifications: { enabled: true, useGlobalWebhook: false, customWebhookURL: "https://hooks.test/custom" },
    });

    await dispatcher.notify(report, failure);

    expect(channel.sent[0].target).toBe("https://hooks.test/custom");
  });

  it("attaches a card when a download link exists", async () => {
    const channel = new RecordingChannel();
    const dispatcher = new NotificationDispatcher({ channel, globalWebhookUrl: "https://hooks.test/global" });

    await dispatcher.notify(makeReport(), success);

    expect(channel.sent[0].card).toEqual({
      title: "📊 Scheduled Report Complete",
      summary: "**Weekly Compliance** generated successfully",
      facts: [
        { title: "Records", value: "2" },
        { title: "File Size", value: "2.0 KB" },
        { title: "Format", value: "CSV" },
        { title: "Link Expires", value: "2024-01-08T09:00:05.000Z" },
      ],
      actions: [{ title: "📥 Download Report", url: "https://reportsaccount.blob.test/exports/out.csv" }],
    });
  });

  it("skips disabled notifications", async () => {
    const channel = new RecordingChannel();
    const dispatcher = new NotificationDispatcher({ channel, globalWebhookUrl: "https://hooks.test/global" });
    const report = makeReport({ notifications: { enabled: false, useGlobalWebhook: true } });

    expect(await dispatcher.notify(report, success)).toBe(false);
    expect(channel.sent).toHaveLength(0);
  });

  it("skips when no webhook is configured", async () => {
    const channel = new RecordingChannel();
    const dispatcher = new NotificationDispatcher({ channel });

    expect(await dispatcher.notify(makeReport(), success)).toBe(false);
    expect(channel.sent).toHaveLength(0);
  });

  it("does not throw when the channel fails", async () => {
    const channel = new RecordingChannel();
    channel.error = new Error("connection reset");
    const dispatcher = new NotificationDispatcher({ channel, globalWebhookUrl: "https://hooks.test/global" });

    await expect(dispatcher.notify(makeReport(), success)).resolves.toBe(false);
  });

  it("returns false when the webhook rejects the message", async () => {
    const channel = new RecordingChannel();
    channel.result = false;
    const dispatcher = new NotificationDispatcher({ channel, globalWebhookUrl: "https://hooks.test/global" });

    expect(await dispatcher.notify(makeReport(), success)).toBe(false);
  });
});
