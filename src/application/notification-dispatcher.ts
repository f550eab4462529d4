/**
 * Webhook notifications for report outcomes.
 */

import type { CardMessage, IChannel } from "../core/interfaces/channel.js";
import type { ReportFormat, ScheduledReport } from "../core/types/report.js";
import { errorMessage } from "../core/errors.js";
import { formatBytes } from "../utils/time.js";
import { renderTemplate } from "../utils/template.js";
import logger from "../utils/logger.js";

export const DEFAULT_SUCCESS_TEMPLATE = `📊 **Scheduled Report Complete: {status}**

**{reportName}** generated
- **Records:** {recordCount}
- **File Size:** {fileSize}
- **Format:** {format}

🔗 **Download:** [{reportName} Report]({downloadLink})

⏰ **Link expires:** {expirationDate}`;

export const DEFAULT_FAILURE_TEMPLATE = `📊 **Scheduled Report: {status}**

**{reportName}** ({reportType}) could not be generated
- **Job:** {jobId}
- **Error:** {error}
- **Time:** {timestamp}`;

/**
 * Facts about a finished attempt, rendered into the message.
 */
export interface ReportOutcome {
  success: boolean;
  timestamp: Date;
  format: ReportFormat;
  error?: string;
  jobId?: string;
  recordCount?: number;
  fileSize?: number;
  downloadLink?: string;
  linkExpiresAt?: Date;
}

/**
 * Placeholder values for a report outcome.
 */
export function templateValues(report: ScheduledReport, outcome: ReportOutcome): Record<string, string> {
  const link = outcome.downloadLink;
  let expirationDate = "N/A";
  if (link) {
    expirationDate = outcome.linkExpiresAt ? outcome.linkExpiresAt.toISOString() : "Never";
  }

  return {
    reportName: report.name,
    reportType: report.reportType,
    status: outcome.success ? "✅ SUCCESS" : "❌ FAILED",
    timestamp: outcome.timestamp.toISOString(),
    error: outcome.error ?? "",
    jobId: outcome.jobId ?? "N/A",
    format: outcome.format.toUpperCase(),
    recordCount: outcome.recordCount === undefined ? "Unknown" : String(outcome.recordCount),
    fileSize: outcome.fileSize === undefined ? "Unknown" : formatBytes(outcome.fileSize),
    downloadLink: link ?? "Not available",
    azureLink: link ?? "Not available",
    expirationDate,
  };
}

/**
 * Render the notification text for a report outcome.
 */
export function renderMessage(report: ScheduledReport, outcome: ReportOutcome): string {
  const template =
    report.notifications.messageTemplate ||
    (outcome.success ? DEFAULT_SUCCESS_TEMPLATE : DEFAULT_FAILURE_TEMPLATE);
  return renderTemplate(template, templateValues(report, outcome));
}

function buildCard(report: ScheduledReport, outcome: ReportOutcome, link: string): CardMessage {
  const values = templateValues(report, outcome);
  return {
    title: outcome.success ? "📊 Scheduled Report Complete" : "📊 Scheduled Report Failed",
    summary: outcome.success
      ? `**${report.name}** generated successfully`
      : `**${report.name}** failed: ${values.error}`,
    facts: [
      { title: "Records", value: values.recordCount },
      { title: "File Size", value: values.fileSize },
      { title: "Format", value: values.format },
      { title: "Link Expires", value: values.expirationDate },
    ],
    actions: [{ title: "📥 Download Report", url: link }],
  };
}

/**
 * Resolves the webhook target and delivers the rendered message.
 * Delivery problems are logged and reported through the return value.
 */
export class NotificationDispatcher {
  private channel: IChannel;
  private globalWebhookUrl: string;

  constructor(options: { channel: IChannel; globalWebhookUrl?: string }) {
    this.channel = options.channel;
    this.globalWebhookUrl = options.globalWebhookUrl ?? "";
  }

  /**
   * Webhook for a report: the global one, or the report's own override.
   */
  resolveTarget(report: ScheduledReport): string {
    if (report.notifications.useGlobalWebhook) {
      return this.globalWebhookUrl;
    }
    return report.notifications.customWebhookURL ?? "";
  }

  async notify(report: ScheduledReport, outcome: ReportOutcome): Promise<boolean> {
    if (!report.notifications.enabled) {
      return false;
    }

    const target = this.resolveTarget(report).trim();
    if (!target) {
      logger.warn({ reportId: report.id }, "No webhook configured for report notifications");
      return false;
    }

    const text = renderMessage(report, outcome);
    const card = outcome.downloadLink ? buildCard(report, outcome, outcome.downloadLink) : undefined;

    try {
      const delivered = await this.channel.send({ target, text, card });
      if (delivered) {
        logger.info({ reportId: report.id, channel: this.channel.name }, "Sent report notification");
      } else {
        logger.error({ reportId: report.id, channel: this.channel.name }, "Webhook rejected report notification");
      }
      return delivered;
    } catch (error) {
      logger.error(
        { reportId: report.id, channel: this.channel.name, error: errorMessage(error) },
        "Failed to send report notification",
      );
      return false;
    }
  }
}
