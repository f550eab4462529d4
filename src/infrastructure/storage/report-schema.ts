/**
 * Zod schemas for persisted report documents.
 */

import { z } from "zod";
import { ReportDefinitionError } from "../../core/errors.js";
import type { ReportIndex, ScheduledReport } from "../../core/types/report.js";

const isoDate = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value));

export const TriggerSchema = z.object({
  weekday: z.number().int().min(1).max(7).optional(),
  hour: z.number().int().min(0).max(23),
  minute: z.number().int().min(0).max(59),
});

export const ReportFormatSchema = z.enum(["csv", "json"]);

export const DeliverySchema = z.object({
  storageConfigName: z.string(),
  folderPath: z.string().default("reports/{reportType}/"),
  fileNameTemplate: z.string().min(1).default("{reportName}_{date}_{time}.{extension}"),
  createShareableLink: z.boolean().default(false),
  linkExpirationDays: z.number().int().positive().optional(),
});

export const NotificationSettingsSchema = z.object({
  enabled: z.boolean().default(false),
  useGlobalWebhook: z.boolean().default(true),
  customWebhookURL: z.string().optional(),
  messageTemplate: z.string().optional(),
});

export const RunResultSchema = z.object({
  success: z.boolean(),
  format: ReportFormatSchema,
  error: z.string().optional(),
  runDuration: z.number().min(0),
  fileName: z.string().optional(),
  fileSize: z.number().int().min(0).optional(),
  recordCount: z.number().int().min(0).optional(),
  downloadLink: z.string().optional(),
  completedAt: isoDate,
});

export const ScheduledReportSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  description: z.string().optional(),
  reportType: z.string().min(1),
  format: ReportFormatSchema.default("csv"),
  filters: z.record(z.string()).default({}),
  selectedColumns: z.array(z.string()).optional(),
  schedule: z.array(TriggerSchema).default([]),
  isEnabled: z.boolean().default(true),
  delivery: DeliverySchema,
  notifications: NotificationSettingsSchema.default({}),
  createdAt: isoDate,
  modifiedAt: isoDate,
  lastRun: isoDate.optional(),
  lastRunResult: RunResultSchema.optional(),
  nextRun: isoDate.optional(),
});

export const ReportIndexSchema = z.object({
  reports: z.array(
    z.object({
      id: z.string().min(1),
      name: z.string(),
      reportType: z.string(),
      isEnabled: z.boolean(),
      nextRun: isoDate.optional(),
      lastRun: isoDate.optional(),
    }),
  ),
  lastUpdated: isoDate,
});

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

function parseJson(text: string, source: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new ReportDefinitionError(`${source} is not valid JSON`, { cause: error });
  }
}

/**
 * Parse and validate a serialized report definition.
 */
export function parseReport(text: string, source: string): ScheduledReport {
  const result = ScheduledReportSchema.safeParse(parseJson(text, source));
  if (!result.success) {
    throw new ReportDefinitionError(`${source}: ${describeIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Parse and validate a serialized index.
 */
export function parseIndex(text: string, source: string): ReportIndex {
  const result = ReportIndexSchema.safeParse(parseJson(text, source));
  if (!result.success) {
    throw new ReportDefinitionError(`${source}: ${describeIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Serialize a report. Dates become ISO-8601 strings.
 */
export function serializeReport(report: ScheduledReport): string {
  return `${JSON.stringify(report, null, 2)}\n`;
}
