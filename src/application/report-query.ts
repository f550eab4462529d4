/**
 * Translation of report filters and columns into export job parameters.
 */

import { readFileSync } from "fs";
import { z } from "zod";
import type { ExportJobRequest } from "../core/types/job.js";
import type { ScheduledReport } from "../core/types/report.js";

const ReportTypesSchema = z.record(
  z.object({
    displayName: z.string(),
    defaultColumns: z.array(z.string()),
  }),
);

export type ReportTypeCatalog = z.infer<typeof ReportTypesSchema>;

let catalog: ReportTypeCatalog | null = null;

/**
 * Report type metadata shipped in data/report-types.json.
 */
export function getReportTypes(): ReportTypeCatalog {
  if (!catalog) {
    const url = new URL("../../data/report-types.json", import.meta.url);
    catalog = ReportTypesSchema.parse(JSON.parse(readFileSync(url, "utf-8")));
  }
  return catalog;
}

/**
 * Default columns for a report type; empty when the type is unknown.
 */
export function getDefaultColumns(reportType: string): string[] {
  return getReportTypes()[reportType]?.defaultColumns ?? [];
}

/**
 * Build an OData filter expression. "All" and empty values are ignored.
 */
export function buildFilterExpression(filters: Record<string, string>): string | undefined {
  const clauses: string[] = [];
  for (const [key, value] of Object.entries(filters)) {
    if (value === "" || value === "All") {
      continue;
    }
    const quoted = value.replace(/'/g, "''");
    clauses.push(value.includes(" ") ? `contains(${key},'${quoted}')` : `${key} eq '${quoted}'`);
  }
  return clauses.length > 0 ? clauses.join(" and ") : undefined;
}

/**
 * Export job request for a stored report.
 */
export function buildExportRequest(report: ScheduledReport): ExportJobRequest {
  const select =
    report.selectedColumns && report.selectedColumns.length > 0
      ? report.selectedColumns
      : getDefaultColumns(report.reportType);

  return {
    reportType: report.reportType,
    filter: buildFilterExpression(report.filters),
    select,
    format: report.format,
  };
}
