/**
 * Due-set resolution over loaded reports.
 */

import type { ScheduledReport } from "../core/types/report.js";
import { nextRun } from "./schedule-clock.js";

/**
 * Stored next run, or one computed from the last run (or creation) when absent.
 */
export function effectiveNextRun(report: ScheduledReport, timeZone: string): Date | undefined {
  if (report.schedule.length === 0) {
    return undefined;
  }
  return report.nextRun ?? nextRun(report.schedule, report.lastRun ?? report.createdAt, timeZone);
}

/**
 * Whether a report should execute at `now`.
 */
export function isDue(report: ScheduledReport, now: Date, timeZone: string): boolean {
  if (!report.isEnabled) {
    return false;
  }
  const next = effectiveNextRun(report, timeZone);
  return next !== undefined && next.getTime() <= now.getTime();
}

/**
 * Reports due at `now`, in load order. Evaluation has no side effects.
 */
export function resolveDueSet(
  reports: ScheduledReport[],
  now: Date,
  timeZone: string,
): ScheduledReport[] {
  return reports.filter((report) => isDue(report, now, timeZone));
}
