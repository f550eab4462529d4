/**
 * Next-run computation for weekly trigger schedules.
 */

import { CronExpressionParser } from "cron-parser";
import type { Trigger } from "../core/types/report.js";

/**
 * Cron expression for a trigger. Weekday 1 (Sunday) maps to cron day 0.
 */
export function triggerToCron(trigger: Trigger): string {
  const dayOfWeek = trigger.weekday === undefined ? "*" : String(trigger.weekday - 1);
  return `${trigger.minute} ${trigger.hour} * * ${dayOfWeek}`;
}

function nextFireAfter(trigger: Trigger, after: Date, timeZone: string): Date {
  const interval = CronExpressionParser.parse(triggerToCron(trigger), {
    currentDate: after,
    tz: timeZone,
  });

  let candidate = interval.next().toDate();
  while (candidate.getTime() <= after.getTime()) {
    candidate = interval.next().toDate();
  }
  return candidate;
}

/**
 * Earliest instant strictly after `after` matching any trigger, or undefined
 * for an empty schedule.
 */
export function nextRun(schedule: Trigger[], after: Date, timeZone = "UTC"): Date | undefined {
  let earliest: Date | undefined;
  for (const trigger of schedule) {
    const candidate = nextFireAfter(trigger, after, timeZone);
    if (!earliest || candidate.getTime() < earliest.getTime()) {
      earliest = candidate;
    }
  }
  return earliest;
}
