import { describe, it, expect } from "vitest";
import { nextRun, triggerToCron } from "../src/application/schedule-clock.js";
import type { Trigger } from "../src/core/types/report.js";

const MINUTE = 60 * 1000;

function matchesUtc(trigger: Trigger, at: Date): boolean {
  return (
    at.getUTCHours() === trigger.hour &&
    at.getUTCMinutes() === trigger.minute &&
    (trigger.weekday === undefined || at.getUTCDay() + 1 === trigger.weekday)
  );
}

/** First matching minute strictly after `after`, found by scanning. */
function bruteForce(schedule: Trigger[], after: Date): Date | undefined {
  let t = Math.floor(after.getTime() / MINUTE) * MINUTE + MINUTE;
  const limit = after.getTime() + 8 * 24 * 60 * MINUTE;
  for (; t <= limit; t += MINUTE) {
    const candidate = new Date(t);
    if (schedule.some((trigger) => matchesUtc(trigger, candidate))) {
      return candidate;
    }
  }
  return undefined;
}

describe("triggerToCron", () => {
  it("maps a daily trigger", () => {
    expect(triggerToCron({ hour: 9, minute: 0 })).toBe("0 9 * * *");
  });

  it("maps weekday 1 (Sunday) to cron day 0", () => {
    expect(triggerToCron({ weekday: 1, hour: 6, minute: 30 })).toBe("30 6 * * 0");
    expect(triggerToCron({ weekday: 7, hour: 23, minute: 59 })).toBe("59 23 * * 6");
  });
});

describe("nextRun", () => {
  it("returns undefined for an empty schedule", () => {
    expect(nextRun([], new Date("2024-01-01T00:00:00Z"))).toBeUndefined();
  });

  it("returns the next day's slot once today's has passed", () => {
    const result = nextRun([{ hour: 9, minute: 0 }], new Date("2024-01-01T09:05:00Z"));
    expect(result?.toISOString()).toBe("2024-01-02T09:00:00.000Z");
  });

  it("is strictly after an instant that exactly matches a trigger", () => {
    const result = nextRun([{ hour: 9, minute: 0 }], new Date("2024-01-01T09:00:00.000Z"));
    expect(result?.toISOString()).toBe("2024-01-02T09:00:00.000Z");
  });

  it("returns the same day's slot when it is still ahead", () => {
    const result = nextRun([{ hour: 9, minute: 0 }], new Date("2024-01-01T08:59:30Z"));
    expect(result?.toISOString()).toBe("2024-01-01T09:00:00.000Z");
  });

  it("honours the weekday", () => {
    // 2024-01-01 is a Monday; weekday 1 is Sunday
    const result = nextRun([{ weekday: 1, hour: 10, minute: 0 }], new Date("2024-01-01T00:00:00Z"));
    expect(result?.toISOString()).toBe("2024-01-07T10:00:00.000Z");
  });

  it("takes the earliest of several triggers", () => {
    const schedule: Trigger[] = [
      { hour: 18, minute: 0 },
      { hour: 6, minute: 15 },
    ];
    expect(nextRun(schedule, new Date("2024-01-01T07:00:00Z"))?.toISOString()).toBe("2024-01-01T18:00:00.000Z");
    expect(nextRun(schedule, new Date("2024-01-01T19:00:00Z"))?.toISOString()).toBe("2024-01-02T06:15:00.000Z");
  });

  it("evaluates triggers in the configured time zone", () => {
    const result = nextRun([{ hour: 9, minute: 0 }], new Date("2024-01-01T00:00:00Z"), "America/New_York");
    expect(result?.toISOString()).toBe("2024-01-01T14:00:00.000Z");
  });

  it("agrees with a minute-by-minute scan", () => {
    const schedule: Trigger[] = [
      { weekday: 2, hour: 8, minute: 30 },
      { weekday: 6, hour: 17, minute: 45 },
      { hour: 0, minute: 5 },
    ];
    const samples = [
      "2024-02-29T23:59:59Z",
      "2024-03-04T08:30:00Z",
      "2024-03-04T08:29:59.999Z",
      "2024-03-08T17:45:00.001Z",
      "2024-12-31T00:05:00Z",
    ];

    for (const sample of samples) {
      const after = new Date(sample);
      const result = nextRun(schedule, after);
      expect(result?.getTime()).toBe(bruteForce(schedule, after)?.getTime());
      expect(result && result.getTime() > after.getTime()).toBe(true);
    }
  });

  it("is deterministic", () => {
    const after = new Date("2024-05-05T05:05:05Z");
    const schedule: Trigger[] = [{ weekday: 4, hour: 12, minute: 0 }];
    expect(nextRun(schedule, after)?.getTime()).toBe(nextRun(schedule, after)?.getTime());
  });
});
