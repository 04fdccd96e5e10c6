import { describe, expect, it } from "vitest";
import { InvalidScheduleError } from "./errors.ts";
import {
  MAX_INTERVAL_MS,
  computeNextRunAt,
  describeSchedule,
  isTaskDue,
  nextRunForTask,
  parseInterval,
  parseSchedule,
} from "./schedule.ts";
import type { ScheduledTask } from "./types.ts";

function task(overrides: Partial<ScheduledTask> = {}): ScheduledTask {
  const createdAt = new Date("2026-03-01T10:00:00.000Z");
  return {
    id: "3f2b8c1e-5d4a-4b6f-9e7d-1a2b3c4d5e6f",
    name: "Autosave",
    command: "save-all",
    schedule: "every 5 minutes",
    enabled: true,
    consecutiveFailures: 0,
    createdAt,
    updatedAt: createdAt,
    ...overrides,
  };
}

describe("parseInterval", () => {
  it("parses the long form", () => {
    expect(parseInterval("every 5 minutes")).toBe(5 * 60_000);
  });

  it("parses short units", () => {
    expect(parseInterval("every 60s")).toBe(60_000);
    expect(parseInterval("30m")).toBe(30 * 60_000);
    expect(parseInterval("2h")).toBe(2 * 60 * 60_000);
    expect(parseInterval("1d")).toBe(24 * 60 * 60_000);
  });

  it("ignores case and surrounding whitespace", () => {
    expect(parseInterval("  Every 2 Hours ")).toBe(2 * 60 * 60_000);
  });

  it("accepts a bare unit after every", () => {
    expect(parseInterval("every hour")).toBe(60 * 60_000);
    expect(parseInterval("every day")).toBe(24 * 60 * 60_000);
  });

  it("throws when the unit is missing", () => {
    expect(() => parseInterval("30")).toThrow(
      'Invalid schedule "30": expected an interval like "every 5 minutes", "every 60s" or "30m"',
    );
  });

  it("throws on an unknown unit", () => {
    expect(() => parseInterval("30x")).toThrow('Invalid schedule "30x": unknown unit "x"');
  });

  it("rejects a zero interval", () => {
    expect(() => parseInterval("every 0 minutes")).toThrow("interval must be greater than zero");
  });

  it("caps intervals at one year", () => {
    expect(parseInterval("every 365 days")).toBe(MAX_INTERVAL_MS);
    expect(() => parseInterval("every 366 days")).toThrow(
      'Invalid schedule "every 366 days": interval must be at most 365 days',
    );
  });

  it("rejects counts too large to turn into a date", () => {
    expect(() => parseInterval("every 999999999 days")).toThrow(
      'Invalid schedule "every 999999999 days": interval must be at most 365 days',
    );
    expect(() => parseInterval(`${"9".repeat(400)}s`)).toThrow(InvalidScheduleError);
  });
});

describe("parseSchedule", () => {
  it("reads five fields as cron", () => {
    expect(parseSchedule("0 4 * * *")).toEqual({
      kind: "cron",
      expression: "0 4 * * *",
      source: "0 4 * * *",
    });
  });

  it("collapses whitespace inside cron expressions", () => {
    const schedule = parseSchedule("  */5   *  * * * ");
    expect(schedule).toEqual({
      kind: "cron",
      expression: "*/5 * * * *",
      source: "*/5   *  * * *",
    });
  });

  it("reads anything else as an interval", () => {
    expect(parseSchedule("every 5 minutes")).toEqual({
      kind: "interval",
      intervalMs: 300_000,
      source: "every 5 minutes",
    });
  });

  it("rejects an empty schedule", () => {
    expect(() => parseSchedule("   ")).toThrow('Invalid schedule "   ": schedule is empty');
  });

  it("rejects out-of-range cron fields", () => {
    expect(() => parseSchedule("61 * * * *")).toThrow(InvalidScheduleError);
  });

  it("rejects text that is neither form", () => {
    expect(() => parseSchedule("sometimes")).toThrow(InvalidScheduleError);
  });
});

describe("computeNextRunAt", () => {
  it("adds the interval to the anchor", () => {
    const schedule = parseSchedule("every 5 minutes");
    const next = computeNextRunAt(schedule, new Date("2026-03-01T10:00:00.000Z"));
    expect(next.toISOString()).toBe("2026-03-01T10:05:00.000Z");
  });

  it("returns the next cron match after the anchor", () => {
    const schedule = parseSchedule("0 4 * * *");
    const next = computeNextRunAt(schedule, new Date("2026-03-01T10:00:30.000Z"), "UTC");
    expect(next.toISOString()).toBe("2026-03-02T04:00:00.000Z");
  });

  it("throws when the next run would fall outside the date range", () => {
    const schedule = parseSchedule("every 365 days");
    expect(() => computeNextRunAt(schedule, new Date(8.64e15))).toThrow(
      'Invalid schedule "every 365 days": next run time is out of range',
    );
  });

  it("handles step expressions", () => {
    const schedule = parseSchedule("*/5 * * * *");
    const next = computeNextRunAt(schedule, new Date("2026-03-01T10:02:30.000Z"), "UTC");
    expect(next.toISOString()).toBe("2026-03-01T10:05:00.000Z");
  });
});

describe("nextRunForTask", () => {
  it("anchors on createdAt when the task never ran", () => {
    expect(nextRunForTask(task()).toISOString()).toBe("2026-03-01T10:05:00.000Z");
  });

  it("anchors on lastRunAt once the task has run", () => {
    const ran = task({ lastRunAt: new Date("2026-03-01T10:05:00.000Z") });
    expect(nextRunForTask(ran).toISOString()).toBe("2026-03-01T10:10:00.000Z");
  });
});

describe("isTaskDue", () => {
  it("is due exactly at nextRunAt", () => {
    expect(isTaskDue(task(), new Date("2026-03-01T10:05:00.000Z"))).toBe(true);
  });

  it("is not due one millisecond before", () => {
    expect(isTaskDue(task(), new Date("2026-03-01T10:04:59.999Z"))).toBe(false);
  });

  it("is never due while disabled", () => {
    expect(isTaskDue(task({ enabled: false }), new Date("2026-03-02T00:00:00.000Z"))).toBe(false);
  });
});

describe("describeSchedule", () => {
  it("uses the largest whole unit", () => {
    expect(describeSchedule(parseSchedule("every 5 minutes"))).toBe("every 5m");
    expect(describeSchedule(parseSchedule("90s"))).toBe("every 90s");
    expect(describeSchedule(parseSchedule("every 48 hours"))).toBe("every 2d");
  });

  it("quotes cron expressions", () => {
    expect(describeSchedule(parseSchedule("0 4 * * *"))).toBe('cron "0 4 * * *"');
  });
});
