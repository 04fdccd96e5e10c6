import { CronExpressionParser } from "cron-parser";
import { InvalidScheduleError } from "./errors.ts";
import type { ScheduledTask } from "./types.ts";

export type Schedule =
  | { kind: "interval"; intervalMs: number; source: string }
  | { kind: "cron"; expression: string; source: string };

const SECOND = 1000;
const MINUTE = 60 * SECOND;
const HOUR = 60 * MINUTE;
const DAY = 24 * HOUR;

const UNIT_MS: Record<string, number> = {
  s: SECOND,
  sec: SECOND,
  secs: SECOND,
  second: SECOND,
  seconds: SECOND,
  m: MINUTE,
  min: MINUTE,
  mins: MINUTE,
  minute: MINUTE,
  minutes: MINUTE,
  h: HOUR,
  hr: HOUR,
  hrs: HOUR,
  hour: HOUR,
  hours: HOUR,
  d: DAY,
  day: DAY,
  days: DAY,
};

/** Longest accepted interval. */
export const MAX_INTERVAL_MS = 365 * DAY;

const INTERVAL_PATTERN = /^(?:every\s+)?(\d+)\s*([a-z]+)$/;
const SINGLE_UNIT_PATTERN = /^every\s+([a-z]+)$/;

/**
 * Parse an interval such as "every 5 minutes", "every 60s", "30m" or
 * "every hour" into milliseconds.
 */
export function parseInterval(text: string): number {
  const normalized = text.trim().toLowerCase();

  const single = normalized.match(SINGLE_UNIT_PATTERN);
  if (single && UNIT_MS[single[1]] !== undefined) {
    return UNIT_MS[single[1]];
  }

  const match = normalized.match(INTERVAL_PATTERN);
  if (!match) {
    throw new InvalidScheduleError(
      text,
      'expected an interval like "every 5 minutes", "every 60s" or "30m"',
    );
  }

  const value = Number.parseInt(match[1], 10);
  const unit = UNIT_MS[match[2]];
  if (unit === undefined) {
    throw new InvalidScheduleError(text, `unknown unit "${match[2]}"`);
  }
  if (value <= 0) {
    throw new InvalidScheduleError(text, "interval must be greater than zero");
  }
  const ms = value * unit;
  if (!Number.isSafeInteger(ms) || ms > MAX_INTERVAL_MS) {
    throw new InvalidScheduleError(text, "interval must be at most 365 days");
  }

  return ms;
}

/** Validate a five-field cron expression (minute hour day-of-month month day-of-week). */
export function parseCronExpression(text: string): string {
  const expression = text.trim().split(/\s+/).join(" ");
  if (expression.split(" ").length !== 5) {
    throw new InvalidScheduleError(text, "cron expressions need exactly five fields");
  }

  try {
    CronExpressionParser.parse(expression);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InvalidScheduleError(text, reason);
  }

  return expression;
}

/**
 * Parse schedule text. Five whitespace-separated fields are read as a cron
 * expression, anything else as an interval.
 */
export function parseSchedule(text: string): Schedule {
  const source = text.trim();
  if (source === "") {
    throw new InvalidScheduleError(text, "schedule is empty");
  }

  if (source.split(/\s+/).length === 5) {
    return { kind: "cron", expression: parseCronExpression(source), source };
  }

  return { kind: "interval", intervalMs: parseInterval(source), source };
}

/**
 * Pure next-run computation: the first fire time strictly after `anchor`
 * (the last run, or the creation time for a task that never ran).
 */
export function computeNextRunAt(schedule: Schedule, anchor: Date, timezone?: string): Date {
  const next =
    schedule.kind === "interval"
      ? new Date(anchor.getTime() + schedule.intervalMs)
      : CronExpressionParser.parse(schedule.expression, { currentDate: anchor, tz: timezone })
          .next()
          .toDate();

  if (!Number.isFinite(next.getTime())) {
    throw new InvalidScheduleError(schedule.source, "next run time is out of range");
  }
  return next;
}

export function nextRunForTask(task: ScheduledTask, timezone?: string): Date {
  const schedule = parseSchedule(task.schedule);
  return computeNextRunAt(schedule, task.lastRunAt ?? task.createdAt, timezone);
}

/**
 * Due means enabled and `nextRunAt <= now`; the boundary is inclusive.
 * Throws InvalidScheduleError for an enabled task whose schedule no longer parses.
 */
export function isTaskDue(task: ScheduledTask, now: Date, timezone?: string): boolean {
  if (!task.enabled) {
    return false;
  }
  return nextRunForTask(task, timezone).getTime() <= now.getTime();
}

export function describeSchedule(schedule: Schedule): string {
  if (schedule.kind === "cron") {
    return `cron "${schedule.expression}"`;
  }

  const ms = schedule.intervalMs;
  if (ms % DAY === 0) return `every ${ms / DAY}d`;
  if (ms % HOUR === 0) return `every ${ms / HOUR}h`;
  if (ms % MINUTE === 0) return `every ${ms / MINUTE}m`;
  return `every ${ms / SECOND}s`;
}
