import process from "node:process";
import type { CommandPolicy } from "../tasks/types.ts";
import type { ExecutorOptions } from "../executor/types.ts";

export interface AppConfig {
  /** PostgreSQL connection URL for the task store and config table */
  databaseUrl?: string;
  /** Scheduler tick period in milliseconds (default: 60000) */
  tickIntervalMs: number;
  /** Hard cap on one console command, in milliseconds (default: 30000) */
  execTimeoutMs: number;
  /** Cap on archiving the world for an `@backup` task (default: 300000) */
  backupTimeoutMs: number;
  /** Bound on reading the task list each tick (default: 10000) */
  storeTimeoutMs: number;
  /** Consecutive skipped ticks before a store alert is raised (default: 3) */
  storeAlertThreshold: number;
  /** IANA timezone for cron schedules (default: host timezone) */
  timezone?: string;
  /** "allowlist" restricts task commands to known console verbs (default) */
  commandPolicy: CommandPolicy;
  executor: ExecutorOptions;
}

function intFromEnv(value: string | undefined, fallback: number): number {
  return value ? parseInt(value, 10) : fallback;
}

export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    databaseUrl: env.DATABASE_URL,
    tickIntervalMs: intFromEnv(env.SCHEDULER_TICK_MS, 60_000),
    execTimeoutMs: intFromEnv(env.EXEC_TIMEOUT_MS, 30_000),
    backupTimeoutMs: intFromEnv(env.BACKUP_TIMEOUT_MS, 300_000),
    storeTimeoutMs: intFromEnv(env.STORE_TIMEOUT_MS, 10_000),
    storeAlertThreshold: intFromEnv(env.STORE_ALERT_THRESHOLD, 3),
    timezone: env.SCHEDULER_TIMEZONE || undefined,
    commandPolicy: env.COMMAND_POLICY === "open" ? "open" : "allowlist",
    executor: {
      dockerPath: env.DOCKER_PATH || "docker",
      consoleSendCommand: env.CONSOLE_SEND_COMMAND || "send-command",
      sshControlPath: env.SSH_CONTROL_PATH || undefined,
    },
  };
}

export function validateConfig(cfg: AppConfig): string[] {
  const errors: string[] = [];

  if (!cfg.databaseUrl) {
    errors.push("DATABASE_URL is required. Set it to your PostgreSQL connection string.");
  }

  const timings: Array<[string, number]> = [
    ["SCHEDULER_TICK_MS", cfg.tickIntervalMs],
    ["EXEC_TIMEOUT_MS", cfg.execTimeoutMs],
    ["BACKUP_TIMEOUT_MS", cfg.backupTimeoutMs],
    ["STORE_TIMEOUT_MS", cfg.storeTimeoutMs],
    ["STORE_ALERT_THRESHOLD", cfg.storeAlertThreshold],
  ];
  for (const [name, value] of timings) {
    if (!Number.isInteger(value) || value <= 0) {
      errors.push(`${name} must be a positive integer.`);
    }
  }

  if (cfg.timezone) {
    try {
      new Intl.DateTimeFormat("en-US", { timeZone: cfg.timezone });
    } catch {
      errors.push(`SCHEDULER_TIMEZONE "${cfg.timezone}" is not a valid IANA timezone.`);
    }
  }

  return errors;
}
