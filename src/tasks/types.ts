import type { ExecError } from "../executor/types.ts";

export type TaskResult =
  | { status: "success"; output: string }
  | { status: "failure"; error: ExecError };

export interface ScheduledTask {
  id: string;
  name: string;
  /** Console text; several commands may be chained with " && " */
  command: string;
  /** Interval ("every 5 minutes", "30m") or five-field cron expression */
  schedule: string;
  enabled: boolean;
  lastRunAt?: Date;
  lastResult?: TaskResult;
  /** Failed attempts since the last success */
  consecutiveFailures: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface TaskDraft {
  name: string;
  command: string;
  schedule: string;
  enabled?: boolean;
}

export interface TaskUpdate {
  name?: string;
  command?: string;
  schedule?: string;
  enabled?: boolean;
}

export type CommandPolicy = "allowlist" | "open";
