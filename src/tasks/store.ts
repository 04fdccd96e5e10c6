import type postgres from "postgres";
import { randomUUID } from "node:crypto";
import { z } from "zod/v4";
import { validateTaskCommand } from "./commands.ts";
import { StoreUnavailableError } from "./errors.ts";
import { parseSchedule } from "./schedule.ts";
import type { CommandPolicy, ScheduledTask, TaskDraft, TaskResult, TaskUpdate } from "./types.ts";

/**
 * Durable registry of scheduled tasks. All operations act on a single
 * task's record; nothing spans several records.
 */
export interface TaskStore {
  create(draft: TaskDraft): Promise<ScheduledTask>;
  /** All tasks in creation order. */
  list(): Promise<ScheduledTask[]>;
  get(id: string): Promise<ScheduledTask | null>;
  update(id: string, fields: TaskUpdate): Promise<ScheduledTask | null>;
  /** Returns false when the task does not exist. */
  delete(id: string): Promise<boolean>;
  /**
   * Record the outcome of a run. A no-op returning false when the task has
   * been deleted meanwhile or `at` is older than the stored last run.
   */
  recordRun(id: string, at: Date, result: TaskResult): Promise<boolean>;
}

interface TaskRow {
  id: string;
  name: string;
  command: string;
  schedule: string;
  enabled: boolean;
  last_run_at: Date | null;
  last_result: unknown;
  consecutive_failures: number;
  created_at: Date;
  updated_at: Date;
}

const execErrorSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("InvalidCommand"), message: z.string() }),
  z.object({
    kind: z.literal("ContainerNotRunning"),
    message: z.string(),
    container: z.string(),
  }),
  z.object({ kind: z.literal("ConnectionFailed"), message: z.string() }),
  z.object({ kind: z.literal("ExecFailed"), message: z.string(), exitCode: z.number().optional() }),
  z.object({ kind: z.literal("Timeout"), message: z.string(), timeoutMs: z.number() }),
]);

const taskResultSchema = z.discriminatedUnion("status", [
  z.object({ status: z.literal("success"), output: z.string() }),
  z.object({ status: z.literal("failure"), error: execErrorSchema }),
]);

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export function isTaskId(value: string): boolean {
  return UUID_PATTERN.test(value);
}

export function parseTaskResult(value: unknown): TaskResult | undefined {
  if (value === null || value === undefined) {
    return undefined;
  }
  const parsed = taskResultSchema.safeParse(value);
  return parsed.success ? parsed.data : undefined;
}

/** Throws InvalidScheduleError / InvalidCommandError before anything is written. */
export function validateTaskFields(fields: TaskUpdate, policy: CommandPolicy): void {
  if (fields.schedule !== undefined) {
    parseSchedule(fields.schedule);
  }
  if (fields.command !== undefined) {
    validateTaskCommand(fields.command, policy);
  }
}

export interface TaskStoreOptions {
  commandPolicy: CommandPolicy;
}

export class PostgresTaskStore implements TaskStore {
  constructor(
    private sql: postgres.Sql,
    private options: TaskStoreOptions = { commandPolicy: "allowlist" },
  ) {}

  private rowToTask(row: TaskRow): ScheduledTask {
    return {
      id: row.id,
      name: row.name,
      command: row.command,
      schedule: row.schedule,
      enabled: row.enabled,
      lastRunAt: row.last_run_at ?? undefined,
      lastResult: parseTaskResult(row.last_result),
      consecutiveFailures: row.consecutive_failures,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }

  /** Run a query, turning driver failures into StoreUnavailableError. */
  private async query<T>(action: string, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new StoreUnavailableError(`Could not ${action}: ${reason}`, { cause: error });
    }
  }

  async create(draft: TaskDraft): Promise<ScheduledTask> {
    validateTaskFields(draft, this.options.commandPolicy);

    const id = randomUUID();
    const [row] = await this.query("create scheduled task", () => this.sql<TaskRow[]>`
      INSERT INTO scheduled_tasks (id, name, command, schedule, enabled)
      VALUES (
        ${id},
        ${draft.name.trim()},
        ${draft.command.trim()},
        ${draft.schedule.trim()},
        ${draft.enabled ?? true}
      )
      RETURNING *
    `);
    return this.rowToTask(row);
  }

  async list(): Promise<ScheduledTask[]> {
    const rows = await this.query("list scheduled tasks", () => this.sql<TaskRow[]>`
      SELECT * FROM scheduled_tasks ORDER BY seq
    `);
    return rows.map((row) => this.rowToTask(row));
  }

  async get(id: string): Promise<ScheduledTask | null> {
    if (!isTaskId(id)) {
      return null;
    }
    const [row] = await this.query("read scheduled task", () => this.sql<TaskRow[]>`
      SELECT * FROM scheduled_tasks WHERE id = ${id}
    `);
    return row ? this.rowToTask(row) : null;
  }

  async update(id: string, fields: TaskUpdate): Promise<ScheduledTask | null> {
    validateTaskFields(fields, this.options.commandPolicy);
    if (!isTaskId(id)) {
      return null;
    }

    const updateFields: string[] = [];
    const values: (string | boolean)[] = [];

    if (fields.name !== undefined) {
      values.push(fields.name.trim());
      updateFields.push(`name = $${values.length}`);
    }
    if (fields.command !== undefined) {
      values.push(fields.command.trim());
      updateFields.push(`command = $${values.length}`);
    }
    if (fields.schedule !== undefined) {
      values.push(fields.schedule.trim());
      updateFields.push(`schedule = $${values.length}`);
    }
    if (fields.enabled !== undefined) {
      values.push(fields.enabled);
      updateFields.push(`enabled = $${values.length}`);
    }

    if (updateFields.length === 0) {
      return this.get(id);
    }

    values.push(id);
    const rows = await this.query("update scheduled task", () =>
      this.sql.unsafe<TaskRow[]>(
        `UPDATE scheduled_tasks SET ${updateFields.join(", ")}, updated_at = now() WHERE id = $${values.length} RETURNING *`,
        values,
      ),
    );
    const [row] = rows;
    return row ? this.rowToTask(row) : null;
  }

  async delete(id: string): Promise<boolean> {
    if (!isTaskId(id)) {
      return false;
    }
    const result = await this.query("delete scheduled task", () =>
      this.sql`DELETE FROM scheduled_tasks WHERE id = ${id}`,
    );
    return result.count > 0;
  }

  async recordRun(id: string, at: Date, result: TaskResult): Promise<boolean> {
    if (!isTaskId(id)) {
      return false;
    }
    const succeeded = result.status === "success";
    const outcome = await this.query("record task run", () => this.sql`
      UPDATE scheduled_tasks SET
        last_run_at = ${at},
        last_result = ${JSON.stringify(result)}::jsonb,
        consecutive_failures = CASE WHEN ${succeeded} THEN 0 ELSE consecutive_failures + 1 END,
        updated_at = now()
      WHERE id = ${id}
        AND (last_run_at IS NULL OR last_run_at <= ${at})
    `);
    return outcome.count > 0;
  }
}
