import { randomUUID } from "node:crypto";
import { validateTaskFields, type TaskStore, type TaskStoreOptions } from "./store.ts";
import type { ScheduledTask, TaskDraft, TaskResult, TaskUpdate } from "./types.ts";

/**
 * TaskStore kept in process memory, with the same validation and recordRun
 * rules as the postgres store. The scheduler tests run against it.
 */
export class InMemoryTaskStore implements TaskStore {
  private tasks = new Map<string, ScheduledTask>();

  constructor(
    private options: TaskStoreOptions = { commandPolicy: "allowlist" },
    private now: () => Date = () => new Date(),
  ) {}

  async create(draft: TaskDraft): Promise<ScheduledTask> {
    validateTaskFields(draft, this.options.commandPolicy);

    const at = this.now();
    const task: ScheduledTask = {
      id: randomUUID(),
      name: draft.name.trim(),
      command: draft.command.trim(),
      schedule: draft.schedule.trim(),
      enabled: draft.enabled ?? true,
      consecutiveFailures: 0,
      createdAt: at,
      updatedAt: at,
    };
    this.tasks.set(task.id, task);
    return { ...task };
  }

  async list(): Promise<ScheduledTask[]> {
    return [...this.tasks.values()].map((task) => ({ ...task }));
  }

  async get(id: string): Promise<ScheduledTask | null> {
    const task = this.tasks.get(id);
    return task ? { ...task } : null;
  }

  async update(id: string, fields: TaskUpdate): Promise<ScheduledTask | null> {
    validateTaskFields(fields, this.options.commandPolicy);

    const task = this.tasks.get(id);
    if (!task) {
      return null;
    }

    const updated: ScheduledTask = {
      ...task,
      name: fields.name?.trim() ?? task.name,
      command: fields.command?.trim() ?? task.command,
      schedule: fields.schedule?.trim() ?? task.schedule,
      enabled: fields.enabled ?? task.enabled,
      updatedAt: this.now(),
    };
    this.tasks.set(id, updated);
    return { ...updated };
  }

  async delete(id: string): Promise<boolean> {
    return this.tasks.delete(id);
  }

  async recordRun(id: string, at: Date, result: TaskResult): Promise<boolean> {
    const task = this.tasks.get(id);
    if (!task) {
      return false;
    }
    if (task.lastRunAt && task.lastRunAt.getTime() > at.getTime()) {
      return false;
    }

    this.tasks.set(id, {
      ...task,
      lastRunAt: at,
      lastResult: result,
      consecutiveFailures: result.status === "success" ? 0 : task.consecutiveFailures + 1,
      updatedAt: this.now(),
    });
    return true;
  }
}
