import { setTimeout as sleep } from "node:timers/promises";
import type { ConnectionProfile } from "../config/connection.ts";
import { splitCommandChain } from "../executor/command.ts";
import { timeoutError } from "../executor/docker.ts";
import { describeExecError, type CommandExecutor } from "../executor/types.ts";
import { isBackupCommand } from "../tasks/commands.ts";
import type { TaskStore } from "../tasks/store.ts";
import type { ScheduledTask, TaskResult } from "../tasks/types.ts";

export interface TaskOutcome {
  taskId: string;
  taskName: string;
  /** Dispatch time, stored as the task's lastRunAt */
  at: Date;
  durationMs: number;
  result: TaskResult;
  /** False when the task was deleted mid-run or the store write failed */
  recorded: boolean;
}

export interface TaskRunnerDeps {
  executor: CommandExecutor;
  store: TaskStore;
  /** Budget for a whole command chain */
  execTimeoutMs: number;
  /** Budget for the archive step of an `@backup` task (default 5 minutes) */
  backupTimeoutMs?: number;
  /** Pause between save-all and the archive step (default 2s) */
  saveSettleMs?: number;
}

export const DEFAULT_BACKUP_TIMEOUT_MS = 300_000;
export const DEFAULT_SAVE_SETTLE_MS = 2000;

/** `auto_YYYYMMDD_HHMMSS` from the dispatch time, in UTC. */
export function backupName(at: Date): string {
  const stamp = at.toISOString().slice(0, 19).replace(/[-:]/g, "").replace("T", "_");
  return `auto_${stamp}`;
}

/** Flush the world with save-all, give the server a moment, then archive it. */
async function executeBackup(
  profile: ConnectionProfile,
  at: Date,
  deps: TaskRunnerDeps,
): Promise<TaskResult> {
  const saved = await deps.executor.execute("save-all", profile, deps.execTimeoutMs);
  if (!saved.ok) {
    return { status: "failure", error: saved.error };
  }

  await sleep(deps.saveSettleMs ?? DEFAULT_SAVE_SETTLE_MS);

  const name = backupName(at);
  console.log(`[scheduler] Creating backup ${name}`);
  const archived = await deps.executor.backup(
    name,
    profile,
    deps.backupTimeoutMs ?? DEFAULT_BACKUP_TIMEOUT_MS,
  );
  if (!archived.ok) {
    return { status: "failure", error: archived.error };
  }

  const output = [saved.output, archived.output].filter((text) => text !== "").join("\n");
  return { status: "success", output };
}

/**
 * Send every part of the task's command in order, stopping at the first
 * failure. The parts share one deadline. Outputs are joined with newlines.
 */
async function executeChain(
  task: ScheduledTask,
  profile: ConnectionProfile,
  deps: TaskRunnerDeps,
): Promise<TaskResult> {
  const parts = splitCommandChain(task.command);
  if (parts.length === 0) {
    return { status: "failure", error: { kind: "InvalidCommand", message: "command is empty" } };
  }

  const deadline = Date.now() + deps.execTimeoutMs;
  const outputs: string[] = [];
  for (const part of parts) {
    const remaining = deadline - Date.now();
    if (remaining <= 0) {
      return { status: "failure", error: timeoutError(deps.execTimeoutMs) };
    }
    const result = await deps.executor.execute(part, profile, remaining);
    if (!result.ok) {
      return { status: "failure", error: result.error };
    }
    if (result.output !== "") {
      outputs.push(result.output);
    }
  }

  return { status: "success", output: outputs.join("\n") };
}

/**
 * Run one due task end to end and record the outcome. Never rejects:
 * executor and store failures end up in the returned outcome and the log.
 */
export async function runTask(
  task: ScheduledTask,
  profile: ConnectionProfile,
  at: Date,
  deps: TaskRunnerDeps,
): Promise<TaskOutcome> {
  const started = Date.now();

  let result: TaskResult;
  try {
    result = isBackupCommand(task.command)
      ? await executeBackup(profile, at, deps)
      : await executeChain(task, profile, deps);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    result = { status: "failure", error: { kind: "ExecFailed", message } };
  }

  let recorded = false;
  try {
    recorded = await deps.store.recordRun(task.id, at, result);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`[scheduler] Could not record run of task ${task.id}: ${message}`);
  }

  const durationMs = Date.now() - started;
  if (result.status === "success") {
    console.log(`[scheduler] Task "${task.name}" (${task.id}) ok in ${durationMs}ms`);
  } else {
    console.warn(
      `[scheduler] Task "${task.name}" (${task.id}) failed in ${durationMs}ms: ${describeExecError(result.error)}`,
    );
  }

  return { taskId: task.id, taskName: task.name, at, durationMs, result, recorded };
}
