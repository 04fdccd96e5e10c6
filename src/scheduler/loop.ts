import { EventEmitter } from "node:events";
import type { ConnectionProfile } from "../config/connection.ts";
import type { CommandExecutor } from "../executor/types.ts";
import { isTaskDue } from "../tasks/schedule.ts";
import type { TaskStore } from "../tasks/store.ts";
import type { ScheduledTask } from "../tasks/types.ts";
import { withTimeout } from "../utils/promises.ts";
import { InFlightRegistry } from "./in-flight.ts";
import { DEFAULT_BACKUP_TIMEOUT_MS, runTask, type TaskOutcome } from "./runner.ts";

export interface SchedulerLoopOptions {
  tickIntervalMs: number;
  execTimeoutMs: number;
  backupTimeoutMs: number;
  storeTimeoutMs: number;
  /** Consecutive skipped ticks that raise a `store-alert` */
  storeAlertThreshold: number;
  timezone?: string;
}

export interface SchedulerLoopDeps {
  store: TaskStore;
  executor: CommandExecutor;
  /** Reloaded once per tick; the last good profile is kept if a reload fails */
  loadProfile: () => Promise<ConnectionProfile>;
  inFlight?: InFlightRegistry;
  now?: () => Date;
}

export type TaskSkipReason = "in-flight" | "invalid-schedule";

export interface TaskSkippedEvent {
  taskId: string;
  reason: TaskSkipReason;
  detail?: string;
}

export interface TickSkippedEvent {
  at: Date;
  reason: "store-unavailable" | "profile-unavailable";
  error: string;
  /** Consecutive store-unavailable ticks, including this one */
  consecutive: number;
}

export interface StoreAlertEvent {
  at: Date;
  consecutive: number;
  error: string;
}

export type TickSummary =
  | { status: "skipped"; reason: TickSkippedEvent["reason"] | "stopped" }
  | { status: "ran"; checked: number; dispatched: string[]; busy: string[] };

const DEFAULT_OPTIONS: SchedulerLoopOptions = {
  tickIntervalMs: 60_000,
  execTimeoutMs: 30_000,
  backupTimeoutMs: DEFAULT_BACKUP_TIMEOUT_MS,
  storeTimeoutMs: 10_000,
  storeAlertThreshold: 3,
};

/**
 * Single coordinating loop. Each tick reads the store, reloads the
 * connection profile and dispatches every due task that is not already
 * running. Emits:
 *
 * - `task-completed` (TaskOutcome), one per finished run
 * - `task-skipped` (TaskSkippedEvent)
 * - `tick-skipped` (TickSkippedEvent)
 * - `store-alert` (StoreAlertEvent), once per outage when the skipped-tick
 *   count reaches `storeAlertThreshold`
 */
export class SchedulerLoop extends EventEmitter {
  private timer: NodeJS.Timeout | null = null;
  private stopped = false;
  private ticks = new Set<Promise<void>>();
  private pending = new Set<Promise<void>>();
  private consecutiveStoreFailures = 0;
  private profile: ConnectionProfile | null = null;
  private options: SchedulerLoopOptions;
  private inFlight: InFlightRegistry;
  private now: () => Date;

  constructor(
    private deps: SchedulerLoopDeps,
    options: Partial<SchedulerLoopOptions> = {},
  ) {
    super();
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.inFlight = deps.inFlight ?? new InFlightRegistry();
    this.now = deps.now ?? (() => new Date());
  }

  start(): void {
    if (this.timer) {
      return;
    }

    this.stopped = false;
    this.timer = setInterval(() => this.safeTick(), this.options.tickIntervalMs);
    this.safeTick();

    console.log(`[scheduler] Started, ticking every ${this.options.tickIntervalMs}ms`);
  }

  /**
   * Stop ticking, let a tick that is still reading the store finish without
   * dispatching, then wait for in-flight runs to finish.
   */
  async stop(): Promise<void> {
    this.stopped = true;
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    await Promise.allSettled([...this.ticks]);

    if (this.inFlight.size > 0) {
      console.log(`[scheduler] Waiting for ${this.inFlight.size} in-flight run(s)`);
    }
    await Promise.allSettled([...this.pending]);
    console.log("[scheduler] Stopped");
  }

  /** Resolves once every run dispatched so far has been recorded. */
  async drain(): Promise<void> {
    await Promise.allSettled([...this.pending]);
  }

  async tick(now: Date = this.now()): Promise<TickSummary> {
    let tasks: ScheduledTask[];
    try {
      tasks = await withTimeout(
        this.deps.store.list(),
        this.options.storeTimeoutMs,
        `task store did not answer within ${this.options.storeTimeoutMs}ms`,
      );
    } catch (err) {
      return this.skipForStore(now, err);
    }
    this.consecutiveStoreFailures = 0;

    const profile = await this.refreshProfile(now);
    if (!profile) {
      return { status: "skipped", reason: "profile-unavailable" };
    }
    if (this.stopped) {
      return { status: "skipped", reason: "stopped" };
    }

    const dispatched: string[] = [];
    const busy: string[] = [];

    for (const task of tasks) {
      let due: boolean;
      try {
        due = isTaskDue(task, now, this.options.timezone);
      } catch (err) {
        const detail = err instanceof Error ? err.message : String(err);
        console.error(`[scheduler] Skipping task ${task.id}: ${detail}`);
        this.emit("task-skipped", { taskId: task.id, reason: "invalid-schedule", detail });
        continue;
      }

      if (!due) {
        continue;
      }

      if (!this.inFlight.tryAcquire(task.id)) {
        busy.push(task.id);
        this.emit("task-skipped", { taskId: task.id, reason: "in-flight" });
        continue;
      }

      this.dispatch(task, profile, now);
      dispatched.push(task.id);
    }

    return { status: "ran", checked: tasks.length, dispatched, busy };
  }

  private dispatch(task: ScheduledTask, profile: ConnectionProfile, at: Date): void {
    const run = runTask(task, profile, at, {
      executor: this.deps.executor,
      store: this.deps.store,
      execTimeoutMs: this.options.execTimeoutMs,
      backupTimeoutMs: this.options.backupTimeoutMs,
    })
      .then((outcome: TaskOutcome) => {
        this.emit("task-completed", outcome);
      })
      .catch((err) => {
        console.error(`[scheduler] Outcome handler failed for task ${task.id}:`, err);
      })
      .finally(() => {
        this.inFlight.release(task.id);
        this.pending.delete(run);
      });

    this.pending.add(run);
  }

  private skipForStore(now: Date, err: unknown): TickSummary {
    this.consecutiveStoreFailures += 1;
    const error = err instanceof Error ? err.message : String(err);
    const consecutive = this.consecutiveStoreFailures;

    console.warn(`[scheduler] Tick skipped, task store unavailable (${consecutive}x): ${error}`);
    const skipped: TickSkippedEvent = { at: now, reason: "store-unavailable", error, consecutive };
    this.emit("tick-skipped", skipped);

    if (consecutive === this.options.storeAlertThreshold) {
      const alert: StoreAlertEvent = { at: now, consecutive, error };
      this.emit("store-alert", alert);
    }

    return { status: "skipped", reason: "store-unavailable" };
  }

  private async refreshProfile(now: Date): Promise<ConnectionProfile | null> {
    try {
      this.profile = await this.deps.loadProfile();
    } catch (err) {
      const error = err instanceof Error ? err.message : String(err);
      if (this.profile) {
        console.warn(`[scheduler] Connection profile reload failed, keeping previous: ${error}`);
      } else {
        console.error(`[scheduler] Tick skipped, no connection profile: ${error}`);
        const skipped: TickSkippedEvent = {
          at: now,
          reason: "profile-unavailable",
          error,
          consecutive: this.consecutiveStoreFailures,
        };
        this.emit("tick-skipped", skipped);
      }
    }
    return this.profile;
  }

  private safeTick(): void {
    const run = this.tick()
      .then(() => undefined)
      .catch((err) => {
        console.error("[scheduler] Tick failed:", err);
      })
      .finally(() => {
        this.ticks.delete(run);
      });
    this.ticks.add(run);
  }
}
