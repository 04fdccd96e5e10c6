/**
 * SchedulerDaemon: boots the database, the scheduler and outcome logging,
 * and tears them down on shutdown.
 */

import type { AppConfig } from "../config/env.ts";
import { validateConfig } from "../config/env.ts";
import { closeDb, getDb } from "../db/client.ts";
import { runMigrations } from "../db/migrate.ts";
import { describeExecError } from "../executor/types.ts";
import {
  createSchedulerSystem,
  type SchedulerLoop,
  type SchedulerSystem,
  type StoreAlertEvent,
  type TaskOutcome,
  type TaskSkippedEvent,
} from "../scheduler/index.ts";
import { installSignalHandlers, writePidFile } from "./lifecycle.ts";

/** One line per completed run, for the log viewer and anything tailing the log. */
export function formatOutcome(outcome: TaskOutcome): string {
  const status =
    outcome.result.status === "success"
      ? `ok ${JSON.stringify(outcome.result.output)}`
      : `failed ${describeExecError(outcome.result.error)}`;
  const recorded = outcome.recorded ? "" : " (not recorded)";
  return `[outcome] ${outcome.at.toISOString()} task=${outcome.taskId} ${status} ${outcome.durationMs}ms${recorded}`;
}

export function attachOutcomeLogging(loop: SchedulerLoop): void {
  loop.on("task-completed", (outcome: TaskOutcome) => {
    console.log(formatOutcome(outcome));
  });

  loop.on("task-skipped", (event: TaskSkippedEvent) => {
    if (event.reason === "in-flight") {
      console.log(`[daemon] Task ${event.taskId} still running, not dispatched again`);
    }
  });

  loop.on("store-alert", (alert: StoreAlertEvent) => {
    console.error(
      `[daemon] ALERT task store unavailable for ${alert.consecutive} consecutive ticks: ${alert.error}`,
    );
  });
}

export class SchedulerDaemon {
  private system: SchedulerSystem | null = null;

  constructor(private config: AppConfig) {}

  async start(): Promise<void> {
    console.log("[daemon] Starting...");

    const problems = validateConfig(this.config);
    if (problems.length > 0) {
      throw new Error(`Invalid configuration:\n  ${problems.join("\n  ")}`);
    }

    await runMigrations();

    const system = createSchedulerSystem(getDb(), this.config);
    attachOutcomeLogging(system.loop);
    this.system = system;

    writePidFile();
    installSignalHandlers(() => this.stop());

    const tasks = await system.store.list();
    const enabled = tasks.filter((task) => task.enabled).length;
    console.log(`[daemon] Loaded ${tasks.length} task(s), ${enabled} enabled`);

    system.start();
  }

  async stop(): Promise<void> {
    if (this.system) {
      await this.system.stop();
      this.system = null;
    }
    await closeDb();
  }
}
