import type postgres from "postgres";
import type { AppConfig } from "../config/env.ts";
import { loadConnectionProfile } from "../config/connection.ts";
import { ConsoleExecutor } from "../executor/index.ts";
import { PostgresTaskStore } from "../tasks/store.ts";
import { InFlightRegistry } from "./in-flight.ts";
import { SchedulerLoop } from "./loop.ts";

export * from "./in-flight.ts";
export * from "./loop.ts";
export * from "./runner.ts";

export interface SchedulerSystem {
  store: PostgresTaskStore;
  executor: ConsoleExecutor;
  loop: SchedulerLoop;
  start: () => void;
  stop: () => Promise<void>;
}

/**
 * Wire the postgres task store, the console executor and the loop together.
 */
export function createSchedulerSystem(db: postgres.Sql, config: AppConfig): SchedulerSystem {
  const store = new PostgresTaskStore(db, { commandPolicy: config.commandPolicy });
  const executor = new ConsoleExecutor(config.executor);
  const loop = new SchedulerLoop(
    { store, executor, loadProfile: loadConnectionProfile, inFlight: new InFlightRegistry() },
    {
      tickIntervalMs: config.tickIntervalMs,
      execTimeoutMs: config.execTimeoutMs,
      backupTimeoutMs: config.backupTimeoutMs,
      storeTimeoutMs: config.storeTimeoutMs,
      storeAlertThreshold: config.storeAlertThreshold,
      timezone: config.timezone,
    },
  );

  return {
    store,
    executor,
    loop,

    start() {
      loop.start();
    },

    async stop() {
      await loop.stop();
    },
  };
}
