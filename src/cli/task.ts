import type { Command } from "commander";
import chalk from "chalk";
import { loadEnvConfig } from "../config/env.ts";
import { loadConnectionProfile } from "../config/connection.ts";
import { closeDb, getDb } from "../db/client.ts";
import { runMigrations } from "../db/migrate.ts";
import { isDaemonRunning } from "../daemon/lifecycle.ts";
import { ConsoleExecutor } from "../executor/index.ts";
import { runTask } from "../scheduler/runner.ts";
import { describeSchedule, parseSchedule } from "../tasks/schedule.ts";
import { PostgresTaskStore } from "../tasks/store.ts";
import type { TaskUpdate } from "../tasks/types.ts";
import { colorResult, describeNextRun, printTaskDetails, summarizeResult } from "./format.ts";

async function withStore<T>(fn: (store: PostgresTaskStore) => Promise<T>): Promise<T> {
  const cfg = loadEnvConfig();
  try {
    await runMigrations();
    return await fn(new PostgresTaskStore(getDb(), { commandPolicy: cfg.commandPolicy }));
  } finally {
    await closeDb();
  }
}

function fail(message: string): never {
  console.error(chalk.red(message));
  process.exit(1);
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * A manual run cannot see the daemon's in-flight registry, so it is refused
 * while the daemon is up.
 */
export function manualRunRefusal(daemon: { running: boolean; pid: number | null }): string | null {
  if (!daemon.running) {
    return null;
  }
  return `Daemon is running (PID ${daemon.pid}) and may be running this task. Stop it with "bedrock-admin daemon stop" first.`;
}

export function registerTaskCommand(program: Command): void {
  const cmd = program.command("task").description("Manage scheduled console tasks");

  cmd
    .command("list")
    .description("List all scheduled tasks")
    .action(async () => {
      const { timezone } = loadEnvConfig();
      const tasks = await withStore((store) => store.list());

      if (tasks.length === 0) {
        console.log(chalk.dim("No scheduled tasks"));
        return;
      }

      console.log(chalk.bold("\nScheduled tasks:\n"));
      console.log(
        chalk.dim(
          "  " +
            "ID".padEnd(38) +
            "Name".padEnd(20) +
            "Schedule".padEnd(18) +
            "Next run".padEnd(26) +
            "Last result",
        ),
      );
      console.log(chalk.dim("  " + "-".repeat(120)));

      for (const task of tasks) {
        const name = task.enabled ? chalk.cyan(task.name.padEnd(20)) : chalk.yellow(task.name.padEnd(20));
        console.log(
          `  ${chalk.dim(task.id.padEnd(38))}${name}${task.schedule.padEnd(18)}${describeNextRun(task, timezone).padEnd(26)}${colorResult(task.lastResult)}`,
        );
      }
      console.log();
    });

  cmd
    .command("show <id>")
    .description("Show one task with its last result")
    .action(async (id: string) => {
      const { timezone } = loadEnvConfig();
      const task = await withStore((store) => store.get(id));
      if (!task) {
        fail(`No task found with id: ${id}`);
      }
      printTaskDetails(task, timezone);
    });

  cmd
    .command("create <name> <schedule>")
    .description('Create a task, e.g. create "Nightly save" "0 4 * * *" --command save-all')
    .requiredOption("-c, --command <text>", 'Console command; chain several with " && "')
    .option("--disabled", "Create the task disabled")
    .action(
      async (name: string, schedule: string, options: { command: string; disabled?: boolean }) => {
        try {
          const task = await withStore((store) =>
            store.create({ name, schedule, command: options.command, enabled: !options.disabled }),
          );
          console.log(chalk.green(`Created task: ${task.name}`));
          console.log(chalk.dim(`  ID:       ${task.id}`));
          console.log(chalk.dim(`  Schedule: ${describeSchedule(parseSchedule(task.schedule))}`));
          console.log(chalk.dim(`  Status:   ${task.enabled ? "enabled" : "disabled"}`));
        } catch (error) {
          fail(errorMessage(error));
        }
      },
    );

  cmd
    .command("update <id>")
    .description("Change a task's name, schedule or command")
    .option("--name <name>", "New name")
    .option("--schedule <schedule>", "New schedule")
    .option("-c, --command <text>", "New console command")
    .action(async (id: string, options: TaskUpdate) => {
      const fields: TaskUpdate = {
        name: options.name,
        schedule: options.schedule,
        command: options.command,
      };
      try {
        const task = await withStore((store) => store.update(id, fields));
        if (!task) {
          fail(`No task found with id: ${id}`);
        }
        console.log(chalk.green(`Updated task: ${task.name}`));
      } catch (error) {
        fail(errorMessage(error));
      }
    });

  for (const enabled of [true, false]) {
    const verb = enabled ? "enable" : "disable";
    cmd
      .command(`${verb} <id>`)
      .description(`${enabled ? "Enable" : "Disable"} a task`)
      .action(async (id: string) => {
        const task = await withStore((store) => store.update(id, { enabled }));
        if (!task) {
          fail(`No task found with id: ${id}`);
        }
        console.log(chalk.green(`${enabled ? "Enabled" : "Disabled"} task: ${task.name}`));
      });
  }

  cmd
    .command("delete <id>")
    .description("Delete a task")
    .action(async (id: string) => {
      const deleted = await withStore((store) => store.delete(id));
      if (!deleted) {
        fail(`No task found with id: ${id}`);
      }
      console.log(chalk.green(`Deleted task ${id}`));
    });

  cmd
    .command("run <id>")
    .description("Run a task once now and record the result")
    .action(async (id: string) => {
      const refusal = manualRunRefusal(isDaemonRunning());
      if (refusal) {
        fail(refusal);
      }

      const cfg = loadEnvConfig();
      const outcome = await withStore(async (store) => {
        const task = await store.get(id);
        if (!task) {
          return null;
        }
        const profile = await loadConnectionProfile();
        return runTask(task, profile, new Date(), {
          executor: new ConsoleExecutor(cfg.executor),
          store,
          execTimeoutMs: cfg.execTimeoutMs,
          backupTimeoutMs: cfg.backupTimeoutMs,
        });
      });

      if (!outcome) {
        fail(`No task found with id: ${id}`);
      }
      const summary = summarizeResult(outcome.result);
      if (outcome.result.status === "failure") {
        fail(`Task "${outcome.taskName}" failed: ${summary}`);
      }
      console.log(chalk.green(`Task "${outcome.taskName}" ran in ${outcome.durationMs}ms`));
      if (outcome.result.output) {
        console.log(outcome.result.output);
      }
    });
}
