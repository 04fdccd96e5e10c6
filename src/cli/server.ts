import type { Command } from "commander";
import chalk from "chalk";
import { describeProfile, loadConnectionProfile } from "../config/connection.ts";
import { loadEnvConfig } from "../config/env.ts";
import { closeDb } from "../db/client.ts";
import { runMigrations } from "../db/migrate.ts";
import { ConsoleExecutor, describeExecError, type ExecResult } from "../executor/index.ts";

function report(result: ExecResult): void {
  if (!result.ok) {
    console.error(chalk.red(describeExecError(result.error)));
    process.exitCode = 1;
    return;
  }
  if (result.output) {
    console.log(result.output);
  }
}

export function registerServerCommand(program: Command): void {
  const cmd = program.command("server").description("Talk to the Bedrock server console");

  cmd
    .command("send <command...>")
    .description('Send one console command, e.g. server send say "hello"')
    .action(async (words: string[]) => {
      const cfg = loadEnvConfig();
      try {
        await runMigrations();
        const profile = await loadConnectionProfile();
        const executor = new ConsoleExecutor(cfg.executor);
        report(await executor.execute(words.join(" "), profile, cfg.execTimeoutMs));
      } finally {
        await closeDb();
      }
    });

  cmd
    .command("status")
    .description("Check that the server container is reachable and running")
    .action(async () => {
      const cfg = loadEnvConfig();
      try {
        await runMigrations();
        const profile = await loadConnectionProfile();
        console.log(chalk.dim(describeProfile(profile)));
        const executor = new ConsoleExecutor(cfg.executor);
        const result = await executor.checkContainer(profile, cfg.execTimeoutMs);
        if (result.ok) {
          console.log(chalk.green("Server container is running"));
        } else {
          report(result);
        }
      } finally {
        await closeDb();
      }
    });
}
