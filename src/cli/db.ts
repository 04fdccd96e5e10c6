import type { Command } from "commander";
import chalk from "chalk";
import { runMigrations } from "../db/migrate.ts";
import { closeDb } from "../db/client.ts";

export function registerDbCommand(program: Command): void {
  const cmd = program.command("db").description("Database management");

  cmd
    .command("migrate")
    .description("Create the config and scheduled_tasks tables if missing")
    .action(async () => {
      try {
        await runMigrations();
        console.log(chalk.green("Database migrations complete"));
      } catch (error) {
        console.error(
          chalk.red("Migration failed:"),
          error instanceof Error ? error.message : error,
        );
        process.exitCode = 1;
      } finally {
        await closeDb();
      }
    });
}
