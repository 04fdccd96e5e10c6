import type { Command } from "commander";
import chalk from "chalk";
import { CONNECTION_CONFIG_KEY, describeProfile, parseConnectionProfile } from "../config/connection.ts";
import { closeDb } from "../db/client.ts";
import { deleteConfigValue, getConfigValue, listConfig, setConfigValue } from "../db/config.ts";
import { runMigrations } from "../db/migrate.ts";

/** Values are read as JSON when they parse, otherwise kept as plain strings. */
export function parseConfigValue(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return raw;
  }
}

async function withConfig<T>(fn: () => Promise<T>): Promise<T> {
  try {
    await runMigrations();
    return await fn();
  } finally {
    await closeDb();
  }
}

export function registerConfigCommand(program: Command): void {
  const cmd = program.command("config").description("Manage stored settings, including the connection profile");

  cmd
    .command("get <key>")
    .description("Get a config value")
    .action(async (key: string) => {
      const value = await withConfig(() => getConfigValue(key));
      if (value === null) {
        console.log(chalk.dim("(not set)"));
      } else {
        console.log(JSON.stringify(value, null, 2));
      }
    });

  cmd
    .command("set <key> <value>")
    .description(
      `Set a config value (parsed as JSON), e.g. set ${CONNECTION_CONFIG_KEY} '{"mode":"local","container":"bedrock"}'`,
    )
    .action(async (key: string, value: string) => {
      let parsed = parseConfigValue(value);
      if (key === CONNECTION_CONFIG_KEY) {
        try {
          parsed = parseConnectionProfile(parsed);
        } catch (error) {
          console.error(chalk.red(error instanceof Error ? error.message : String(error)));
          process.exit(1);
        }
      }

      await withConfig(() => setConfigValue(key, parsed));
      console.log(chalk.green(`Set ${key}`));
      if (key === CONNECTION_CONFIG_KEY) {
        console.log(chalk.dim(`  ${describeProfile(parseConnectionProfile(parsed))}`));
      }
    });

  cmd
    .command("delete <key>")
    .description("Delete a config value")
    .action(async (key: string) => {
      const deleted = await withConfig(() => deleteConfigValue(key));
      console.log(deleted ? chalk.green(`Deleted ${key}`) : chalk.dim(`${key} was not set`));
    });

  cmd
    .command("list")
    .description("List all config values")
    .action(async () => {
      const items = await withConfig(() => listConfig());
      if (items.length === 0) {
        console.log(chalk.dim("No config values set"));
        return;
      }
      for (const item of items) {
        console.log(`${chalk.bold(item.key)}: ${JSON.stringify(item.value)}`);
      }
    });
}
