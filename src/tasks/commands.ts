import allowedCommands from "./allowed-commands.json";
import { checkConsoleCommand, splitCommandChain } from "../executor/command.ts";
import { InvalidCommandError } from "./errors.ts";
import type { CommandPolicy } from "./types.ts";

const ALLOWED = new Set<string>(allowedCommands.map((name) => name.toLowerCase()));

/** Task command that archives the world instead of sending a console command. */
export const BACKUP_COMMAND = "@backup";

export function isBackupCommand(command: string): boolean {
  return command.trim().toLowerCase() === BACKUP_COMMAND;
}

/** First word of a console command, lowercased, without a leading slash. */
export function commandVerb(command: string): string {
  const [first = ""] = command.trim().split(/\s+/);
  return first.replace(/^\//, "").toLowerCase();
}

export function isAllowedCommand(command: string): boolean {
  return ALLOWED.has(commandVerb(command));
}

/**
 * Check a task command before it is stored. `@backup` stands alone. Otherwise
 * each " && " part must be a sendable console command and, under the
 * allowlist policy, start with a known administrative verb.
 */
export function validateTaskCommand(command: string, policy: CommandPolicy): string[] {
  const parts = splitCommandChain(command);
  if (parts.length === 0) {
    throw new InvalidCommandError(command, "command is empty");
  }
  if (isBackupCommand(command)) {
    return [BACKUP_COMMAND];
  }
  if (parts.some(isBackupCommand)) {
    throw new InvalidCommandError(command, `${BACKUP_COMMAND} cannot be chained with other commands`);
  }

  for (const part of parts) {
    const problem = checkConsoleCommand(part);
    if (problem) {
      throw new InvalidCommandError(command, problem);
    }
    if (policy === "allowlist" && !isAllowedCommand(part)) {
      throw new InvalidCommandError(
        command,
        `"${commandVerb(part)}" is not an allowed console command`,
      );
    }
  }

  return parts;
}
