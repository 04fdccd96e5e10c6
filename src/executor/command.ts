/**
 * Console command checks and shell quoting shared by both backends.
 */

const CONTROL_CHARS = /[\x00-\x1f\x7f]/;

/**
 * Returns a reason when `command` cannot be sent to the server console,
 * or null when it is acceptable.
 */
export function checkConsoleCommand(command: string): string | null {
  if (command.trim() === "") {
    return "command is empty";
  }
  if (CONTROL_CHARS.test(command)) {
    return "command contains control characters";
  }
  return null;
}

/**
 * Quote a value for a POSIX shell: wrap in single quotes and turn every
 * embedded `'` into `'\''`.
 */
export function shellQuote(value: string): string {
  if (value !== "" && /^[A-Za-z0-9_@%+=:,./-]+$/.test(value)) {
    return value;
  }
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/** Split a chained task command ("say hi && save-all") into its parts. */
export function splitCommandChain(command: string): string[] {
  return command
    .split(" && ")
    .map((part) => part.trim())
    .filter((part) => part !== "");
}

const BACKUP_NAME = /^[\w.-]+$/;

/** Archive names become a file under /data/backups; no separators or `..`. */
export function checkBackupName(name: string): string | null {
  if (!BACKUP_NAME.test(name) || name.includes("..")) {
    return `invalid backup name "${name}"`;
  }
  return null;
}
