import type { ConnectionProfile } from "../config/connection.ts";
import { checkBackupName, checkConsoleCommand } from "./command.ts";
import { LocalExecutor } from "./local.ts";
import { SshExecutor } from "./ssh.ts";
import type { CommandExecutor, ExecResult, ExecutorOptions } from "./types.ts";

export * from "./types.ts";
export { checkBackupName, checkConsoleCommand, shellQuote, splitCommandChain } from "./command.ts";

/**
 * Routes a console command to the backend named by the connection profile.
 */
export class ConsoleExecutor implements CommandExecutor {
  private local: LocalExecutor;
  private ssh: SshExecutor;

  constructor(options: ExecutorOptions) {
    this.local = new LocalExecutor(options);
    this.ssh = new SshExecutor(options);
  }

  async execute(command: string, profile: ConnectionProfile, timeoutMs: number): Promise<ExecResult> {
    const problem = checkConsoleCommand(command);
    if (problem) {
      return { ok: false, error: { kind: "InvalidCommand", message: problem } };
    }

    const text = command.trim();
    if (profile.mode === "local") {
      return this.local.execute(text, profile, timeoutMs);
    }
    return this.ssh.execute(text, profile, timeoutMs);
  }

  async backup(name: string, profile: ConnectionProfile, timeoutMs: number): Promise<ExecResult> {
    const problem = checkBackupName(name);
    if (problem) {
      return { ok: false, error: { kind: "InvalidCommand", message: problem } };
    }
    if (profile.mode === "local") {
      return this.local.backup(name, profile, timeoutMs);
    }
    return this.ssh.backup(name, profile, timeoutMs);
  }

  /** Report whether the managed container is reachable and running. */
  async checkContainer(profile: ConnectionProfile, timeoutMs: number): Promise<ExecResult> {
    if (profile.mode === "local") {
      return this.local.checkContainer(profile, timeoutMs);
    }
    return this.ssh.checkContainer(profile, timeoutMs);
  }
}
