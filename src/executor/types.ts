import type { ConnectionProfile } from "../config/connection.ts";

export type ExecError =
  | { kind: "InvalidCommand"; message: string }
  | { kind: "ContainerNotRunning"; message: string; container: string }
  | { kind: "ConnectionFailed"; message: string }
  | { kind: "ExecFailed"; message: string; exitCode?: number }
  | { kind: "Timeout"; message: string; timeoutMs: number };

export type ExecResult = { ok: true; output: string } | { ok: false; error: ExecError };

/**
 * Sends one console command to the managed server.
 *
 * Implementations never throw for backend failures and never retry:
 * every failure comes back as an `ExecError` value.
 */
export interface CommandExecutor {
  execute(command: string, profile: ConnectionProfile, timeoutMs: number): Promise<ExecResult>;
  /** Archive the world directory inside the container as `<name>.tar.gz`. */
  backup(name: string, profile: ConnectionProfile, timeoutMs: number): Promise<ExecResult>;
}

export interface ExecutorOptions {
  /** Path of the docker CLI on the target host (default: "docker") */
  dockerPath: string;
  /** Program inside the container that injects text into the server console */
  consoleSendCommand: string;
  /** OpenSSH ControlPath for connection reuse; unset disables multiplexing */
  sshControlPath?: string;
}

export function describeExecError(error: ExecError): string {
  return `${error.kind}: ${error.message}`;
}
