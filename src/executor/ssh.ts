import { expandHome, type SshProfile } from "../config/connection.ts";
import { shellQuote } from "./command.ts";
import { backupArgs, inspectArgs, interpretInspect, interpretSend, sendArgs } from "./docker.ts";
import { runProcess, type ProcessResult } from "./process.ts";
import type { ExecResult, ExecutorOptions } from "./types.ts";

/** OpenSSH reserves exit status 255 for its own errors (unreachable host, auth failure). */
const SSH_ERROR_EXIT = 255;

/**
 * Build the ssh argv. The remote side runs `remoteArgs` through its login
 * shell, so each element is single-quoted before joining.
 */
export function buildSshArgs(
  profile: SshProfile,
  remoteArgs: string[],
  options: ExecutorOptions,
  timeoutMs: number,
): string[] {
  const connectTimeout = Math.min(30, Math.max(1, Math.ceil(timeoutMs / 1000)));

  const args = [
    "-i",
    expandHome(profile.keyPath),
    "-p",
    String(profile.port),
    "-o",
    "BatchMode=yes",
    "-o",
    `ConnectTimeout=${connectTimeout}`,
    "-o",
    "LogLevel=ERROR",
  ];

  if (profile.strictHostKeyChecking) {
    args.push("-o", "StrictHostKeyChecking=yes");
  } else {
    args.push("-o", "StrictHostKeyChecking=no", "-o", "UserKnownHostsFile=/dev/null");
  }

  if (options.sshControlPath) {
    args.push(
      "-o",
      "ControlMaster=auto",
      "-o",
      `ControlPath=${expandHome(options.sshControlPath)}`,
      "-o",
      "ControlPersist=60",
    );
  }

  args.push("--", `${profile.user}@${profile.host}`, remoteArgs.map(shellQuote).join(" "));
  return args;
}

/** Runs the docker CLI on a remote host over ssh with key-based authentication. */
export class SshExecutor {
  constructor(private options: ExecutorOptions) {}

  async checkContainer(profile: SshProfile, timeoutMs: number): Promise<ExecResult> {
    const result = await this.ssh(profile, inspectArgs(profile.container), timeoutMs);
    return this.connectionFailure(profile, result) ?? interpretInspect(result, profile.container, timeoutMs);
  }

  async execute(command: string, profile: SshProfile, timeoutMs: number): Promise<ExecResult> {
    const result = await this.ssh(
      profile,
      sendArgs(this.options, profile.container, command),
      timeoutMs,
    );
    return this.connectionFailure(profile, result) ?? interpretSend(result, profile.container, timeoutMs);
  }

  async backup(name: string, profile: SshProfile, timeoutMs: number): Promise<ExecResult> {
    const result = await this.ssh(profile, backupArgs(profile.container, name), timeoutMs);
    return this.connectionFailure(profile, result) ?? interpretSend(result, profile.container, timeoutMs);
  }

  private ssh(profile: SshProfile, dockerArgs: string[], timeoutMs: number): Promise<ProcessResult> {
    const remoteArgs = [this.options.dockerPath, ...dockerArgs];
    return runProcess("ssh", buildSshArgs(profile, remoteArgs, this.options, timeoutMs), {
      timeoutMs,
    });
  }

  private connectionFailure(profile: SshProfile, result: ProcessResult): ExecResult | null {
    if (result.spawnError) {
      return {
        ok: false,
        error: { kind: "ConnectionFailed", message: `could not start ssh (${result.spawnError})` },
      };
    }
    if (!result.timedOut && result.exitCode === SSH_ERROR_EXIT) {
      const detail = result.stderr.trim() || "connection or authentication failed";
      return {
        ok: false,
        error: {
          kind: "ConnectionFailed",
          message: `${profile.user}@${profile.host}:${profile.port}: ${detail}`,
        },
      };
    }
    return null;
  }
}
