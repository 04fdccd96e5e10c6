import type { LocalProfile } from "../config/connection.ts";
import {
  backupArgs,
  inspectArgs,
  interpretInspect,
  interpretSend,
  sendArgs,
  timeoutError,
} from "./docker.ts";
import { runProcess, type ProcessResult } from "./process.ts";
import type { ExecResult, ExecutorOptions } from "./types.ts";

/** Talks to a container on this host through the docker CLI and its socket. */
export class LocalExecutor {
  constructor(private options: ExecutorOptions) {}

  /** Check that the container exists and is running. */
  async checkContainer(profile: LocalProfile, timeoutMs: number): Promise<ExecResult> {
    const result = await this.docker(inspectArgs(profile.container), timeoutMs);
    if (result.spawnError) {
      return this.dockerMissing(result.spawnError);
    }
    return interpretInspect(result, profile.container, timeoutMs);
  }

  execute(command: string, profile: LocalProfile, timeoutMs: number): Promise<ExecResult> {
    return this.inRunningContainer(
      sendArgs(this.options, profile.container, command),
      profile,
      timeoutMs,
    );
  }

  backup(name: string, profile: LocalProfile, timeoutMs: number): Promise<ExecResult> {
    return this.inRunningContainer(backupArgs(profile.container, name), profile, timeoutMs);
  }

  /** Inspect, then run `args` in the time left of one shared deadline. */
  private async inRunningContainer(
    args: string[],
    profile: LocalProfile,
    timeoutMs: number,
  ): Promise<ExecResult> {
    const deadline = Date.now() + timeoutMs;

    const running = await this.checkContainer(profile, timeoutMs);
    if (!running.ok) {
      return running;
    }

    const remaining = deadline - Date.now();
    if (remaining <= 0) {
      return { ok: false, error: timeoutError(timeoutMs) };
    }

    const result = await this.docker(args, remaining);
    if (result.spawnError) {
      return this.dockerMissing(result.spawnError);
    }
    return interpretSend(result, profile.container, timeoutMs);
  }

  private docker(args: string[], timeoutMs: number): Promise<ProcessResult> {
    return runProcess(this.options.dockerPath, args, { timeoutMs });
  }

  private dockerMissing(code: string): ExecResult {
    return {
      ok: false,
      error: {
        kind: "ConnectionFailed",
        message: `could not start ${this.options.dockerPath} (${code})`,
      },
    };
  }
}
