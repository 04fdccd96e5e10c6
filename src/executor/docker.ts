/**
 * docker CLI argument building and failure classification, shared by the
 * local and SSH backends (the SSH backend runs the same docker CLI remotely).
 */

import type { ProcessResult } from "./process.ts";
import type { ExecError, ExecResult, ExecutorOptions } from "./types.ts";

const NOT_RUNNING = [/no such container/i, /no such object/i, /is not running/i, /is paused/i];
const DAEMON_UNREACHABLE = [
  /cannot connect to the docker daemon/i,
  /error during connect/i,
  /permission denied while trying to connect to the docker daemon/i,
];

export function inspectArgs(container: string): string[] {
  return ["inspect", "--format", "{{.State.Running}}", container];
}

export function sendArgs(options: ExecutorOptions, container: string, command: string): string[] {
  return ["exec", "-i", container, options.consoleSendCommand, command];
}

/**
 * Runs inside the container with the archive name as `$1`. The world folder
 * is the server's `level-name`; archives land in /data/backups.
 */
export const BACKUP_SCRIPT = [
  "set -e",
  'world=$(sed -n "s/^level-name=//p" /data/server.properties 2>/dev/null | tr -d "\\r")',
  '[ -n "$world" ] || world="Bedrock level"',
  "mkdir -p /data/backups",
  "cd /data/worlds",
  'tar -czf "/data/backups/$1.tar.gz" "$world"',
  'echo "Backup created: $1.tar.gz"',
].join("; ");

export function backupArgs(container: string, name: string): string[] {
  return ["exec", "-i", container, "sh", "-c", BACKUP_SCRIPT, "sh", name];
}

export function timeoutError(timeoutMs: number): ExecError {
  return {
    kind: "Timeout",
    message: `no response within ${timeoutMs}ms; the command may still have reached the server`,
    timeoutMs,
  };
}

/** Map a failed docker invocation onto the executor's error taxonomy. */
export function classifyDockerFailure(
  result: ProcessResult,
  container: string,
  timeoutMs: number,
): ExecError {
  if (result.timedOut) {
    return timeoutError(timeoutMs);
  }

  const stderr = result.stderr.trim();
  if (NOT_RUNNING.some((pattern) => pattern.test(stderr))) {
    return {
      kind: "ContainerNotRunning",
      message: stderr || `container "${container}" is not running`,
      container,
    };
  }
  if (DAEMON_UNREACHABLE.some((pattern) => pattern.test(stderr))) {
    return { kind: "ConnectionFailed", message: stderr };
  }

  return {
    kind: "ExecFailed",
    message: stderr || `exited with code ${result.exitCode ?? "unknown"}`,
    exitCode: result.exitCode ?? undefined,
  };
}

/** Interpret `docker inspect --format {{.State.Running}}` output. */
export function interpretInspect(
  result: ProcessResult,
  container: string,
  timeoutMs: number,
): ExecResult {
  if (result.exitCode !== 0) {
    return { ok: false, error: classifyDockerFailure(result, container, timeoutMs) };
  }
  if (result.stdout.trim() !== "true") {
    return {
      ok: false,
      error: {
        kind: "ContainerNotRunning",
        message: `container "${container}" is stopped`,
        container,
      },
    };
  }
  return { ok: true, output: "running" };
}

export function interpretSend(
  result: ProcessResult,
  container: string,
  timeoutMs: number,
): ExecResult {
  if (result.exitCode === 0) {
    return { ok: true, output: result.stdout.trim() };
  }
  return { ok: false, error: classifyDockerFailure(result, container, timeoutMs) };
}
