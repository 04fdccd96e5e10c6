import { describe, expect, it } from "vitest";
import {
  BACKUP_SCRIPT,
  backupArgs,
  classifyDockerFailure,
  inspectArgs,
  interpretInspect,
  interpretSend,
  sendArgs,
} from "./docker.ts";
import type { ProcessResult } from "./process.ts";

const OPTIONS = { dockerPath: "docker", consoleSendCommand: "send-command" };

function result(overrides: Partial<ProcessResult> = {}): ProcessResult {
  return { exitCode: 0, stdout: "", stderr: "", timedOut: false, ...overrides };
}

describe("argument builders", () => {
  it("inspects the running state", () => {
    expect(inspectArgs("bedrock")).toEqual(["inspect", "--format", "{{.State.Running}}", "bedrock"]);
  });

  it("passes the command as a single argument", () => {
    expect(sendArgs(OPTIONS, "bedrock", "say hello world")).toEqual([
      "exec",
      "-i",
      "bedrock",
      "send-command",
      "say hello world",
    ]);
  });

  it("runs the archive script with the backup name as its first argument", () => {
    expect(backupArgs("bedrock", "auto_20260301_100000")).toEqual([
      "exec",
      "-i",
      "bedrock",
      "sh",
      "-c",
      BACKUP_SCRIPT,
      "sh",
      "auto_20260301_100000",
    ]);
    expect(BACKUP_SCRIPT).toContain('tar -czf "/data/backups/$1.tar.gz" "$world"');
  });
});

describe("classifyDockerFailure", () => {
  it("reports timeouts first", () => {
    expect(classifyDockerFailure(result({ exitCode: null, timedOut: true }), "bedrock", 5000)).toEqual({
      kind: "Timeout",
      message: "no response within 5000ms; the command may still have reached the server",
      timeoutMs: 5000,
    });
  });

  it("recognises a missing container", () => {
    const error = classifyDockerFailure(
      result({ exitCode: 1, stderr: "Error: No such container: bedrock\n" }),
      "bedrock",
      5000,
    );
    expect(error).toEqual({
      kind: "ContainerNotRunning",
      message: "Error: No such container: bedrock",
      container: "bedrock",
    });
  });

  it("recognises a stopped container", () => {
    const error = classifyDockerFailure(
      result({ exitCode: 1, stderr: "Error response from daemon: container abc is not running" }),
      "bedrock",
      5000,
    );
    expect(error.kind).toBe("ContainerNotRunning");
  });

  it("recognises an unreachable docker daemon", () => {
    const stderr = "Cannot connect to the Docker daemon at unix:///var/run/docker.sock.";
    expect(classifyDockerFailure(result({ exitCode: 1, stderr }), "bedrock", 5000)).toEqual({
      kind: "ConnectionFailed",
      message: stderr,
    });
  });

  it("falls back to ExecFailed with the exit code", () => {
    expect(classifyDockerFailure(result({ exitCode: 127 }), "bedrock", 5000)).toEqual({
      kind: "ExecFailed",
      message: "exited with code 127",
      exitCode: 127,
    });
  });
});

describe("interpretInspect", () => {
  it("is ok when the container is running", () => {
    expect(interpretInspect(result({ stdout: "true\n" }), "bedrock", 5000)).toEqual({
      ok: true,
      output: "running",
    });
  });

  it("reports a stopped container", () => {
    expect(interpretInspect(result({ stdout: "false\n" }), "bedrock", 5000)).toEqual({
      ok: false,
      error: {
        kind: "ContainerNotRunning",
        message: 'container "bedrock" is stopped',
        container: "bedrock",
      },
    });
  });
});

describe("interpretSend", () => {
  it("returns trimmed output", () => {
    expect(interpretSend(result({ stdout: "Saved the game\n" }), "bedrock", 5000)).toEqual({
      ok: true,
      output: "Saved the game",
    });
  });

  it("classifies failures", () => {
    const sent = interpretSend(result({ exitCode: 2, stderr: "send-command: not found" }), "bedrock", 5000);
    expect(sent).toEqual({
      ok: false,
      error: { kind: "ExecFailed", message: "send-command: not found", exitCode: 2 },
    });
  });
});
