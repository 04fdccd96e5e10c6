import { vi, describe, it, expect, beforeEach } from "vitest";

vi.mock("./process.ts", () => ({ runProcess: vi.fn() }));

import { runProcess } from "./process.ts";
import { ConsoleExecutor } from "./index.ts";

const mockRun = vi.mocked(runProcess);
const executor = new ConsoleExecutor({ dockerPath: "docker", consoleSendCommand: "send-command" });

beforeEach(() => {
  mockRun.mockReset();
});

describe("ConsoleExecutor", () => {
  it("rejects invalid commands before touching any backend", async () => {
    const result = await executor.execute("say hi\nstop", { mode: "local", container: "bedrock" }, 5000);

    expect(result).toEqual({
      ok: false,
      error: { kind: "InvalidCommand", message: "command contains control characters" },
    });
    expect(mockRun).not.toHaveBeenCalled();
  });

  it("routes local profiles to docker", async () => {
    mockRun
      .mockResolvedValueOnce({ exitCode: 0, stdout: "true", stderr: "", timedOut: false })
      .mockResolvedValueOnce({ exitCode: 0, stdout: "", stderr: "", timedOut: false });

    const result = await executor.execute("  save-all  ", { mode: "local", container: "bedrock" }, 5000);

    expect(result).toEqual({ ok: true, output: "" });
    expect(mockRun.mock.calls[1][0]).toBe("docker");
    expect(mockRun.mock.calls[1][1]).toEqual(["exec", "-i", "bedrock", "send-command", "save-all"]);
  });

  it("routes ssh profiles to ssh", async () => {
    mockRun.mockResolvedValueOnce({ exitCode: 0, stdout: "", stderr: "", timedOut: false });

    await executor.execute(
      "save-all",
      {
        mode: "ssh",
        container: "bedrock",
        host: "mc.example.test",
        port: 22,
        user: "admin",
        keyPath: "/keys/panel",
        strictHostKeyChecking: false,
      },
      5000,
    );

    expect(mockRun.mock.calls[0][0]).toBe("ssh");
  });

  it("rejects backup names that could leave the backups directory", async () => {
    const result = await executor.backup("../escape", { mode: "local", container: "bedrock" }, 5000);

    expect(result).toEqual({
      ok: false,
      error: { kind: "InvalidCommand", message: 'invalid backup name "../escape"' },
    });
    expect(mockRun).not.toHaveBeenCalled();
  });
});
