import { vi, describe, it, expect, afterEach } from "vitest";
import { Command } from "commander";

vi.mock("../daemon/lifecycle.ts", () => ({ isDaemonRunning: vi.fn() }));
vi.mock("../db/client.ts", () => ({ getDb: vi.fn(), closeDb: vi.fn() }));
vi.mock("../scheduler/runner.ts", () => ({ runTask: vi.fn() }));

import { isDaemonRunning } from "../daemon/lifecycle.ts";
import { getDb } from "../db/client.ts";
import { runTask } from "../scheduler/runner.ts";
import { manualRunRefusal, registerTaskCommand } from "./task.ts";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("manualRunRefusal", () => {
  it("allows a manual run when no daemon is up", () => {
    expect(manualRunRefusal({ running: false, pid: null })).toBeNull();
  });

  it("names the daemon's pid when it is up", () => {
    expect(manualRunRefusal({ running: true, pid: 4242 })).toBe(
      'Daemon is running (PID 4242) and may be running this task. Stop it with "bedrock-admin daemon stop" first.',
    );
  });
});

describe("task run", () => {
  it("refuses before touching the store while the daemon is up", async () => {
    vi.mocked(isDaemonRunning).mockReturnValue({ running: true, pid: 4242 });
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    vi.spyOn(process, "exit").mockImplementation(() => {
      throw new Error("process.exit");
    });
    const program = new Command();
    registerTaskCommand(program);

    await expect(
      program.parseAsync(["node", "bedrock-admin", "task", "run", "3f2b8c1e"]),
    ).rejects.toThrow("process.exit");

    expect(process.exit).toHaveBeenCalledWith(1);
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(getDb).not.toHaveBeenCalled();
    expect(runTask).not.toHaveBeenCalled();
  });
});
