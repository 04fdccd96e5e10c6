/**
 * CLI commands for the scheduler daemon.
 *
 * Usage:
 *   bedrock-admin daemon start    Start the scheduler in the background
 *   bedrock-admin daemon stop     Stop the running scheduler
 *   bedrock-admin daemon restart  Restart it
 *   bedrock-admin daemon status   Show PID and file locations
 *   bedrock-admin daemon logs     Print the tail of the log
 *   bedrock-admin daemon run      Run in the foreground
 */

import { spawn } from "node:child_process";
import fs from "node:fs";
import path from "node:path";
import type { Command } from "commander";
import chalk from "chalk";
import {
  getLogFilePath,
  getPidFilePath,
  isDaemonRunning,
  isProcessRunning,
  removePidFile,
} from "../daemon/lifecycle.ts";

const STOP_TIMEOUT_MS = 10_000;

/** Send SIGTERM and wait for the process to exit; SIGKILL after the timeout. */
async function stopDaemonProcess(pid: number, timeoutMs: number = STOP_TIMEOUT_MS): Promise<boolean> {
  process.kill(pid, "SIGTERM");

  const start = Date.now();
  while (Date.now() - start < timeoutMs) {
    if (!isProcessRunning(pid)) {
      removePidFile();
      return true;
    }
    await new Promise((r) => setTimeout(r, 200));
  }

  if (isProcessRunning(pid)) {
    process.kill(pid, "SIGKILL");
  }
  removePidFile();
  return false;
}

/** Re-invoke this CLI with "daemon run", detached, appending to the log file. */
function spawnDaemon(): void {
  const scriptPath = process.argv[1];
  if (!scriptPath) {
    throw new Error("Cannot locate the CLI entry script");
  }

  const logFile = getLogFilePath();
  fs.mkdirSync(path.dirname(logFile), { recursive: true });
  const logFd = fs.openSync(logFile, "a");

  const child = spawn(process.execPath, [...process.execArgv, scriptPath, "daemon", "run"], {
    detached: true,
    stdio: ["ignore", logFd, logFd],
    env: { ...process.env },
  });

  child.unref();
  fs.closeSync(logFd);

  console.log(chalk.green(`Scheduler started (PID ${child.pid})`));
  console.log(chalk.dim(`  Logs: ${logFile}`));
}

/** Last `count` lines of `content`, ignoring the trailing newline. */
export function tailLines(content: string, count: number): string {
  const lines = content.replace(/\n$/, "").split("\n");
  return lines.slice(-count).join("\n");
}

export function registerDaemonCommand(program: Command): void {
  const daemon = program.command("daemon").description("Manage the scheduler daemon");

  daemon
    .command("start")
    .description("Start the scheduler in the background")
    .action(() => {
      const { running, pid } = isDaemonRunning();
      if (running) {
        console.log(`Scheduler is already running (PID ${pid})`);
        return;
      }
      spawnDaemon();
    });

  daemon
    .command("stop")
    .description("Stop the running scheduler")
    .action(async () => {
      const { running, pid } = isDaemonRunning();
      if (!running || pid === null) {
        console.log("Scheduler is not running");
        return;
      }

      console.log(`Stopping scheduler (PID ${pid})...`);
      try {
        const graceful = await stopDaemonProcess(pid);
        console.log(graceful ? "Scheduler stopped" : "Scheduler force-killed (did not exit within 10s)");
      } catch (err) {
        console.error(chalk.red("Failed to stop scheduler:"), err);
        process.exit(1);
      }
    });

  daemon
    .command("restart")
    .description("Restart the scheduler")
    .action(async () => {
      const { running, pid } = isDaemonRunning();
      if (running && pid !== null) {
        console.log(`Stopping scheduler (PID ${pid})...`);
        try {
          await stopDaemonProcess(pid);
        } catch (err) {
          console.error(chalk.red("Failed to stop scheduler:"), err);
          process.exit(1);
        }
        console.log("Scheduler stopped");
      }
      spawnDaemon();
    });

  daemon
    .command("status")
    .description("Show scheduler status")
    .action(() => {
      const { running, pid } = isDaemonRunning();
      if (running) {
        console.log(chalk.green(`Scheduler is running (PID ${pid})`));
        console.log(`  PID file: ${getPidFilePath()}`);
        console.log(`  Log file: ${getLogFilePath()}`);
      } else {
        console.log("Scheduler is not running");
      }
    });

  daemon
    .command("logs")
    .description("Show the end of the scheduler log")
    .option("-n, --lines <lines>", "Number of lines to show", "50")
    .action((options: { lines: string }) => {
      const logFile = getLogFilePath();
      if (!fs.existsSync(logFile)) {
        console.log("No scheduler log file found");
        return;
      }
      const count = parseInt(options.lines, 10);
      console.log(tailLines(fs.readFileSync(logFile, "utf-8"), Number.isNaN(count) ? 50 : count));
    });

  daemon
    .command("run")
    .description("Run the scheduler in the foreground")
    .action(async () => {
      const { running, pid } = isDaemonRunning();
      if (running) {
        console.log(`Scheduler is already running (PID ${pid}). Stop it first.`);
        return;
      }

      await import("../daemon/index.ts");
    });
}
