/**
 * Daemon lifecycle management: PID file, signal handlers, graceful shutdown.
 */

import fs from "node:fs";
import path from "node:path";
import os from "node:os";

const STATE_DIR = process.env.BEDROCK_ADMIN_HOME ?? path.join(os.homedir(), ".bedrock-admin");
const PID_FILE = path.join(STATE_DIR, "daemon.pid");
const LOG_FILE = path.join(STATE_DIR, "daemon.log");

export function getPidFilePath(): string {
  return PID_FILE;
}

export function getLogFilePath(): string {
  return LOG_FILE;
}

export function writePidFile(): void {
  fs.mkdirSync(STATE_DIR, { recursive: true });
  fs.writeFileSync(PID_FILE, String(process.pid), "utf-8");
}

export function removePidFile(): void {
  try {
    fs.unlinkSync(PID_FILE);
  } catch (err) {
    const missing = err instanceof Error && "code" in err && err.code === "ENOENT";
    if (!missing) {
      console.error("[daemon] Could not remove PID file:", err);
    }
  }
}

/** Read PID from file. Returns null if missing or unreadable. */
export function readPidFile(): number | null {
  let content: string;
  try {
    content = fs.readFileSync(PID_FILE, "utf-8").trim();
  } catch {
    return null;
  }
  const pid = parseInt(content, 10);
  return Number.isNaN(pid) ? null : pid;
}

export function isProcessRunning(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch {
    return false;
  }
}

export function isDaemonRunning(): { running: boolean; pid: number | null } {
  const pid = readPidFile();
  if (pid === null) return { running: false, pid: null };

  if (!isProcessRunning(pid)) {
    // Stale PID file
    removePidFile();
    return { running: false, pid: null };
  }

  return { running: true, pid };
}

/**
 * Install signal handlers for graceful shutdown.
 * Calls `onShutdown` once when SIGTERM, SIGINT or SIGHUP is received.
 */
export function installSignalHandlers(onShutdown: () => Promise<void>): void {
  let shuttingDown = false;

  const handler = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;

    console.log(`[daemon] Received ${signal}, shutting down...`);
    try {
      await onShutdown();
    } catch (err) {
      console.error("[daemon] Error during shutdown:", err);
    }
    removePidFile();
    process.exit(0);
  };

  for (const signal of ["SIGTERM", "SIGINT", "SIGHUP"] as const) {
    process.on(signal, () => {
      void handler(signal);
    });
  }

  process.on("uncaughtException", (err) => {
    console.error("[daemon] Uncaught exception:", err);
    removePidFile();
    process.exit(1);
  });

  process.on("unhandledRejection", (reason) => {
    console.error("[daemon] Unhandled rejection:", reason);
  });
}
