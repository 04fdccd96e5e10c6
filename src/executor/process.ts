/**
 * Thin promise wrapper over execFile. Arguments go straight to the
 * program's argv; no local shell is involved.
 */

import { execFile } from "node:child_process";

export interface ProcessResult {
  /** Exit code, or null when the process was killed or never started */
  exitCode: number | null;
  stdout: string;
  stderr: string;
  /** The timeout fired and the process was killed */
  timedOut: boolean;
  /** errno code when the program could not be started (e.g. "ENOENT") */
  spawnError?: string;
}

export interface RunProcessOptions {
  timeoutMs: number;
}

const MAX_OUTPUT_BYTES = 1024 * 1024;

export function runProcess(
  file: string,
  args: string[],
  options: RunProcessOptions,
): Promise<ProcessResult> {
  return new Promise((resolve) => {
    execFile(
      file,
      args,
      {
        timeout: Math.max(1, options.timeoutMs),
        killSignal: "SIGKILL",
        maxBuffer: MAX_OUTPUT_BYTES,
        encoding: "utf8",
        windowsHide: true,
      },
      (err, stdout, stderr) => {
        if (!err) {
          resolve({ exitCode: 0, stdout, stderr, timedOut: false });
          return;
        }

        if (err.code === "ERR_CHILD_PROCESS_STDIO_MAXBUFFER") {
          resolve({
            exitCode: null,
            stdout,
            stderr: `output exceeded ${MAX_OUTPUT_BYTES} bytes`,
            timedOut: false,
          });
          return;
        }

        if (typeof err.code === "string") {
          resolve({ exitCode: null, stdout, stderr, timedOut: false, spawnError: err.code });
          return;
        }

        const timedOut = err.killed === true && err.signal === "SIGKILL";
        resolve({
          exitCode: typeof err.code === "number" ? err.code : null,
          stdout,
          stderr: stderr || err.message,
          timedOut,
        });
      },
    );
  });
}
