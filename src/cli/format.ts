import chalk from "chalk";
import { describeExecError } from "../executor/types.ts";
import { nextRunForTask } from "../tasks/schedule.ts";
import type { ScheduledTask, TaskResult } from "../tasks/types.ts";

const OUTPUT_PREVIEW = 40;

/** Plain-text summary of a run result, without colour. */
export function summarizeResult(result: TaskResult | undefined): string {
  if (!result) {
    return "never run";
  }
  if (result.status === "success") {
    const output = result.output.replace(/\s+/g, " ").trim();
    if (output === "") return "ok";
    return output.length > OUTPUT_PREVIEW ? `ok: ${output.slice(0, OUTPUT_PREVIEW - 3)}...` : `ok: ${output}`;
  }
  return describeExecError(result.error);
}

/** Next fire time as ISO text, "disabled", or "invalid schedule". */
export function describeNextRun(task: ScheduledTask, timezone?: string): string {
  if (!task.enabled) {
    return "disabled";
  }
  try {
    return nextRunForTask(task, timezone).toISOString();
  } catch {
    return "invalid schedule";
  }
}

export function colorResult(result: TaskResult | undefined): string {
  const text = summarizeResult(result);
  if (!result) return chalk.dim(text);
  return result.status === "success" ? chalk.green(text) : chalk.red(text);
}

export function printTaskDetails(task: ScheduledTask, timezone?: string): void {
  console.log(chalk.bold(`\n${task.name}`) + chalk.dim(` (${task.id})`));
  console.log(`  Command:   ${task.command}`);
  console.log(`  Schedule:  ${task.schedule}`);
  console.log(`  Status:    ${task.enabled ? chalk.green("enabled") : chalk.yellow("disabled")}`);
  console.log(`  Next run:  ${describeNextRun(task, timezone)}`);
  console.log(`  Last run:  ${task.lastRunAt ? task.lastRunAt.toISOString() : chalk.dim("never")}`);
  console.log(`  Result:    ${colorResult(task.lastResult)}`);
  if (task.consecutiveFailures > 0) {
    console.log(`  Failures:  ${chalk.red(String(task.consecutiveFailures))} in a row`);
  }
  if (task.lastResult?.status === "success" && task.lastResult.output.includes("\n")) {
    console.log(chalk.dim("\n" + task.lastResult.output));
  }
  console.log();
}
