/**
 * Append-only transcript of executed commands
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { CExecutionKind, CExitKind } from "../types/constants.js";
import type { Command, ExecutionResult } from "../types/process.js";

/**
 * One-line summary of how a command ended
 */
export function describeOutcome(result: ExecutionResult): string {
  if (result.kind === CExecutionKind.ERROR) {
    return `error: ${result.error.message}`;
  }

  const { status } = result;
  switch (status.kind) {
    case CExitKind.EXITED:
      return `exit ${status.code}`;
    case CExitKind.SIGNALED:
      return `signal ${status.signal} (${status.name})`;
    case CExitKind.STOPPED:
      return `stopped ${status.signal}`;
  }
}

/**
 * Format the transcript entry for one command
 *
 * @remarks
 * Layout: a header line with timestamp, command and directory, then stdout,
 * then stderr, then a footer line with the outcome.
 */
export function formatCommandLogEntry(
  command: Command,
  result: ExecutionResult,
  now: Date,
): string {
  const output =
    result.kind === CExecutionKind.FINISHED
      ? `${result.stdout}${result.stderr}`
      : "";
  const body = output === "" || output.endsWith("\n") ? output : `${output}\n`;

  return (
    `=== ${now.toISOString()} ${command.command} (in ${command.cwd}) ===\n` +
    body +
    `=== ${describeOutcome(result)} ===\n`
  );
}

/**
 * Append a command's output to the transcript at `logPath`
 *
 * Creates the file (and its directory) when absent; never truncates.
 *
 * @throws When the file cannot be written
 */
export function appendCommandLog(
  logPath: string,
  command: Command,
  result: ExecutionResult,
  now: Date = new Date(),
): void {
  const logDir = path.dirname(logPath);
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }
  fs.appendFileSync(
    logPath,
    formatCommandLogEntry(command, result, now),
    "utf-8",
  );
}
