/**
 * Error types raised by backport-pr
 */

import type { TFailureReason } from "./types/constants.js";
import type { Command } from "./types/process.js";

/**
 * A sequenced command did not exit with status 0
 *
 * @remarks
 * `code` holds the exit code for `exited` and the signal number for
 * `signaled`/`stopped`; check `reason` before interpreting it.
 */
export class CommandFailedError extends Error {
  readonly command: Command;
  readonly reason: TFailureReason;
  readonly code: number | null;

  constructor(
    message: string,
    command: Command,
    reason: TFailureReason,
    code: number | null,
    cause?: unknown,
  ) {
    super(message);
    this.name = "CommandFailedError";
    this.command = command;
    this.reason = reason;
    this.code = code;
    if (cause) {
      this.cause = cause;
    }
  }
}

/**
 * The code host answered with an unexpected status or body
 */
export class CodeHostError extends Error {
  readonly method: string;
  readonly path: string;
  readonly status: number | null;

  constructor(
    message: string,
    details: { method: string; path: string; status: number | null },
    cause?: unknown,
  ) {
    super(message);
    this.name = "CodeHostError";
    this.method = details.method;
    this.path = details.path;
    this.status = details.status;
    if (cause) {
      this.cause = cause;
    }
  }
}

/**
 * The git pipeline failed, so no pull request was opened
 */
export class BackportError extends Error {
  readonly failedCommand?: Command;

  constructor(message: string, failedCommand?: Command) {
    super(message);
    this.name = "BackportError";
    this.failedCommand = failedCommand;
  }
}

/**
 * Invalid configuration value
 */
export class ConfigError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = "ConfigError";
    if (cause) {
      this.cause = cause;
    }
  }
}
