/**
 * Runs commands one after another, failing on the first non-zero exit
 */

import { CommandFailedError } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import {
  CExecutionKind,
  CExitKind,
  CFailureReason,
} from "../types/constants.js";
import type {
  Command,
  ExecutionResult,
  ProcessRunner,
} from "../types/process.js";

/**
 * Configuration for CommandSequencer
 */
export interface CommandSequencerConfig {
  /** Runner that executes each command */
  runner: ProcessRunner;
  /** Command log every command's output is appended to */
  logPath?: string;
  /** Default environment overrides for every command */
  env?: NodeJS.ProcessEnv;
  /** Per-command timeout in milliseconds (0 = none) */
  timeoutMs?: number;
  logger?: Logger;
}

/**
 * Turn a non-successful execution result into a {@link CommandFailedError}
 *
 * @returns `null` when the command exited with status 0
 */
export function toCommandFailure(
  command: Command,
  result: ExecutionResult,
): CommandFailedError | null {
  const cmd = command.command;

  if (result.kind === CExecutionKind.ERROR) {
    return new CommandFailedError(
      `${cmd} : Error`,
      command,
      CFailureReason.ERROR,
      null,
      result.error,
    );
  }

  const suffix = result.timedOut ? " (timed out)" : "";
  const { status } = result;
  switch (status.kind) {
    case CExitKind.EXITED:
      if (status.code === 0) {
        return null;
      }
      return new CommandFailedError(
        `${cmd} : Failed with code ${status.code}${suffix}`,
        command,
        CFailureReason.EXITED,
        status.code,
      );
    case CExitKind.SIGNALED:
      return new CommandFailedError(
        `${cmd} : Killed by signal ${status.signal}${suffix}`,
        command,
        CFailureReason.SIGNALED,
        status.signal,
      );
    case CExitKind.STOPPED:
      return new CommandFailedError(
        `${cmd} : Stopped by signal ${status.signal}${suffix}`,
        command,
        CFailureReason.STOPPED,
        status.signal,
      );
  }
}

/**
 * Sequential command runner
 *
 * Success is exactly a normal exit with code 0. Any other outcome throws
 * a {@link CommandFailedError}, and {@link runAll} never starts the command
 * after one that failed.
 *
 * @example
 * ```typescript
 * const sequencer = new CommandSequencer({
 *   runner: new ShellProcessRunner(logger),
 *   logPath: '/tmp/prdup.log',
 * });
 *
 * await sequencer.run('/tmp/foo', 'git fetch alice');
 * ```
 */
export class CommandSequencer {
  private readonly config: CommandSequencerConfig;

  constructor(config: CommandSequencerConfig) {
    this.config = config;
  }

  /**
   * Run one command
   *
   * @throws {CommandFailedError} Unless the command exits with status 0
   */
  async run(
    cwd: string,
    command: string,
    env: NodeJS.ProcessEnv = {},
  ): Promise<void> {
    await this.runCommand({ cwd, command }, env);
  }

  /**
   * Run commands in order, stopping at the first failure
   *
   * @throws {CommandFailedError} From the first command that fails
   */
  async runAll(commands: readonly Command[]): Promise<void> {
    for (const command of commands) {
      await this.runCommand(command);
    }
  }

  private async runCommand(
    command: Command,
    env: NodeJS.ProcessEnv = {},
  ): Promise<void> {
    const { runner, logPath, timeoutMs, logger } = this.config;
    const result = await runner.execute(command, {
      env: { ...this.config.env, ...env },
      logPath,
      timeoutMs,
    });

    const failure = toCommandFailure(command, result);
    if (failure) {
      logger?.debug("command.failed", failure.message, {
        cwd: command.cwd,
        reason: failure.reason,
        code: failure.code,
      });
      throw failure;
    }
  }
}
