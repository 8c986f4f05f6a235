/**
 * Types for running shell commands
 */

import type { CExecutionKind, CExitKind } from "./constants.js";

/**
 * A shell command bound to the directory it runs in
 */
export interface Command {
  /** Working directory for the spawned shell */
  readonly cwd: string;
  /** Command line passed to the shell */
  readonly command: string;
}

/**
 * Terminal status of a process that was spawned and reaped
 */
export type ExitStatus =
  | { kind: typeof CExitKind.EXITED; code: number }
  | {
      kind: typeof CExitKind.SIGNALED;
      /** Signal number */
      signal: number;
      /** Signal name, e.g. SIGTERM */
      name: string;
    }
  | { kind: typeof CExitKind.STOPPED; signal: number };

/**
 * Result of executing one command
 *
 * @remarks
 * `error` means the process could not be spawned or managed at all
 * (missing working directory, missing shell). Everything that ran is
 * `finished`, whatever its exit status.
 */
export type ExecutionResult =
  | { kind: typeof CExecutionKind.ERROR; error: Error }
  | {
      kind: typeof CExecutionKind.FINISHED;
      status: ExitStatus;
      stdout: string;
      stderr: string;
      /** Whether the process was terminated for exceeding its timeout */
      timedOut: boolean;
    };

/**
 * Options for a single command execution
 */
export interface ExecuteOptions {
  /** Variables layered over the inherited parent environment */
  env?: NodeJS.ProcessEnv;
  /** Append stdout and stderr to this command log when set */
  logPath?: string;
  /** Terminate the process after this many milliseconds (0 = never) */
  timeoutMs?: number;
}

/**
 * Anything able to run a {@link Command}
 */
export interface ProcessRunner {
  execute(command: Command, options?: ExecuteOptions): Promise<ExecutionResult>;
}
