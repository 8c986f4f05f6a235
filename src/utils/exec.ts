/**
 * Shell command execution with output capture
 */

import { type ChildProcess, spawn } from "node:child_process";
import { constants } from "node:os";
import type { Logger } from "../logging/logger.js";
import { CExecutionKind, CExitKind } from "../types/constants.js";
import type {
  Command,
  ExecuteOptions,
  ExecutionResult,
  ExitStatus,
  ProcessRunner,
} from "../types/process.js";
import { appendCommandLog } from "./command-log.js";

/** Grace period between SIGTERM and SIGKILL for timed-out commands */
const KILL_GRACE_MS = 1000;

const SIGNAL_NUMBERS = new Map<string, number>(
  Object.entries(constants.signals),
);

/**
 * Numeric value of a signal name on this platform (0 when unknown)
 */
export function signalNumber(name: string): number {
  return SIGNAL_NUMBERS.get(name) ?? 0;
}

function toExitStatus(
  code: number | null,
  signal: NodeJS.Signals | null,
): ExitStatus {
  if (signal) {
    return {
      kind: CExitKind.SIGNALED,
      signal: signalNumber(signal),
      name: signal,
    };
  }
  return { kind: CExitKind.EXITED, code: code ?? 0 };
}

/**
 * Execute a shell command in an explicit working directory
 *
 * @param command - Command line and the directory to run it in
 * @param options - Environment overrides, command log path and timeout
 * @returns The execution result
 *
 * @remarks
 * - Never rejects: a process that cannot be spawned resolves to an
 *   `error` result
 * - Never changes `process.cwd()`; the directory is handed to the child
 * - The child inherits `process.env` with `options.env` layered on top
 * - Output is captured untrimmed
 *
 * @example
 * ```typescript
 * const result = await executeCommand({ cwd: '/tmp/foo', command: 'git status' });
 * if (result.kind === 'finished' && result.status.kind === 'exited') {
 *   console.log(result.status.code, result.stdout);
 * }
 * ```
 */
export async function executeCommand(
  command: Command,
  options: ExecuteOptions = {},
  logger?: Logger,
): Promise<ExecutionResult> {
  logger?.debug(
    "command.start",
    `Executing ${command.command} in ${command.cwd}`,
  );

  const result = await spawnShell(command, options);

  if (result.kind === CExecutionKind.ERROR) {
    logger?.error("command.spawn_failed", result.error, {
      command: command.command,
      cwd: command.cwd,
      stack: result.error.stack,
    });
  }

  if (options.logPath) {
    try {
      appendCommandLog(options.logPath, command, result);
    } catch (error) {
      logger?.warn(
        "command.log_failed",
        `Failed to append to command log ${options.logPath}: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  return result;
}

function spawnShell(
  command: Command,
  options: ExecuteOptions,
): Promise<ExecutionResult> {
  return new Promise((resolve) => {
    let settled = false;
    const settle = (result: ExecutionResult) => {
      if (!settled) {
        settled = true;
        resolve(result);
      }
    };

    let child: ChildProcess;
    try {
      child = spawn(command.command, {
        cwd: command.cwd,
        shell: true,
        stdio: ["ignore", "pipe", "pipe"],
        env: { ...process.env, ...options.env },
        // Own process group, so a timeout reaches every process the shell started
        detached: true,
      });
    } catch (error) {
      settle({
        kind: CExecutionKind.ERROR,
        error: error instanceof Error ? error : new Error(String(error)),
      });
      return;
    }

    let stdout = "";
    let stderr = "";
    let timedOut = false;

    child.stdout?.setEncoding("utf8");
    child.stderr?.setEncoding("utf8");
    child.stdout?.on("data", (data: string) => {
      stdout += data;
    });
    child.stderr?.on("data", (data: string) => {
      stderr += data;
    });

    const timeoutMs = options.timeoutMs ?? 0;
    let killTimer: NodeJS.Timeout | undefined;
    const timer =
      timeoutMs > 0
        ? setTimeout(() => {
            timedOut = true;
            killProcessGroup(child, "SIGTERM");
            killTimer = setTimeout(() => {
              killProcessGroup(child, "SIGKILL");
              // A process that left the group may still hold the pipes
              child.stdout?.destroy();
              child.stderr?.destroy();
            }, KILL_GRACE_MS);
            killTimer.unref();
          }, timeoutMs)
        : undefined;

    const clearTimers = () => {
      if (timer) clearTimeout(timer);
      if (killTimer) clearTimeout(killTimer);
    };

    child.on("error", (error: Error) => {
      clearTimers();
      settle({ kind: CExecutionKind.ERROR, error });
    });

    child.on("close", (code: number | null, signal: NodeJS.Signals | null) => {
      clearTimers();
      settle({
        kind: CExecutionKind.FINISHED,
        status: toExitStatus(code, signal),
        stdout,
        stderr,
        timedOut,
      });
    });
  });
}

/**
 * Signal the child's whole process group, falling back to the child alone
 */
function killProcessGroup(child: ChildProcess, signal: NodeJS.Signals): void {
  if (child.pid === undefined) {
    return;
  }
  try {
    process.kill(-child.pid, signal);
  } catch (error) {
    if (isErrnoException(error) && error.code === "ESRCH") {
      return; // group already gone
    }
    child.kill(signal);
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

/**
 * {@link ProcessRunner} backed by {@link executeCommand}
 */
export class ShellProcessRunner implements ProcessRunner {
  private readonly logger?: Logger;

  constructor(logger?: Logger) {
    this.logger = logger;
  }

  execute(
    command: Command,
    options?: ExecuteOptions,
  ): Promise<ExecutionResult> {
    return executeCommand(command, options, this.logger);
  }
}
