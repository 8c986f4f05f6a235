/**
 * Fake process runner for testing
 *
 * @remarks
 * Records every command instead of spawning it and answers with scripted
 * results. Commands without a scripted result exit with status 0.
 */

import { CExecutionKind, CExitKind } from "../../types/constants.js";
import type {
  Command,
  ExecuteOptions,
  ExecutionResult,
  ExitStatus,
  ProcessRunner,
} from "../../types/process.js";

/**
 * A recorded invocation
 */
export interface RecordedInvocation {
  command: Command;
  options?: ExecuteOptions;
}

/**
 * Build a finished result with the given exit status
 */
export function finishedWith(
  status: ExitStatus,
  stdout = "",
  stderr = "",
): ExecutionResult {
  return {
    kind: CExecutionKind.FINISHED,
    status,
    stdout,
    stderr,
    timedOut: false,
  };
}

/**
 * Build a finished result that exited normally
 */
export function exitedWith(code: number, stdout = "", stderr = ""): ExecutionResult {
  return finishedWith({ kind: CExitKind.EXITED, code }, stdout, stderr);
}

/**
 * Fake ProcessRunner
 *
 * @example
 * ```typescript
 * const runner = new FakeProcessRunner();
 * runner.respondTo('git cherry-pick def456', exitedWith(1, '', 'conflict'));
 *
 * // ... run the pipeline ...
 *
 * expect(runner.commandLines()).toEqual(['git clone ...', ...]);
 * ```
 */
export class FakeProcessRunner implements ProcessRunner {
  readonly invocations: RecordedInvocation[] = [];
  private readonly responses = new Map<string, ExecutionResult>();

  /**
   * Script the result for every invocation of a command line
   */
  respondTo(commandLine: string, result: ExecutionResult): this {
    this.responses.set(commandLine, result);
    return this;
  }

  async execute(
    command: Command,
    options?: ExecuteOptions,
  ): Promise<ExecutionResult> {
    this.invocations.push({ command, options });
    return this.responses.get(command.command) ?? exitedWith(0);
  }

  /** Command lines in invocation order */
  commandLines(): string[] {
    return this.invocations.map((invocation) => invocation.command.command);
  }

  /** Commands (directory and line) in invocation order */
  commands(): Command[] {
    return this.invocations.map((invocation) => invocation.command);
  }
}
