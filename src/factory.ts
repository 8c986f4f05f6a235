/**
 * Factory functions wiring the backport services from configuration
 */

import { GitHubClient } from "./adapters/github.js";
import type { BackportConfig } from "./config.js";
import type { Logger } from "./logging/logger.js";
import { BackportOrchestrator } from "./orchestration/backport-orchestrator.js";
import { CommandSequencer } from "./pipeline/command-sequencer.js";
import type { CodeHostClient } from "./types/code-host.js";
import type { ProcessRunner } from "./types/process.js";
import { ShellProcessRunner } from "./utils/exec.js";

/**
 * Replacements for the default collaborators
 */
export interface BackportServiceOverrides {
  logger?: Logger;
  /** Code host client (default: {@link GitHubClient} at `config.apiUrl`) */
  client?: CodeHostClient;
  /** Process runner (default: {@link ShellProcessRunner}) */
  runner?: ProcessRunner;
}

/**
 * Create a GitHub client from configuration
 */
export function createCodeHostClient(
  config: Pick<BackportConfig, "apiUrl">,
  logger?: Logger,
): CodeHostClient {
  return new GitHubClient({ apiUrl: config.apiUrl, logger });
}

/**
 * Create a command sequencer from configuration
 *
 * @remarks
 * Every command's output goes to `config.commandLog`; a timeout of 0
 * leaves commands unbounded.
 */
export function createCommandSequencer(
  config: Pick<BackportConfig, "commandLog" | "commandTimeoutMs">,
  runner: ProcessRunner,
  logger?: Logger,
): CommandSequencer {
  return new CommandSequencer({
    runner,
    logPath: config.commandLog,
    timeoutMs: config.commandTimeoutMs,
    logger,
  });
}

/**
 * Create a backport orchestrator from configuration
 *
 * @example
 * ```typescript
 * const config = loadConfig();
 * const orchestrator = createBackportOrchestrator(config, { logger });
 *
 * const result = await orchestrator.backportPullRequest(request);
 * ```
 */
export function createBackportOrchestrator(
  config: BackportConfig,
  overrides: BackportServiceOverrides = {},
): BackportOrchestrator {
  const { logger } = overrides;
  const client = overrides.client ?? createCodeHostClient(config, logger);
  const runner = overrides.runner ?? new ShellProcessRunner(logger);

  return new BackportOrchestrator(
    {
      client,
      sequencer: createCommandSequencer(config, runner, logger),
      logger,
    },
    {
      scratchDir: config.scratchDir,
      gitHost: config.gitHost,
      upstreamOwner: config.upstreamOwner,
    },
  );
}
