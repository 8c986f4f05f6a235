/**
 * backport-pr
 *
 * Backport a GitHub pull request onto another branch: cherry-pick its
 * commits into a fresh clone, push to the caller's fork and open a new
 * pull request
 */

export { GitHubClient, type GitHubClientConfig } from "./adapters/github.js";
export { type CliDeps, type CliIo, createProgram, runCli } from "./cli.js";
export { type BackportConfig, loadConfig } from "./config.js";
export {
  BackportError,
  CodeHostError,
  CommandFailedError,
  ConfigError,
} from "./errors.js";
export {
  type BackportServiceOverrides,
  createBackportOrchestrator,
  createCodeHostClient,
  createCommandSequencer,
} from "./factory.js";
export { createSilentLogger, Logger, redact } from "./logging/logger.js";
export {
  CLogLevel,
  type ConsoleWriter,
  type LogEntry,
  type LoggerConfig,
  type TLogLevel,
} from "./logging/logger-types.js";
export {
  BackportOrchestrator,
  type BackportOrchestratorDeps,
} from "./orchestration/backport-orchestrator.js";
export type {
  BackportOrchestratorConfig,
  BackportRequest,
  BackportResult,
} from "./orchestration/backport-orchestrator-types.js";
export {
  buildBackportCommands,
  isValidRepoName,
  prepareGitRepo,
  remoteUrl,
  repoPathFor,
} from "./pipeline/backport-pipeline.js";
export {
  CommandSequencer,
  type CommandSequencerConfig,
  toCommandFailure,
} from "./pipeline/command-sequencer.js";
export type {
  BackportRepoOptions,
  PipelineResult,
  PipelineSettings,
} from "./pipeline/pipeline-types.js";
export * from "./types/index.js";
export {
  appendCommandLog,
  describeOutcome,
  formatCommandLogEntry,
} from "./utils/command-log.js";
export { executeCommand, ShellProcessRunner, signalNumber } from "./utils/exec.js";
export { shellJoin, shellQuote } from "./utils/shell-quote.js";
