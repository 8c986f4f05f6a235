/**
 * Type definitions for backport-pr
 */

export type {
  CodeHostClient,
  CreatedPullRequest,
  PullRequestInfo,
  PullRequestSubmission,
} from "./code-host.js";

export {
  CExecutionKind,
  CExitKind,
  CFailureReason,
  type TExecutionKind,
  type TExitKind,
  type TFailureReason,
} from "./constants.js";

export type {
  Command,
  ExecuteOptions,
  ExecutionResult,
  ExitStatus,
  ProcessRunner,
} from "./process.js";
