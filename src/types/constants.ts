/**
 * Process execution and pipeline constants
 */

/**
 * How a finished process ended
 */
export const CExitKind = {
  EXITED: "exited",
  SIGNALED: "signaled",
  STOPPED: "stopped",
} as const;

export type TExitKind = (typeof CExitKind)[keyof typeof CExitKind];

/**
 * Outcome of a single command execution
 */
export const CExecutionKind = {
  ERROR: "error",
  FINISHED: "finished",
} as const;

export type TExecutionKind =
  (typeof CExecutionKind)[keyof typeof CExecutionKind];

/**
 * Reasons a sequenced command is reported as failed
 */
export const CFailureReason = {
  ERROR: "error",
  EXITED: "exited",
  SIGNALED: "signaled",
  STOPPED: "stopped",
} as const;

export type TFailureReason =
  (typeof CFailureReason)[keyof typeof CFailureReason];

/**
 * Defaults shared by the configuration loader and the pipeline
 */
export const DEFAULT_API_URL = "https://api.github.com";
export const DEFAULT_UPSTREAM_OWNER = "xen-org";
export const DEFAULT_GIT_HOST = "github.com";
export const DEFAULT_SCRATCH_DIR = "/tmp";
export const DEFAULT_COMMAND_LOG = "/tmp/prdup.log";
