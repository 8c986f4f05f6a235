/**
 * Runtime configuration read from `BACKPORT_*` environment variables
 */

import { z } from "zod";
import { ConfigError } from "./errors.js";
import { CLogLevel, type TLogLevel } from "./logging/logger-types.js";
import {
  DEFAULT_API_URL,
  DEFAULT_COMMAND_LOG,
  DEFAULT_GIT_HOST,
  DEFAULT_SCRATCH_DIR,
  DEFAULT_UPSTREAM_OWNER,
} from "./types/constants.js";

/**
 * Resolved configuration
 */
export interface BackportConfig {
  /** GitHub API root */
  apiUrl: string;
  /** Owner the PR is read from and the backport is opened against */
  upstreamOwner: string;
  /** Host used in SSH remote URLs */
  gitHost: string;
  /** Directory the repository is cloned into */
  scratchDir: string;
  /** File every command's output is appended to */
  commandLog: string;
  logLevel: TLogLevel;
  /** Diagnostics log file (unset = console only) */
  logFile?: string;
  /** Per-command timeout in milliseconds (0 = none) */
  commandTimeoutMs: number;
}

// Empty variables count as unset
const optionalString = z.preprocess(
  (value) => (value === "" ? undefined : value),
  z.string().optional(),
);

const configSchema = z.object({
  BACKPORT_API_URL: optionalString.pipe(
    z.string().url().default(DEFAULT_API_URL),
  ),
  BACKPORT_UPSTREAM_OWNER: optionalString.pipe(
    z.string().default(DEFAULT_UPSTREAM_OWNER),
  ),
  BACKPORT_GIT_HOST: optionalString.pipe(z.string().default(DEFAULT_GIT_HOST)),
  BACKPORT_SCRATCH_DIR: optionalString.pipe(
    z.string().default(DEFAULT_SCRATCH_DIR),
  ),
  BACKPORT_COMMAND_LOG: optionalString.pipe(
    z.string().default(DEFAULT_COMMAND_LOG),
  ),
  BACKPORT_LOG_LEVEL: optionalString.pipe(
    z
      .enum([CLogLevel.DEBUG, CLogLevel.INFO, CLogLevel.WARN, CLogLevel.ERROR])
      .default(CLogLevel.INFO),
  ),
  BACKPORT_LOG_FILE: optionalString,
  BACKPORT_COMMAND_TIMEOUT_MS: optionalString.pipe(
    z.coerce.number().int().nonnegative().default(0),
  ),
});

/**
 * Load configuration from the environment
 *
 * @throws {ConfigError} When a variable holds an invalid value
 *
 * @example
 * ```typescript
 * const config = loadConfig();
 * // => { apiUrl: 'https://api.github.com', upstreamOwner: 'xen-org', ... }
 * ```
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): BackportConfig {
  const parsed = configSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${details}`, parsed.error);
  }

  const vars = parsed.data;
  return {
    apiUrl: vars.BACKPORT_API_URL,
    upstreamOwner: vars.BACKPORT_UPSTREAM_OWNER,
    gitHost: vars.BACKPORT_GIT_HOST,
    scratchDir: vars.BACKPORT_SCRATCH_DIR,
    commandLog: vars.BACKPORT_COMMAND_LOG,
    logLevel: vars.BACKPORT_LOG_LEVEL,
    logFile: vars.BACKPORT_LOG_FILE,
    commandTimeoutMs: vars.BACKPORT_COMMAND_TIMEOUT_MS,
  };
}
