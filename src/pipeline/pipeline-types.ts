/**
 * Types for the git backport pipeline
 */

import type { Command } from "../types/process.js";

/**
 * What to backport and who is doing it
 */
export interface BackportRepoOptions {
  /** Branch the backport targets (cloned and used as PR base) */
  destBranch: string;
  /** Login of the original PR author, whose fork holds the commits */
  author: string;
  /** Repository name */
  repo: string;
  /** Commit SHAs to cherry-pick, in order */
  shas: readonly string[];
  /** Name of the branch to create */
  branchName: string;
  /** Login of the user running the backport, whose fork receives the branch */
  caller: string;
  /** Committer name configured in the clone */
  committerName: string;
  /** Committer email configured in the clone */
  committerEmail: string;
}

/**
 * Where the pipeline clones and which host it talks to
 */
export interface PipelineSettings {
  /** Directory the repository is cloned into (default: /tmp) */
  scratchDir?: string;
  /** SSH host of the git remotes (default: github.com) */
  gitHost?: string;
  /** Owner of the canonical repository (default: xen-org) */
  upstreamOwner?: string;
}

/**
 * Outcome of preparing and pushing the backport branch
 */
export type PipelineResult =
  | {
      success: true;
      /** Branch pushed to the caller's fork */
      branch: string;
      /** Path of the clone */
      repoPath: string;
      /** Commands that completed */
      commandsRun: number;
    }
  | {
      success: false;
      /** Failure message of the command that stopped the pipeline */
      error: string;
      /** The command that failed, when a command failed */
      failedCommand?: Command;
      /** Path of the clone */
      repoPath: string;
      /** Commands that completed before the failure */
      commandsRun: number;
    };
