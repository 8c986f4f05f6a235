/**
 * Types for backport orchestration
 */

import type { PipelineSettings } from "../pipeline/pipeline-types.js";
import type {
  CreatedPullRequest,
  PullRequestInfo,
  PullRequestSubmission,
} from "../types/code-host.js";
import type { Command } from "../types/process.js";

/**
 * Configuration for BackportOrchestrator
 *
 * `upstreamOwner` is both where the PR is read from and where the backport
 * PR is opened.
 */
export type BackportOrchestratorConfig = PipelineSettings;

/**
 * A backport to perform
 */
export interface BackportRequest {
  /** Login of the invoking user, whose fork receives the branch */
  username: string;
  /** Password exchanged for an API token */
  password: string;
  /** Number of the PR to backport */
  number: number;
  /** Repository name */
  repo: string;
  /** Branch to backport onto */
  destBranch: string;
  /** Name of the branch to create */
  branchName: string;
  /** Committer name for the cherry-picks */
  committerName: string;
  /** Committer email for the cherry-picks */
  committerEmail: string;
  /** Plan only: fetch PR data, then stop before running git or opening a PR */
  dryRun?: boolean;
}

/**
 * Result of a backport
 */
export type BackportResult =
  | {
      dryRun: false;
      /** The PR that was backported */
      source: PullRequestInfo;
      /** Cherry-picked SHAs, in order */
      shas: string[];
      /** The PR opened for the backport */
      created: CreatedPullRequest;
    }
  | {
      dryRun: true;
      source: PullRequestInfo;
      shas: string[];
      /** Commands the pipeline would run */
      commands: Command[];
      /** Owner the PR would be opened against */
      owner: string;
      /** PR that would be opened */
      submission: PullRequestSubmission;
    };
