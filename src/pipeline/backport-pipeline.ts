/**
 * Git backport pipeline
 *
 * Clones the upstream repository at the destination branch, cherry-picks the
 * pull request's commits onto a new branch and pushes it to the caller's fork.
 */

import * as path from "node:path";
import { BackportError, CommandFailedError } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import {
  DEFAULT_GIT_HOST,
  DEFAULT_SCRATCH_DIR,
  DEFAULT_UPSTREAM_OWNER,
} from "../types/constants.js";
import type { Command } from "../types/process.js";
import { shellJoin } from "../utils/shell-quote.js";
import type { CommandSequencer } from "./command-sequencer.js";
import type {
  BackportRepoOptions,
  PipelineResult,
  PipelineSettings,
} from "./pipeline-types.js";

const DEFAULT_SETTINGS: Required<PipelineSettings> = {
  scratchDir: DEFAULT_SCRATCH_DIR,
  gitHost: DEFAULT_GIT_HOST,
  upstreamOwner: DEFAULT_UPSTREAM_OWNER,
};

/** Characters allowed in a repository name */
export const REPO_NAME = /^[A-Za-z0-9_.-]+$/;

/**
 * Whether `repo` is a plain repository name that stays inside the scratch
 * directory when joined to it
 */
export function isValidRepoName(repo: string): boolean {
  return REPO_NAME.test(repo) && repo !== "." && repo !== "..";
}

/**
 * SSH remote URL for `owner/repo` on `host`
 */
export function remoteUrl(host: string, owner: string, repo: string): string {
  return `git@${host}:${owner}/${repo}.git`;
}

/**
 * Local path of the clone for `repo`
 */
export function repoPathFor(repo: string, settings: PipelineSettings = {}): string {
  return path.join(settings.scratchDir ?? DEFAULT_SCRATCH_DIR, repo);
}

/**
 * Build the command sequence for a backport
 *
 * @remarks
 * Order:
 * 1. clone the upstream repository at the destination branch
 * 2. add the caller's fork as a remote (only when caller != author)
 * 3. configure committer name and email in the clone
 * 4. add and fetch the author's fork
 * 5. create the backport branch
 * 6. cherry-pick each SHA, in the given order
 * 7. push the branch to the caller's fork
 *
 * When the caller is the author, the author's remote doubles as the push
 * target.
 *
 * @throws {BackportError} When the repository name is not a plain name
 */
export function buildBackportCommands(
  options: BackportRepoOptions,
  settings: PipelineSettings = {},
): Command[] {
  if (!isValidRepoName(options.repo)) {
    throw new BackportError(`Invalid repository name: ${options.repo}`);
  }
  const { scratchDir, gitHost, upstreamOwner } = {
    ...DEFAULT_SETTINGS,
    ...settings,
  };
  const repoPath = repoPathFor(options.repo, { scratchDir });
  const inRepo = (...args: string[]): Command => ({
    cwd: repoPath,
    command: shellJoin(args),
  });

  const commands: Command[] = [
    {
      cwd: scratchDir,
      command: shellJoin([
        "git",
        "clone",
        "-b",
        options.destBranch,
        remoteUrl(gitHost, upstreamOwner, options.repo),
      ]),
    },
  ];

  if (options.caller !== options.author) {
    commands.push(
      inRepo(
        "git",
        "remote",
        "add",
        options.caller,
        remoteUrl(gitHost, options.caller, options.repo),
      ),
    );
  }

  commands.push(
    inRepo("git", "config", "user.name", options.committerName),
    inRepo("git", "config", "user.email", options.committerEmail),
    inRepo(
      "git",
      "remote",
      "add",
      options.author,
      remoteUrl(gitHost, options.author, options.repo),
    ),
    inRepo("git", "fetch", options.author),
    inRepo("git", "checkout", "-b", options.branchName),
    ...options.shas.map((sha) => inRepo("git", "cherry-pick", sha)),
    inRepo("git", "push", options.caller, options.branchName),
  );

  return commands;
}

/**
 * Prepare, cherry-pick and push the backport branch
 *
 * @returns A failure result instead of throwing when a git command fails,
 * so the caller decides whether to continue. A failed run can leave a
 * partial clone behind in the scratch directory.
 *
 * @throws Errors other than command failures (a broken runner, for example)
 */
export async function prepareGitRepo(
  sequencer: CommandSequencer,
  options: BackportRepoOptions,
  settings: PipelineSettings = {},
  logger?: Logger,
): Promise<PipelineResult> {
  const repoPath = repoPathFor(options.repo, settings);

  if (!isValidRepoName(options.repo)) {
    const error = `Invalid repository name: ${options.repo}`;
    logger?.error("pipeline.failed", error);
    return { success: false, error, repoPath, commandsRun: 0 };
  }

  const commands = buildBackportCommands(options, settings);

  try {
    await sequencer.runAll(commands);
  } catch (error) {
    if (!(error instanceof CommandFailedError)) {
      throw error;
    }
    const commandsRun = commands.indexOf(error.command);
    logger?.error("pipeline.failed", error, {
      repoPath,
      commandsRun,
      remaining: commands.length - commandsRun - 1,
    });
    return {
      success: false,
      error: error.message,
      failedCommand: error.command,
      repoPath,
      commandsRun,
    };
  }

  logger?.info(
    "pipeline.pushed",
    `Pushed ${options.branchName} to ${options.caller} with ${options.shas.length} cherry-picked commit(s)`,
    { repoPath, commandsRun: commands.length },
  );

  return {
    success: true,
    branch: options.branchName,
    repoPath,
    commandsRun: commands.length,
  };
}
