/**
 * Backport orchestration
 *
 * Authenticates, reads the pull request and its commits, runs the git
 * pipeline and opens the backport pull request.
 */

import { BackportError } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import {
  buildBackportCommands,
  isValidRepoName,
  prepareGitRepo,
} from "../pipeline/backport-pipeline.js";
import type { CommandSequencer } from "../pipeline/command-sequencer.js";
import type { BackportRepoOptions } from "../pipeline/pipeline-types.js";
import type {
  CodeHostClient,
  PullRequestSubmission,
} from "../types/code-host.js";
import {
  DEFAULT_GIT_HOST,
  DEFAULT_SCRATCH_DIR,
  DEFAULT_UPSTREAM_OWNER,
} from "../types/constants.js";
import type {
  BackportOrchestratorConfig,
  BackportRequest,
  BackportResult,
} from "./backport-orchestrator-types.js";

/**
 * Default configuration for backport orchestrator
 */
const DEFAULT_CONFIG: Required<BackportOrchestratorConfig> = {
  scratchDir: DEFAULT_SCRATCH_DIR,
  gitHost: DEFAULT_GIT_HOST,
  upstreamOwner: DEFAULT_UPSTREAM_OWNER,
};

/**
 * Collaborators of the orchestrator
 */
export interface BackportOrchestratorDeps {
  client: CodeHostClient;
  sequencer: CommandSequencer;
  logger?: Logger;
}

/**
 * Backport orchestrator
 *
 * **Sequence** (each step finishes before the next starts):
 * 1. Exchange username/password for a token
 * 2. Fetch the PR from the upstream owner
 * 3. Fetch the PR's commits
 * 4. Clone, cherry-pick and push (see {@link prepareGitRepo})
 * 5. Open the backport PR, only if step 4 succeeded
 *
 * The token is held in memory only and is never logged.
 *
 * @example
 * ```typescript
 * const orchestrator = new BackportOrchestrator({ client, sequencer, logger });
 * const result = await orchestrator.backportPullRequest({
 *   username: 'bob',
 *   password,
 *   number: 42,
 *   repo: 'foo',
 *   destBranch: 'master',
 *   branchName: 'backport-42',
 *   committerName: 'Bob Builder',
 *   committerEmail: 'bob@example.com',
 * });
 * ```
 */
export class BackportOrchestrator {
  private readonly config: Required<BackportOrchestratorConfig>;
  private readonly deps: BackportOrchestratorDeps;

  constructor(
    deps: BackportOrchestratorDeps,
    config: BackportOrchestratorConfig = {},
  ) {
    this.deps = deps;
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Backport a pull request
   *
   * @throws {BackportError} When the repository name is invalid, the PR has
   * no commits or a git step fails; no PR is opened in that case, though a
   * partial clone may remain
   * @throws {CodeHostError} When any API call fails
   */
  async backportPullRequest(request: BackportRequest): Promise<BackportResult> {
    const { client, sequencer, logger } = this.deps;
    const owner = this.config.upstreamOwner;
    const startedAt = Date.now();

    if (!isValidRepoName(request.repo)) {
      throw new BackportError(`Invalid repository name: ${request.repo}`);
    }

    const token = await client.createToken(request.username, request.password);
    logger?.info("auth.done", `Authenticated as ${request.username}`);

    const source = await client.getPullRequest(
      token,
      owner,
      request.repo,
      request.number,
    );
    logger?.info(
      "pr.fetched",
      `Pull request #${source.number} "${source.title}" by ${source.author}`,
      { owner, repo: request.repo },
    );

    const shas = await client.getPullRequestCommits(
      token,
      owner,
      request.repo,
      request.number,
    );
    if (shas.length === 0) {
      throw new BackportError(
        `Pull request #${request.number} has no commits to backport`,
      );
    }
    logger?.debug("pr.commits", `Found ${shas.length} commit(s)`, { shas });

    const options: BackportRepoOptions = {
      destBranch: request.destBranch,
      author: source.author,
      repo: request.repo,
      shas,
      branchName: request.branchName,
      caller: request.username,
      committerName: request.committerName,
      committerEmail: request.committerEmail,
    };
    const submission: PullRequestSubmission = {
      title: source.title,
      body: source.body,
      base: request.destBranch,
      head: `${request.username}:${request.branchName}`,
    };

    if (request.dryRun) {
      return {
        dryRun: true,
        source,
        shas,
        commands: buildBackportCommands(options, this.config),
        owner,
        submission,
      };
    }

    const pipeline = await prepareGitRepo(
      sequencer,
      options,
      this.config,
      logger,
    );
    if (!pipeline.success) {
      throw new BackportError(
        `Backport of pull request #${request.number} failed: ${pipeline.error}`,
        pipeline.failedCommand,
      );
    }

    const created = await client.createPullRequest(
      token,
      owner,
      request.repo,
      submission,
    );
    logger?.timing(
      "backport.done",
      `Opened pull request #${created.number}: ${created.url}`,
      Date.now() - startedAt,
    );
    logger?.debug("pr.created", created.raw);

    return { dryRun: false, source, shas, created };
  }
}
