/**
 * Code hosting API types
 */

/**
 * Pull request metadata needed to backport it
 */
export interface PullRequestInfo {
  /** PR number */
  number: number;
  /** PR title */
  title: string;
  /** PR body (empty when the PR has no description) */
  body: string;
  /** Login of the PR author */
  author: string;
}

/**
 * Payload for opening a pull request
 */
export interface PullRequestSubmission {
  /** PR title */
  title: string;
  /** PR body/description */
  body?: string;
  /** Branch the PR targets */
  base: string;
  /** Source ref in `<owner>:<branch>` form */
  head: string;
}

/**
 * Pull request returned by the create call
 */
export interface CreatedPullRequest {
  /** PR number */
  number: number;
  /** Web URL of the PR */
  url: string;
  /** Raw response body */
  raw: string;
}

/**
 * Code hosting API client
 *
 * @remarks
 * Every method rejects with a `CodeHostError` when the host does not answer
 * with the expected status. Nothing is retried.
 */
export interface CodeHostClient {
  /** Exchange a username and password for an API token */
  createToken(username: string, password: string): Promise<string>;

  getPullRequest(
    token: string,
    owner: string,
    repo: string,
    number: number,
  ): Promise<PullRequestInfo>;

  /** SHAs of the PR's commits, in the order the host lists them */
  getPullRequestCommits(
    token: string,
    owner: string,
    repo: string,
    number: number,
  ): Promise<string[]>;

  createPullRequest(
    token: string,
    owner: string,
    repo: string,
    submission: PullRequestSubmission,
  ): Promise<CreatedPullRequest>;
}
