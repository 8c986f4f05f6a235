/**
 * Fake code host client for testing
 *
 * @remarks
 * In-memory implementation of CodeHostClient. Pull requests are seeded per
 * `owner/repo#number`, every call is recorded, and created pull requests are
 * kept for assertions.
 */

import { CodeHostError } from "../../errors.js";
import type {
  CodeHostClient,
  CreatedPullRequest,
  PullRequestInfo,
  PullRequestSubmission,
} from "../../types/code-host.js";

/**
 * Seeded pull request with its commit list
 */
export interface FakePullRequest {
  info: PullRequestInfo;
  shas: string[];
}

/**
 * A recorded client call
 */
export type FakeCodeHostCall =
  | { op: "createToken"; username: string }
  | { op: "getPullRequest"; token: string; owner: string; repo: string; number: number }
  | { op: "getPullRequestCommits"; token: string; owner: string; repo: string; number: number }
  | {
      op: "createPullRequest";
      token: string;
      owner: string;
      repo: string;
      submission: PullRequestSubmission;
    };

/**
 * Configuration for FakeCodeHostClient
 */
export interface FakeCodeHostConfig {
  /** Accepted username/password pairs */
  credentials?: Record<string, string>;
  /** Token handed out by createToken */
  token?: string;
  /** Number given to the first created pull request */
  nextNumber?: number;
}

/**
 * Fake CodeHostClient
 *
 * @example
 * ```typescript
 * const host = new FakeCodeHostClient({ credentials: { bob: 'test-password' } });
 * host.addPullRequest('xen-org', 'foo', {
 *   info: { number: 42, title: 'Fix', body: '', author: 'alice' },
 *   shas: ['abc123'],
 * });
 * ```
 */
export class FakeCodeHostClient implements CodeHostClient {
  readonly calls: FakeCodeHostCall[] = [];
  readonly created: Array<{
    owner: string;
    repo: string;
    submission: PullRequestSubmission;
  }> = [];

  private readonly pullRequests = new Map<string, FakePullRequest>();
  private readonly credentials: Record<string, string>;
  private readonly token: string;
  private nextNumber: number;
  private createFailure?: CodeHostError;

  constructor(config: FakeCodeHostConfig = {}) {
    this.credentials = config.credentials ?? {};
    this.token = config.token ?? "test-token";
    this.nextNumber = config.nextNumber ?? 100;
  }

  addPullRequest(owner: string, repo: string, pr: FakePullRequest): this {
    this.pullRequests.set(key(owner, repo, pr.info.number), pr);
    return this;
  }

  /**
   * Make createPullRequest fail with the given status
   */
  failCreateWith(status: number): this {
    this.createFailure = new CodeHostError(`GitHub API error: ${status}`, {
      method: "POST",
      path: "/pulls",
      status,
    });
    return this;
  }

  async createToken(username: string, password: string): Promise<string> {
    this.calls.push({ op: "createToken", username });
    if (this.credentials[username] !== password) {
      throw new CodeHostError("GitHub API error: 401 Unauthorized", {
        method: "POST",
        path: "/authorizations",
        status: 401,
      });
    }
    return this.token;
  }

  async getPullRequest(
    token: string,
    owner: string,
    repo: string,
    number: number,
  ): Promise<PullRequestInfo> {
    this.calls.push({ op: "getPullRequest", token, owner, repo, number });
    return this.find(token, owner, repo, number).info;
  }

  async getPullRequestCommits(
    token: string,
    owner: string,
    repo: string,
    number: number,
  ): Promise<string[]> {
    this.calls.push({ op: "getPullRequestCommits", token, owner, repo, number });
    return [...this.find(token, owner, repo, number).shas];
  }

  async createPullRequest(
    token: string,
    owner: string,
    repo: string,
    submission: PullRequestSubmission,
  ): Promise<CreatedPullRequest> {
    this.calls.push({ op: "createPullRequest", token, owner, repo, submission });
    this.checkToken(token);
    if (this.createFailure) {
      throw this.createFailure;
    }

    const number = this.nextNumber++;
    this.created.push({ owner, repo, submission });
    const url = `https://github.com/${owner}/${repo}/pull/${number}`;
    return {
      number,
      url,
      raw: JSON.stringify({ number, html_url: url }),
    };
  }

  private find(
    token: string,
    owner: string,
    repo: string,
    number: number,
  ): FakePullRequest {
    this.checkToken(token);
    const pr = this.pullRequests.get(key(owner, repo, number));
    if (!pr) {
      throw new CodeHostError("GitHub API error: 404 Not Found", {
        method: "GET",
        path: `/repos/${owner}/${repo}/pulls/${number}`,
        status: 404,
      });
    }
    return pr;
  }

  private checkToken(token: string): void {
    if (token !== this.token) {
      throw new CodeHostError("GitHub API error: 401 Unauthorized", {
        method: "GET",
        path: "/",
        status: 401,
      });
    }
  }
}

function key(owner: string, repo: string, number: number): string {
  return `${owner}/${repo}#${number}`;
}
