/**
 * GitHub REST API client
 */

import { z } from "zod";
import { CodeHostError } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import type {
  CodeHostClient,
  CreatedPullRequest,
  PullRequestInfo,
  PullRequestSubmission,
} from "../types/code-host.js";
import { DEFAULT_API_URL } from "../types/constants.js";

/**
 * GitHub client configuration
 */
export interface GitHubClientConfig {
  /** API root (default: https://api.github.com, override for GitHub Enterprise) */
  apiUrl?: string;
  /** Note attached to tokens created by {@link GitHubClient.createToken} */
  tokenNote?: string;
  logger?: Logger;
}

const authorizationSchema = z.object({ token: z.string().min(1) });

const pullRequestSchema = z.object({
  number: z.number().int(),
  title: z.string(),
  body: z.string().nullable().optional(),
  user: z.object({ login: z.string() }),
});

const commitListSchema = z.array(z.object({ sha: z.string() }));

const createdPullRequestSchema = z.object({
  number: z.number().int(),
  html_url: z.string(),
});

/** Page size for the commit listing (GitHub's maximum) */
const COMMITS_PER_PAGE = 100;

type HttpMethod = "GET" | "POST";

interface RequestSpec {
  method: HttpMethod;
  path: string;
  authorization: string;
  expectedStatus: number;
  body?: unknown;
}

/**
 * GitHub API client
 *
 * @remarks
 * Talks to the REST API with the global `fetch`. Every call expects one
 * exact status code and throws a {@link CodeHostError} on anything else;
 * nothing is retried.
 *
 * @example
 * ```typescript
 * const client = new GitHubClient();
 * const token = await client.createToken('bob', password);
 * const pr = await client.getPullRequest(token, 'xen-org', 'foo', 42);
 * ```
 */
export class GitHubClient implements CodeHostClient {
  private readonly apiUrl: string;
  private readonly tokenNote: string;
  private readonly logger?: Logger;

  constructor(config: GitHubClientConfig = {}) {
    this.apiUrl = (config.apiUrl ?? DEFAULT_API_URL).replace(/\/+$/, "");
    this.tokenNote = config.tokenNote ?? "backport-pr";
    this.logger = config.logger;
  }

  /**
   * Exchange a username and password for an OAuth token
   *
   * @remarks
   * Uses the authorizations endpoint with Basic authentication and asks
   * for the `repo` scope.
   */
  async createToken(username: string, password: string): Promise<string> {
    const basic = Buffer.from(`${username}:${password}`).toString("base64");
    const data = await this.request(
      {
        method: "POST",
        path: "/authorizations",
        authorization: `Basic ${basic}`,
        expectedStatus: 201,
        body: {
          scopes: ["repo"],
          note: `${this.tokenNote} ${new Date().toISOString()}`,
        },
      },
      authorizationSchema,
    );
    return data.token;
  }

  async getPullRequest(
    token: string,
    owner: string,
    repo: string,
    number: number,
  ): Promise<PullRequestInfo> {
    const data = await this.request(
      {
        method: "GET",
        path: `${repoPath(owner, repo)}/pulls/${number}`,
        authorization: `Bearer ${token}`,
        expectedStatus: 200,
      },
      pullRequestSchema,
    );

    return {
      number: data.number,
      title: data.title,
      body: data.body ?? "",
      author: data.user.login,
    };
  }

  /**
   * @remarks
   * Follows pages of {@link COMMITS_PER_PAGE} until a short page; GitHub
   * itself stops listing after 250 commits.
   */
  async getPullRequestCommits(
    token: string,
    owner: string,
    repo: string,
    number: number,
  ): Promise<string[]> {
    const shas: string[] = [];

    for (let page = 1; ; page++) {
      const data = await this.request(
        {
          method: "GET",
          path: `${repoPath(owner, repo)}/pulls/${number}/commits?per_page=${COMMITS_PER_PAGE}&page=${page}`,
          authorization: `Bearer ${token}`,
          expectedStatus: 200,
        },
        commitListSchema,
      );

      shas.push(...data.map((commit) => commit.sha));
      if (data.length < COMMITS_PER_PAGE) {
        return shas;
      }
    }
  }

  async createPullRequest(
    token: string,
    owner: string,
    repo: string,
    submission: PullRequestSubmission,
  ): Promise<CreatedPullRequest> {
    const { data, raw } = await this.requestWithRaw(
      {
        method: "POST",
        path: `${repoPath(owner, repo)}/pulls`,
        authorization: `Bearer ${token}`,
        expectedStatus: 201,
        body: {
          title: submission.title,
          body: submission.body,
          base: submission.base,
          head: submission.head,
        },
      },
      createdPullRequestSchema,
    );

    return { number: data.number, url: data.html_url, raw };
  }

  private async request<T>(req: RequestSpec, schema: z.ZodType<T>): Promise<T> {
    const { data } = await this.requestWithRaw(req, schema);
    return data;
  }

  private async requestWithRaw<T>(
    req: RequestSpec,
    schema: z.ZodType<T>,
  ): Promise<{ data: T; raw: string }> {
    const details = { method: req.method, path: req.path };
    const startedAt = Date.now();

    let response: Response;
    try {
      response = await fetch(`${this.apiUrl}${req.path}`, {
        method: req.method,
        headers: {
          Authorization: req.authorization,
          Accept: "application/vnd.github+json",
          "X-GitHub-Api-Version": "2022-11-28",
          ...(req.body === undefined
            ? {}
            : { "Content-Type": "application/json" }),
        },
        body: req.body === undefined ? undefined : JSON.stringify(req.body),
      });
    } catch (error) {
      throw new CodeHostError(
        `GitHub request failed: ${req.method} ${req.path}: ${error instanceof Error ? error.message : String(error)}`,
        { ...details, status: null },
        error,
      );
    }

    const raw = await response.text();
    this.logger?.debug(
      "github.response",
      `${req.method} ${req.path} -> ${response.status}`,
      { duration: Date.now() - startedAt },
    );

    if (response.status !== req.expectedStatus) {
      throw new CodeHostError(
        `GitHub API error: ${response.status} ${response.statusText} (${req.method} ${req.path}, expected ${req.expectedStatus})${errorDetail(raw)}`,
        { ...details, status: response.status },
      );
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new CodeHostError(
        `GitHub API returned invalid JSON for ${req.method} ${req.path}`,
        { ...details, status: response.status },
        error,
      );
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      throw new CodeHostError(
        `Unexpected GitHub API response for ${req.method} ${req.path}: ${parsed.error.issues
          .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
          .join("; ")}`,
        { ...details, status: response.status },
        parsed.error,
      );
    }

    return { data: parsed.data, raw };
  }
}

function repoPath(owner: string, repo: string): string {
  return `/repos/${encodeURIComponent(owner)}/${encodeURIComponent(repo)}`;
}

const errorBodySchema = z.object({ message: z.string() });

/**
 * `: <message>` from a GitHub error body, or nothing
 */
function errorDetail(raw: string): string {
  try {
    const parsed = errorBodySchema.safeParse(JSON.parse(raw));
    return parsed.success ? `: ${parsed.data.message}` : "";
  } catch {
    return "";
  }
}
