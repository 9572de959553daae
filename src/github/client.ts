import { graphql } from "@octokit/graphql";
import type { HostingApi, PullRequest } from "../types/audit.js";
import { HostingApiError } from "../errors.js";
import { formatSlug, type RepositorySlug } from "./repository.js";
import {
  DEFAULT_BRANCH_QUERY,
  MERGED_PULL_REQUESTS_QUERY,
  type DefaultBranchResponse,
  type HistoryNode,
  type MergedPullRequestsResponse,
} from "./queries.js";

export type GitHubClientOptions = {
  token: string;
  repository: RepositorySlug;
  apiUrl?: string;
  /** History commits per GraphQL page (GitHub caps it at 100). */
  pageSize?: number;
  /** Replaces the global fetch; tests use it to stay in process. */
  fetch?: typeof fetch;
};

type QueryVariables = {
  pageSize?: number;
  cursor?: string | null;
};

/**
 * GitHub GraphQL client. Every failure surfaces as {@link HostingApiError};
 * nothing is retried.
 */
export class GitHubClient implements HostingApi {
  private readonly request: typeof graphql;
  private readonly repository: RepositorySlug;
  private readonly pageSize: number;

  constructor(opts: GitHubClientOptions) {
    this.repository = opts.repository;
    this.pageSize = opts.pageSize ?? 100;
    this.request = graphql.defaults({
      baseUrl: opts.apiUrl ?? "https://api.github.com",
      headers: { authorization: `token ${opts.token}` },
      ...(opts.fetch ? { request: { fetch: opts.fetch } } : {}),
    });
  }

  private async query<T>(query: string, variables: QueryVariables): Promise<T> {
    try {
      return await this.request<T>(query, { owner: this.repository.owner, name: this.repository.name, ...variables });
    } catch (e) {
      throw new HostingApiError(`GitHub request for ${formatSlug(this.repository)} failed`, e);
    }
  }

  async defaultBranchName(): Promise<string> {
    const res = await this.query<DefaultBranchResponse>(DEFAULT_BRANCH_QUERY, {});
    const name = res.repository?.defaultBranchRef?.name;
    if (!name) {
      throw new HostingApiError(`${formatSlug(this.repository)} has no default branch`);
    }
    return name;
  }

  /**
   * Pull requests merged into the default branch from its tip back to `commit`
   * (inclusive). When `commit` is never met the whole history is read.
   */
  async pullRequestsMergedSince(commit: string): Promise<Map<number, PullRequest>> {
    const pullRequests = new Map<number, PullRequest>();
    let cursor: string | null = null;

    for (;;) {
      const res: MergedPullRequestsResponse = await this.query<MergedPullRequestsResponse>(
        MERGED_PULL_REQUESTS_QUERY,
        { pageSize: this.pageSize, cursor },
      );
      const repo = res.repository;
      const branch = repo?.defaultBranchRef;
      const history = branch?.target?.history;
      if (!repo || !branch || !history) {
        throw new HostingApiError(`${formatSlug(this.repository)} returned no default branch history`);
      }

      for (const node of history.nodes ?? []) {
        if (!node) continue;
        collectPullRequests(node, branch.name, repo.nameWithOwner, pullRequests);
        if (node.oid === commit) return pullRequests;
      }

      if (!history.pageInfo.hasNextPage || !history.pageInfo.endCursor) return pullRequests;
      cursor = history.pageInfo.endCursor;
    }
  }
}

/**
 * Keep pull requests merged into `baseRef` of `baseRepository` itself (forks' internal PRs are skipped).
 * A connection longer than the fetched page is an error: a missing pull request
 * or label would show up as a violation.
 */
export function collectPullRequests(
  node: HistoryNode,
  baseRef: string,
  baseRepository: string,
  into: Map<number, PullRequest>,
): void {
  const associated = node.associatedPullRequests?.nodes ?? [];
  const associatedCount = node.associatedPullRequests?.totalCount ?? 0;
  if (associatedCount > associated.length) {
    throw new HostingApiError(
      `Commit ${node.oid} has ${associatedCount} associated pull requests, only ${associated.length} were fetched`,
    );
  }

  for (const pr of associated) {
    if (!pr || !pr.mergeCommit) continue;
    if (pr.baseRefName !== baseRef) continue;
    if (pr.baseRepository?.nameWithOwner !== baseRepository) continue;
    if (into.has(pr.number)) continue;

    const labelNodes = pr.labels?.nodes ?? [];
    const labelCount = pr.labels?.totalCount ?? 0;
    if (labelCount > labelNodes.length) {
      throw new HostingApiError(
        `Pull request #${pr.number} has ${labelCount} labels, only ${labelNodes.length} were fetched`,
      );
    }

    const labels: string[] = [];
    for (const label of labelNodes) {
      if (label) labels.push(label.name);
    }
    into.set(pr.number, { number: pr.number, mergeCommit: pr.mergeCommit.oid, labels });
  }
}
