export const DEFAULT_BRANCH_QUERY = /* GraphQL */ `
  query DefaultBranch($owner: String!, $name: String!) {
    repository(owner: $owner, name: $name) {
      defaultBranchRef {
        name
      }
    }
  }
`;

/** Default branch history, newest first, with the pull requests behind each commit. */
export const MERGED_PULL_REQUESTS_QUERY = /* GraphQL */ `
  query MergedPullRequests($owner: String!, $name: String!, $pageSize: Int!, $cursor: String) {
    repository(owner: $owner, name: $name) {
      nameWithOwner
      defaultBranchRef {
        name
        target {
          ... on Commit {
            history(first: $pageSize, after: $cursor) {
              pageInfo {
                hasNextPage
                endCursor
              }
              nodes {
                oid
                associatedPullRequests(first: 10) {
                  totalCount
                  nodes {
                    number
                    baseRefName
                    baseRepository {
                      nameWithOwner
                    }
                    mergeCommit {
                      oid
                    }
                    labels(first: 50) {
                      totalCount
                      nodes {
                        name
                      }
                    }
                  }
                }
              }
            }
          }
        }
      }
    }
  }
`;

export type DefaultBranchResponse = {
  repository: {
    defaultBranchRef: { name: string } | null;
  } | null;
};

export type PullRequestNode = {
  number: number;
  baseRefName: string;
  baseRepository: { nameWithOwner: string } | null;
  mergeCommit: { oid: string } | null;
  labels: { totalCount: number; nodes: Array<{ name: string } | null> | null } | null;
};

export type HistoryNode = {
  oid: string;
  associatedPullRequests: { totalCount: number; nodes: Array<PullRequestNode | null> | null } | null;
};

export type MergedPullRequestsResponse = {
  repository: {
    nameWithOwner: string;
    defaultBranchRef: {
      name: string;
      target: {
        history?: {
          pageInfo: { hasNextPage: boolean; endCursor: string | null };
          nodes: Array<HistoryNode | null> | null;
        };
      } | null;
    } | null;
  } | null;
};
