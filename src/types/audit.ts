/** Audit data model — everything the adapters hand to the auditor. */
export type Author = {
  name: string;
  email: string;
};

export type Commit = {
  sha: string;
  author: Author;
  subject: string;
};

/** Release branch named `YY.NUMBER`, forked from the primary branch. */
export type StableBranch = {
  name: string;
  year: number;
  number: number;
  forkPoint: Commit;
};

export type PullRequest = {
  number: number;
  mergeCommit: string;
  labels: string[];
};

export type AuditResult = {
  stables: StableBranch[];
  badCommits: Commit[];
  badAuthors: Author[];
  badPullRequests: number[];
  pullRequestCount: number;
};

/** Repository queries the auditor needs. */
export interface VersionControl {
  listStableBranches(primaryBranch: string): Promise<StableBranch[]>;
  /** Tip of the primary branch: the newest end of the audited span. */
  headCommit(primaryBranch: string): Promise<Commit>;
  commitsBetween(from: string, to: string): AsyncIterable<Commit>;
  mergeBase(a: string, b: string): Promise<Commit>;
}

/** Code-hosting queries the auditor needs. */
export interface HostingApi {
  defaultBranchName(): Promise<string>;
  pullRequestsMergedSince(commit: string): Promise<Map<number, PullRequest>>;
}
