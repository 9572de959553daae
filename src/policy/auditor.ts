import type {
  AuditResult,
  Author,
  Commit,
  HostingApi,
  PullRequest,
  StableBranch,
  VersionControl,
} from "../types/audit.js";
import { NoStableBranchesError } from "../errors.js";
import { lastStables } from "../git/stable-branches.js";
import {
  DEFAULT_AUTOMATION_AUTHOR,
  DEFAULT_LABEL_PREFIX,
  hasDescriptionLabel,
  isUnreferencedCommit,
} from "./rules.js";

export type AuditOptions = {
  stableCount: number;
  automationAuthor?: string;
  labelPrefix?: string;
};

/** A range of history walked from `from` down to (excluding) `to`. */
export type Segment = {
  from: string;
  to: string;
};

/**
 * Split the span from `head` to the oldest fork point into consecutive
 * segments, newest first: head → newest fork point → … → oldest fork point.
 */
export function segmentsFor(head: string, stables: readonly StableBranch[]): Segment[] {
  const segments: Segment[] = [];
  let from = head;
  for (let i = stables.length - 1; i >= 0; i--) {
    const to = stables[i].forkPoint.sha;
    segments.push({ from, to });
    from = to;
  }
  return segments;
}

/** Distinct authors (same name and email), sorted by name. */
export function distinctAuthors(commits: readonly Commit[]): Author[] {
  const byIdentity = new Map<string, Author>();
  for (const { author } of commits) {
    const key = `${author.name}\0${author.email}`;
    if (!byIdentity.has(key)) byIdentity.set(key, author);
  }
  return [...byIdentity.values()].sort((a, b) => compareText(a.name, b.name) || compareText(a.email, b.email));
}

function compareText(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/** Numbers of pull requests without a description label, descending. */
export function findBadPullRequests(
  pullRequests: Iterable<PullRequest>,
  labelPrefix = DEFAULT_LABEL_PREFIX,
): number[] {
  const bad: number[] = [];
  for (const pr of pullRequests) {
    if (!hasDescriptionLabel(pr, labelPrefix)) bad.push(pr.number);
  }
  return bad.sort((a, b) => b - a);
}

/** Walk every segment and collect commits that no pull request explains. */
export async function findBadCommits(
  vcs: Pick<VersionControl, "commitsBetween">,
  segments: readonly Segment[],
  goodCommits: ReadonlySet<string>,
  automationAuthor = DEFAULT_AUTOMATION_AUTHOR,
): Promise<Commit[]> {
  const bad: Commit[] = [];
  for (const segment of segments) {
    for await (const commit of vcs.commitsBetween(segment.from, segment.to)) {
      if (isUnreferencedCommit(commit, goodCommits, automationAuthor)) bad.push(commit);
    }
  }
  return bad;
}

/**
 * Audit the last `stableCount` stable branches and everything after them.
 *
 * Adapter failures propagate unchanged. Throws {@link NoStableBranchesError}
 * when the repository has no stable branch at all.
 */
export async function auditRepository(
  vcs: VersionControl,
  hosting: HostingApi,
  opts: AuditOptions,
): Promise<AuditResult> {
  const automationAuthor = opts.automationAuthor ?? DEFAULT_AUTOMATION_AUTHOR;
  const labelPrefix = opts.labelPrefix ?? DEFAULT_LABEL_PREFIX;

  const primaryBranch = await hosting.defaultBranchName();
  const stables = lastStables(await vcs.listStableBranches(primaryBranch), opts.stableCount);
  if (stables.length === 0) throw new NoStableBranchesError();

  const head = await vcs.headCommit(primaryBranch);
  const pullRequests = await hosting.pullRequestsMergedSince(stables[0].forkPoint.sha);
  const goodCommits = new Set<string>();
  for (const pr of pullRequests.values()) goodCommits.add(pr.mergeCommit);

  const badCommits = await findBadCommits(vcs, segmentsFor(head.sha, stables), goodCommits, automationAuthor);

  return {
    stables,
    badCommits,
    badAuthors: distinctAuthors(badCommits),
    badPullRequests: findBadPullRequests(pullRequests.values(), labelPrefix),
    pullRequestCount: pullRequests.size,
  };
}
