/**
 * Policy rules.
 *
 * 1. Every commit on the primary branch is the merge commit of a pull request,
 *    unless the automation identity pushed it (generated backports).
 * 2. Every pull request carries a description label (`pr-*`).
 */
import type { Commit, PullRequest } from "../types/audit.js";

export const DEFAULT_AUTOMATION_AUTHOR = "robot-clickhouse";
export const DEFAULT_LABEL_PREFIX = "pr-";

export function hasDescriptionLabel(pr: PullRequest, prefix = DEFAULT_LABEL_PREFIX): boolean {
  return pr.labels.some((label) => label.startsWith(prefix));
}

export function isAutomationCommit(commit: Commit, automationAuthor = DEFAULT_AUTOMATION_AUTHOR): boolean {
  return commit.author.name === automationAuthor;
}

/** Rule 1: a commit is bad when no pull request explains it. */
export function isUnreferencedCommit(
  commit: Commit,
  goodCommits: ReadonlySet<string>,
  automationAuthor = DEFAULT_AUTOMATION_AUTHOR,
): boolean {
  return !goodCommits.has(commit.sha) && !isAutomationCommit(commit, automationAuthor);
}
