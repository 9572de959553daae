import type { AuditResult } from "../types/audit.js";
import type { OutputFormat } from "../types/config.js";
import type { Diagnostic } from "../types/diagnostic.js";

export const CHECK_MARK = "🗸";
export const CROSS_MARK = "🗙";
export const AUTHOR_MARK = "⚠";

export type OutputLine = {
  stream: "stdout" | "stderr";
  text: string;
};

export type Sink = { write(chunk: string): unknown };

function out(text: string): OutputLine {
  return { stream: "stdout", text };
}

function err(text: string): OutputLine {
  return { stream: "stderr", text };
}

/**
 * Human report. Branches and the authors to warn go to stdout; the
 * violations themselves go to stderr.
 */
export function renderHuman(result: AuditResult): OutputLine[] {
  const lines: OutputLine[] = [out("Found stable branches:")];
  for (const stable of result.stables) {
    lines.push(out(`${CHECK_MARK} ${stable.name} forked from ${stable.forkPoint.sha}`));
  }

  if (result.badPullRequests.length > 0) {
    lines.push(err(""), err("Pull-requests without description label:"));
    for (const num of result.badPullRequests) lines.push(err(`${CROSS_MARK} ${num}`));
  }

  if (result.badCommits.length > 0) {
    lines.push(err(""), err("Commits not referenced by any pull-request:"));
    for (const commit of result.badCommits) lines.push(err(`${CROSS_MARK} ${commit.sha}`));

    lines.push(out(""), out("Tell these authors not to push without pull-request and not to merge with rebase:"));
    for (const author of result.badAuthors) lines.push(out(`${AUTHOR_MARK} ${author.name} <${author.email}>`));
  }

  return lines;
}

export function toDiagnostics(result: AuditResult, labelPrefix: string): Diagnostic[] {
  const diagnostics: Diagnostic[] = [];

  for (const stable of result.stables) {
    diagnostics.push({
      level: "info",
      code: "STABLE_BRANCH",
      message: `${stable.name} forked from ${stable.forkPoint.sha}`,
      details: { name: stable.name, fork_point: stable.forkPoint.sha },
    });
  }

  for (const num of result.badPullRequests) {
    diagnostics.push({
      level: "warn",
      code: "PR_WITHOUT_LABEL",
      message: `Pull request #${num} has no '${labelPrefix}' label`,
      details: { number: num },
    });
  }

  for (const commit of result.badCommits) {
    diagnostics.push({
      level: "warn",
      code: "UNREFERENCED_COMMIT",
      message: `Commit ${commit.sha} is not referenced by any pull request`,
      details: { sha: commit.sha, author: commit.author.name, email: commit.author.email, subject: commit.subject },
    });
  }

  for (const author of result.badAuthors) {
    diagnostics.push({
      level: "warn",
      code: "AUTHOR_TO_WARN",
      message: `${author.name} <${author.email}>`,
      details: { name: author.name, email: author.email },
    });
  }

  diagnostics.push({
    level: "info",
    code: "OK",
    message: `Audited ${result.stables.length} stable branches and ${result.pullRequestCount} pull requests`,
    details: {
      unreferenced_commits: result.badCommits.length,
      pull_requests_without_label: result.badPullRequests.length,
    },
  });

  return diagnostics;
}

/** JSONL report: one diagnostic per line, all on stdout. */
export function renderJsonl(result: AuditResult, labelPrefix: string): OutputLine[] {
  return toDiagnostics(result, labelPrefix).map((d) => out(JSON.stringify(d)));
}

export function renderReport(result: AuditResult, format: OutputFormat, labelPrefix: string): OutputLine[] {
  return format === "jsonl" ? renderJsonl(result, labelPrefix) : renderHuman(result);
}

export function writeLines(lines: readonly OutputLine[], sinks: { stdout: Sink; stderr: Sink }): void {
  for (const line of lines) sinks[line.stream].write(line.text + "\n");
}
