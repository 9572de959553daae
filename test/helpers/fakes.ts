import type { Commit, HostingApi, PullRequest, StableBranch } from "../../src/types/audit.js";
import type { AuditVcs } from "../../src/commands/audit.js";
import { parseStableName, sortStables } from "../../src/git/stable-branches.js";

export const ROBOT = { name: "robot-clickhouse", email: "robot@example.com" };

export function commit(sha: string, name = "dev", email = `${name}@example.com`): Commit {
  return { sha, author: { name, email }, subject: `commit ${sha}` };
}

/**
 * In-memory repository with a linear primary branch (oldest first) and
 * stable branches given by their fork point on it.
 */
export class FakeRepository implements AuditVcs {
  readonly walks: Array<{ from: string; to: string }> = [];
  primaryBranchAsked: string | null = null;

  constructor(
    private readonly history: Commit[],
    private readonly branches: Record<string, string> = {},
    private readonly url = "git@github.com:acme/widgets.git",
  ) {}

  private find(sha: string): Commit {
    const found = this.history.find((c) => c.sha === sha);
    if (!found) throw new Error(`unknown commit ${sha}`);
    return found;
  }

  async listStableBranches(primaryBranch: string): Promise<StableBranch[]> {
    this.primaryBranchAsked = primaryBranch;
    const stables: StableBranch[] = [];
    for (const [name, fork] of Object.entries(this.branches)) {
      const version = parseStableName(name);
      if (version) stables.push({ name, ...version, forkPoint: this.find(fork) });
    }
    return sortStables(stables);
  }

  headAsked: string | null = null;

  async headCommit(primaryBranch: string): Promise<Commit> {
    this.headAsked = primaryBranch;
    const head = this.history[this.history.length - 1];
    if (!head) throw new Error("empty history");
    return head;
  }

  commitsBetween(from: string, to: string): AsyncIterable<Commit> {
    this.walks.push({ from, to });
    const history = this.history;
    return {
      async *[Symbol.asyncIterator]() {
        const start = history.findIndex((c) => c.sha === from);
        for (let i = start; i >= 0 && history[i].sha !== to; i--) yield history[i];
      },
    };
  }

  async mergeBase(a: string): Promise<Commit> {
    return this.find(a);
  }

  async remoteUrl(): Promise<string> {
    return this.url;
  }
}

export class FakeHosting implements HostingApi {
  readonly sinceCalls: string[] = [];

  constructor(
    private readonly pullRequests: PullRequest[],
    private readonly defaultBranch = "master",
  ) {}

  async defaultBranchName(): Promise<string> {
    return this.defaultBranch;
  }

  async pullRequestsMergedSince(commit: string): Promise<Map<number, PullRequest>> {
    this.sinceCalls.push(commit);
    return new Map(this.pullRequests.map((pr) => [pr.number, pr]));
  }
}

export async function collect<T>(items: AsyncIterable<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const item of items) out.push(item);
  return out;
}
