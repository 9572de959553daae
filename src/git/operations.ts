import { simpleGit, type SimpleGit } from "simple-git";
import type { Commit, StableBranch, VersionControl } from "../types/audit.js";
import { RepositoryAccessError } from "../errors.js";
import { parseStableName, sortStables } from "./stable-branches.js";

const FIELD_SEP = "\x1f";
const RECORD_SEP = "\x1e";
const LOG_FORMAT = "--format=%H%x1f%an%x1f%ae%x1f%s%x1e";

export type GitOperationsOptions = {
  remote?: string;
  /** Commits fetched per `git log` call while walking history. */
  pageSize?: number;
};

/** Parse `git log` output produced with {@link LOG_FORMAT}. */
export function parseLog(output: string): Commit[] {
  const commits: Commit[] = [];
  for (const record of output.split(RECORD_SEP)) {
    const line = record.replace(/^\n+/, "");
    if (line.length === 0) continue;
    const [sha, name, email, ...subject] = line.split(FIELD_SEP);
    if (!sha || name === undefined || email === undefined) continue;
    commits.push({ sha, author: { name, email }, subject: subject.join(FIELD_SEP) });
  }
  return commits;
}

function openRepository(repoPath: string): SimpleGit {
  try {
    return simpleGit(repoPath || process.cwd());
  } catch (e) {
    throw new RepositoryAccessError("open", e);
  }
}

/**
 * Git operations wrapper — abstracts simple-git for testability.
 *
 * Stable branches are read from the remote-tracking refs of `remote`, so the
 * audit reflects the upstream state as of the last fetch.
 */
export class GitOperations implements VersionControl {
  private git: SimpleGit;
  readonly remote: string;
  private readonly pageSize: number;

  constructor(repoPath: string, opts: GitOperationsOptions = {}, git?: SimpleGit) {
    this.remote = opts.remote ?? "origin";
    this.pageSize = opts.pageSize ?? 100;
    this.git = git ?? openRepository(repoPath);
  }

  private async raw(operation: string, args: string[]): Promise<string> {
    try {
      return await this.git.raw(args);
    } catch (e) {
      throw new RepositoryAccessError(operation, e);
    }
  }

  /** Resolve a revision to its commit. */
  async readCommit(rev: string): Promise<Commit> {
    const [commit] = parseLog(await this.raw("log", ["log", "-1", LOG_FORMAT, rev, "--"]));
    if (!commit) {
      throw new RepositoryAccessError("log", `no commit for revision '${rev}'`);
    }
    return commit;
  }

  /**
   * Tip of `<remote>/<primaryBranch>`. The local checkout is ignored, so
   * commits that never reached the primary branch are never audited.
   */
  async headCommit(primaryBranch: string): Promise<Commit> {
    return this.readCommit(`${this.remote}/${primaryBranch}`);
  }

  async mergeBase(a: string, b: string): Promise<Commit> {
    const sha = (await this.raw("merge-base", ["merge-base", a, b])).trim();
    if (!sha) {
      throw new RepositoryAccessError("merge-base", `'${a}' and '${b}' have no common ancestor`);
    }
    return this.readCommit(sha);
  }

  /** URL of the configured remote. */
  async remoteUrl(): Promise<string> {
    return (await this.raw("remote get-url", ["remote", "get-url", this.remote])).trim();
  }

  /** Names of the remote's branches, without the `<remote>/` prefix. */
  async listRemoteBranches(): Promise<string[]> {
    const prefix = `refs/remotes/${this.remote}/`;
    const out = await this.raw("for-each-ref", ["for-each-ref", "--format=%(refname)", prefix]);
    return out
      .split("\n")
      .map((line) => line.trim())
      .filter((ref) => ref.startsWith(prefix))
      .map((ref) => ref.slice(prefix.length))
      .filter((name) => name !== "HEAD");
  }

  /**
   * Stable branches of the remote, ascending by `(year, number)`, each with its
   * fork point: the merge-base with the primary branch.
   */
  async listStableBranches(primaryBranch: string): Promise<StableBranch[]> {
    const primaryRef = `${this.remote}/${primaryBranch}`;
    const stables: StableBranch[] = [];

    for (const name of await this.listRemoteBranches()) {
      const version = parseStableName(name);
      if (!version) continue;
      const forkPoint = await this.mergeBase(`${this.remote}/${name}`, primaryRef);
      stables.push({ name, ...version, forkPoint });
    }

    return sortStables(stables);
  }

  /**
   * Commits reachable from `from` by first parents, newest first, stopping
   * before `to`. Every iteration of the returned sequence re-reads history.
   */
  commitsBetween(from: string, to: string): AsyncIterable<Commit> {
    return {
      [Symbol.asyncIterator]: () => this.walk(from, to),
    };
  }

  private async *walk(from: string, to: string): AsyncGenerator<Commit> {
    const range = `${to}..${from}`;
    for (let skip = 0; ; skip += this.pageSize) {
      const page = parseLog(
        await this.raw("log", [
          "log",
          "--first-parent",
          LOG_FORMAT,
          `--skip=${skip}`,
          `--max-count=${this.pageSize}`,
          range,
          "--",
        ]),
      );
      yield* page;
      if (page.length < this.pageSize) return;
    }
  }
}
