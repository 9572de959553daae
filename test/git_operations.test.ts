import { afterAll, beforeAll, describe, expect, it } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { simpleGit, type SimpleGit } from "simple-git";
import { GitOperations, parseLog } from "../src/git/operations.js";
import { RepositoryAccessError } from "../src/errors.js";
import { auditRepository } from "../src/policy/auditor.js";
import { FakeHosting, collect } from "./helpers/fakes.js";

const ROBOT = "robot-clickhouse <robot@example.com>";

async function commit(git: SimpleGit, message: string, author = "Dev <dev@example.com>"): Promise<string> {
  await git.raw(["commit", "--allow-empty", "--no-verify", "-m", message, `--author=${author}`]);
  return (await git.revparse(["HEAD"])).trim();
}

describe("parseLog", () => {
  it("splits records and fields", () => {
    const out = "aaa\x1fAlice\x1falice@example.com\x1fFix crash\x1e\nbbb\x1fBob\x1fbob@example.com\x1f\x1e\n";
    expect(parseLog(out)).toEqual([
      { sha: "aaa", author: { name: "Alice", email: "alice@example.com" }, subject: "Fix crash" },
      { sha: "bbb", author: { name: "Bob", email: "bob@example.com" }, subject: "" },
    ]);
  });

  it("returns nothing for empty output", () => {
    expect(parseLog("")).toEqual([]);
    expect(parseLog("\n")).toEqual([]);
  });
});

describe("GitOperations (temporary repository)", () => {
  let dir: string;
  let git: SimpleGit;
  const sha: Record<string, string> = {};

  // master: c1 - c2 - c3 - c4 ; 21.1 forks at c2 (s1 on top), 21.10 points at c3.
  beforeAll(async () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "release-hygiene-git-"));
    git = simpleGit(dir);
    await git.init();
    await git.raw(["symbolic-ref", "HEAD", "refs/heads/master"]);
    await git.addConfig("user.name", "Test Runner");
    await git.addConfig("user.email", "runner@example.com");
    await git.addConfig("commit.gpgsign", "false");

    sha.c1 = await commit(git, "Initial commit");
    sha.c2 = await commit(git, "Fix crash", "Alice <alice@example.com>");
    await git.raw(["checkout", "-q", "-b", "stable-21.1"]);
    sha.s1 = await commit(git, "Backport #10 to 21.1", ROBOT);
    await git.raw(["checkout", "-q", "master"]);
    sha.c3 = await commit(git, "Merge pull request #11");
    sha.c4 = await commit(git, "Update version", ROBOT);

    await git.raw(["remote", "add", "origin", "https://github.com/acme/widgets.git"]);
    await git.raw(["update-ref", "refs/remotes/origin/master", sha.c4]);
    await git.raw(["update-ref", "refs/remotes/origin/21.1", sha.s1]);
    await git.raw(["update-ref", "refs/remotes/origin/21.10", sha.c3]);
    await git.raw(["update-ref", "refs/remotes/origin/2021.1", sha.c4]);
    await git.raw(["update-ref", "refs/remotes/origin/feature-x", sha.c4]);
    await git.raw(["update-ref", "refs/remotes/upstream/22.1", sha.c4]);
  });

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("lists the remote's branches without the remote prefix", async () => {
    const ops = new GitOperations(dir);
    expect((await ops.listRemoteBranches()).sort()).toEqual(["2021.1", "21.1", "21.10", "feature-x", "master"]);
  });

  it("lists stable branches in (year, number) order with merge-base fork points", async () => {
    const ops = new GitOperations(dir);
    const stables = await ops.listStableBranches("master");
    expect(stables.map((s) => [s.name, s.year, s.number, s.forkPoint.sha])).toEqual([
      ["21.1", 21, 1, sha.c2],
      ["21.10", 21, 10, sha.c3],
    ]);
    expect(stables[0].forkPoint.author).toEqual({ name: "Alice", email: "alice@example.com" });
  });

  it("reads branches of another remote", async () => {
    const ops = new GitOperations(dir, { remote: "upstream" });
    expect((await ops.listRemoteBranches())).toEqual(["22.1"]);
  });

  it("resolves the head commit from the remote primary branch", async () => {
    const head = await new GitOperations(dir).headCommit("master");
    expect(head).toEqual({
      sha: sha.c4,
      author: { name: "robot-clickhouse", email: "robot@example.com" },
      subject: "Update version",
    });
  });

  it("computes the merge-base of two revisions", async () => {
    const base = await new GitOperations(dir).mergeBase(sha.s1, sha.c4);
    expect(base.sha).toBe(sha.c2);
  });

  it("walks commits newest first, excluding the lower bound", async () => {
    const ops = new GitOperations(dir);
    const commits = await collect(ops.commitsBetween(sha.c4, sha.c1));
    expect(commits.map((c) => c.sha)).toEqual([sha.c4, sha.c3, sha.c2]);
  });

  it("yields the same commits on every iteration", async () => {
    const walk = new GitOperations(dir).commitsBetween(sha.c4, sha.c2);
    const first = await collect(walk);
    const second = await collect(walk);
    expect(first.map((c) => c.sha)).toEqual([sha.c4, sha.c3]);
    expect(second).toEqual(first);
  });

  it("pages through history", async () => {
    const ops = new GitOperations(dir, { pageSize: 1 });
    const commits = await collect(ops.commitsBetween(sha.c4, sha.c1));
    expect(commits.map((c) => c.sha)).toEqual([sha.c4, sha.c3, sha.c2]);
  });

  it("reads the remote URL", async () => {
    expect(await new GitOperations(dir).remoteUrl()).toBe("https://github.com/acme/widgets.git");
  });

  it("wraps git failures in RepositoryAccessError", async () => {
    const ops = new GitOperations(dir);
    await expect(ops.readCommit("no-such-revision")).rejects.toBeInstanceOf(RepositoryAccessError);
    await expect(ops.listStableBranches("no-such-branch")).rejects.toBeInstanceOf(RepositoryAccessError);
  });

  it("fails outside a repository", async () => {
    const plain = fs.mkdtempSync(path.join(os.tmpdir(), "release-hygiene-plain-"));
    try {
      await expect(new GitOperations(plain).headCommit("master")).rejects.toBeInstanceOf(RepositoryAccessError);
    } finally {
      fs.rmSync(plain, { recursive: true, force: true });
    }
  });

  it("fails for a missing directory", () => {
    expect(() => new GitOperations(path.join(dir, "does-not-exist"))).toThrow(RepositoryAccessError);
  });
});

describe("GitOperations with a local branch checked out", () => {
  let dir: string;
  let git: SimpleGit;
  const sha: Record<string, string> = {};

  // origin/master: c1 - m1 ; origin/21.1 = c1 ; HEAD on local `feature` with an unpushed commit.
  beforeAll(async () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "release-hygiene-feature-"));
    git = simpleGit(dir);
    await git.init();
    await git.raw(["symbolic-ref", "HEAD", "refs/heads/master"]);
    await git.addConfig("user.name", "Test Runner");
    await git.addConfig("user.email", "runner@example.com");
    await git.addConfig("commit.gpgsign", "false");

    sha.c1 = await commit(git, "Initial commit", ROBOT);
    sha.m1 = await commit(git, "Merge pull request #1");
    await git.raw(["update-ref", "refs/remotes/origin/master", sha.m1]);
    await git.raw(["update-ref", "refs/remotes/origin/21.1", sha.c1]);

    await git.raw(["checkout", "-q", "-b", "feature"]);
    sha.wip = await commit(git, "wip", "alice <alice@example.com>");
  });

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("takes the head from the remote primary branch, not from HEAD", async () => {
    const head = await new GitOperations(dir).headCommit("master");
    expect(head.sha).toBe(sha.m1);
    expect((await git.revparse(["HEAD"])).trim()).toBe(sha.wip);
  });

  it("does not report commits that never reached the primary branch", async () => {
    const hosting = new FakeHosting([{ number: 1, mergeCommit: sha.m1, labels: ["pr-feature"] }]);
    const result = await auditRepository(new GitOperations(dir), hosting, { stableCount: 3 });

    expect(result.stables.map((s) => [s.name, s.forkPoint.sha])).toEqual([["21.1", sha.c1]]);
    expect(result.badCommits).toEqual([]);
    expect(result.badAuthors).toEqual([]);
  });
});
