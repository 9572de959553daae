import type { AuditResult, HostingApi, VersionControl } from "../types/audit.js";
import type { OutputFormat } from "../types/config.js";
import { HygieneError, type HygieneErrorCode } from "../errors.js";
import { resolveConfig } from "../config/loader.js";
import { GitOperations } from "../git/operations.js";
import { GitHubClient } from "../github/client.js";
import { parseRepositorySlug, parseSlug } from "../github/repository.js";
import { auditRepository } from "../policy/auditor.js";
import { EXIT, type ExitCode } from "./exit-codes.js";
import { renderReport, type OutputLine } from "./report.js";

export type AuditVcs = VersionControl & { remoteUrl(): Promise<string> };

export type AuditCommandOptions = {
  token: string;
  repo?: string;
  remote?: string;
  stableCount?: number;
  repository?: string;
  configDir?: string;
  envName?: string;
  format?: OutputFormat;
  env?: NodeJS.ProcessEnv;
  /** Adapters to use instead of git and GitHub. */
  vcs?: AuditVcs;
  hosting?: HostingApi;
  /** Passed to the GitHub client when no `hosting` is given. */
  fetch?: typeof fetch;
};

export type AuditCommandResult =
  | { ok: true; result: AuditResult; lines: OutputLine[] }
  | { ok: false; exitCode: ExitCode; error: { code: HygieneErrorCode; message: string } };

const EXIT_FOR: Record<HygieneErrorCode, ExitCode> = {
  NO_STABLE_BRANCHES: EXIT.NO_STABLE_BRANCHES,
  CONFIG_INVALID: EXIT.INVALID_ARGS,
  REPOSITORY_ACCESS_ERROR: EXIT.REPOSITORY_ACCESS,
  HOSTING_API_ERROR: EXIT.HOSTING_API,
};

/**
 * Run one audit. Known failures come back as `{ ok: false }` with the exit
 * code to use; anything else propagates.
 */
export async function runAudit(opts: AuditCommandOptions): Promise<AuditCommandResult> {
  try {
    const config = resolveConfig({
      envName: opts.envName,
      configDir: opts.configDir,
      env: opts.env,
      overrides: {
        remote: opts.remote,
        stable_count: opts.stableCount,
        repository: opts.repository,
      },
    });

    const vcs = opts.vcs ?? new GitOperations(opts.repo ?? "", { remote: config.remote, pageSize: config.page_size });

    let hosting = opts.hosting;
    if (!hosting) {
      const repository = config.repository
        ? parseSlug(config.repository)
        : parseRepositorySlug(await vcs.remoteUrl());
      hosting = new GitHubClient({
        token: opts.token,
        repository,
        apiUrl: config.api_url,
        pageSize: config.page_size,
        fetch: opts.fetch,
      });
    }

    const result = await auditRepository(vcs, hosting, {
      stableCount: config.stable_count,
      automationAuthor: config.automation_author,
      labelPrefix: config.label_prefix,
    });

    return { ok: true, result, lines: renderReport(result, opts.format ?? "human", config.label_prefix) };
  } catch (e) {
    if (e instanceof HygieneError) {
      return { ok: false, exitCode: EXIT_FOR[e.code], error: { code: e.code, message: e.message } };
    }
    throw e;
  }
}
