#!/usr/bin/env node

import { Command, InvalidArgumentError, Option } from "commander";
import { runAudit } from "./commands/audit.js";
import { validateAll } from "./commands/validate.js";
import { writeLines } from "./commands/report.js";
import { EXIT } from "./commands/exit-codes.js";
import type { OutputFormat } from "./types/config.js";

function parseCount(value: string): number {
  if (!/^\d+$/.test(value) || Number(value) < 1) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return Number(value);
}

function formatOption(): Option {
  return new Option("--format <format>", "Output format").choices(["human", "jsonl"]).default("human");
}

const program = new Command();

program
  .name("release-hygiene")
  .description("Audit stable release branches and pull-request labels")
  .version("0.1.0")
  .exitOverride((err) => {
    if (err.exitCode === 0) process.exit(0);
    process.exit(EXIT.INVALID_ARGS);
  });

program
  .command("audit", { isDefault: true })
  .description("Report commits not referenced by pull requests and pull requests without a description label")
  .option("-r, --repo <path>", "path to the root of the repository")
  .option("--remote <name>", "remote name of the upstream repository (default: origin)")
  .option("-n <count>", "number of last stable branches to consider (default: 3)", parseCount)
  .addOption(new Option("--token <token>", "token for GitHub access").env("GITHUB_TOKEN").makeOptionMandatory())
  .option("--repository <owner/name>", "GitHub repository (default: inferred from the remote URL)")
  .option("--config <path>", "Path to config directory")
  .option("--env <name>", "Config overlay to apply on top of base.yaml")
  .addOption(formatOption())
  .action(
    async (opts: {
      repo?: string;
      remote?: string;
      n?: number;
      token: string;
      repository?: string;
      config?: string;
      env?: string;
      format: OutputFormat;
    }) => {
      const res = await runAudit({
        token: opts.token,
        repo: opts.repo,
        remote: opts.remote,
        stableCount: opts.n,
        repository: opts.repository,
        configDir: opts.config,
        envName: opts.env,
        format: opts.format,
      });

      if (!res.ok) {
        if (opts.format === "jsonl") {
          process.stdout.write(JSON.stringify({ level: "error", code: res.error.code, message: res.error.message }) + "\n");
        } else {
          console.error(res.error.message);
        }
        process.exit(res.exitCode);
      }

      writeLines(res.lines, { stdout: process.stdout, stderr: process.stderr });
    },
  );

program
  .command("validate")
  .description("Validate the layered configuration")
  .option("--config <path>", "Path to config directory")
  .option("--env <name>", "Config overlay to apply on top of base.yaml")
  .addOption(formatOption())
  .action((opts: { config?: string; env?: string; format: OutputFormat }) => {
    const res = validateAll({ configDir: opts.config, envName: opts.env });

    if (!res.ok) {
      if (opts.format === "jsonl") {
        for (const err of res.errors) process.stdout.write(JSON.stringify(err) + "\n");
      } else {
        for (const err of res.errors) console.error(err.message);
      }
      process.exit(EXIT.INVALID_ARGS);
    }

    if (opts.format === "jsonl") {
      process.stdout.write(JSON.stringify({ level: "info", code: "OK", message: "OK", details: res.config }) + "\n");
    } else {
      console.log("OK");
    }
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(1);
});
