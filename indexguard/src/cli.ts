#!/usr/bin/env node

import { Command, InvalidArgumentError } from "commander";
import type { Octokit } from "@octokit/rest";
import { validateAll } from "./commands/validate.js";
import { createLocalServices, runCheck, type CheckServices } from "./commands/check.js";
import { EXIT, type ExitCode } from "./commands/exit-codes.js";
import { resolveConfig } from "./config/validator.js";
import { createRegistry } from "./schema/registry.js";
import { createOctokit, GitHubMembershipService, GitHubPullRequestService } from "./github/client.js";
import { FileDiffSource } from "./diff/file-source.js";
import { createProgressLog, type OutputFormat } from "./log/progress.js";
import { redactSensitiveInfo } from "./security/paths.js";
import type { IndexGuardConfig } from "./types/config.js";

type CommonOpts = {
  reporter: string;
  config?: string;
  env?: string;
  token?: string;
  format: OutputFormat;
};

function parsePr(value: string): number {
  const pr = Number(value);
  if (!Number.isInteger(pr) || pr <= 0) {
    throw new InvalidArgumentError("Not a pull request number.");
  }
  return pr;
}

function parseFormat(value: string): OutputFormat {
  if (value !== "human" && value !== "jsonl") {
    throw new InvalidArgumentError("Expected human or jsonl.");
  }
  return value;
}

function fail(format: OutputFormat, code: string, message: string, exit: ExitCode): never {
  const safe = redactSensitiveInfo(message);
  if (format === "jsonl") {
    process.stdout.write(JSON.stringify({ level: "error", code, message: safe }) + "\n");
  } else {
    console.error(safe);
  }
  process.exit(exit);
}

async function loadConfigOrExit(opts: CommonOpts): Promise<IndexGuardConfig> {
  try {
    return await resolveConfig(opts.env, opts.config);
  } catch (e) {
    return fail(opts.format, "CONFIG_INVALID", e instanceof Error ? e.message : String(e), EXIT.INVALID_ARGS);
  }
}

async function check(
  pr: number,
  opts: CommonOpts,
  remote: (octokit: Octokit) => Pick<CheckServices, "diffSource" | "commentSink">,
): Promise<void> {
  const config = await loadConfigOrExit(opts);
  const log = createProgressLog(opts.format);
  const registry = await createRegistry();
  const octokit = createOctokit(opts.token ?? process.env.GITHUB_TOKEN);

  // Transport and index failures propagate to the top-level handler (EXIT.FATAL).
  const res = await runCheck(
    { pr, reporter: opts.reporter, config, format: opts.format, log },
    {
      ...remote(octokit),
      membership: new GitHubMembershipService(octokit),
      registry,
      ...createLocalServices(config, registry),
    },
  );
  if (!res.good) {
    console.error("Failing report");
    process.exit(EXIT.REPORT_FAILED);
  }
}

const program = new Command();

program
  .name("indexguard")
  .description("Validates pull requests that add packages to a package index")
  .version("0.1.0");

function withCommon(cmd: Command): Command {
  return cmd
    .requiredOption("--reporter <user>", "Login of the pull request author")
    .option("--config <path>", "Path to config directory")
    .option("--env <name>", "Config environment overlay, e.g. local")
    .option("--token <token>", "GitHub token (default: $GITHUB_TOKEN)")
    .option("--format <format>", "Output format: human|jsonl", parseFormat, "human");
}

withCommon(
  program
    .command("check")
    .description("Check a pull request and post the report on it")
    .requiredOption("--owner <owner>", "Owner of the index repository")
    .requiredOption("--repo <repo>", "Name of the index repository")
    .requiredOption("--pr <number>", "Pull request number", parsePr),
).action(async (opts: CommonOpts & { owner: string; repo: string; pr: number }) => {
  await check(opts.pr, opts, (octokit) => {
    const prs = new GitHubPullRequestService(octokit, { owner: opts.owner, repo: opts.repo });
    return { diffSource: prs, commentSink: prs };
  });
});

withCommon(
  program
    .command("check-diff")
    .description("Check a diff saved to a file and print the report")
    .requiredOption("--diff <file>", "Unified diff of the pull request"),
).action(async (opts: CommonOpts & { diff: string }) => {
  await check(0, opts, () => ({ diffSource: new FileDiffSource(opts.diff), commentSink: null }));
});

program
  .command("validate-config")
  .description("Validate the layered configuration and the bundled schemas")
  .option("--config <path>", "Path to config directory")
  .option("--env <name>", "Config environment overlay")
  .option("--format <format>", "Output format: human|jsonl", parseFormat, "human")
  .action(async (opts: { config?: string; env?: string; format: OutputFormat }) => {
    const res = await validateAll({ configDir: opts.config, envName: opts.env });

    if (!res.ok) {
      if (opts.format === "jsonl") {
        for (const err of res.errors) {
          process.stdout.write(JSON.stringify(err) + "\n");
        }
      } else {
        for (const err of res.errors) console.error(err.message);
      }
      process.exit(EXIT.INVALID_ARGS);
    }

    if (opts.format === "jsonl") {
      process.stdout.write(JSON.stringify({ level: "info", code: "OK", message: "OK" }) + "\n");
    } else {
      console.log("OK");
    }
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: redactSensitiveInfo(message) }) + "\n");
  process.exit(EXIT.FATAL);
});
