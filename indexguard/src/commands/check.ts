import path from "node:path";
import type { IndexGuardConfig } from "../types/config.js";
import type { Report } from "../types/report.js";
import type {
  CommentSink,
  DiffSource,
  IndexSource,
  ManifestEvaluator,
  MembershipService,
  SourceFetcher,
} from "../services/types.js";
import type { SchemaRegistry } from "../schema/registry.js";
import { makeReport } from "../core/pipeline.js";
import { renderReport } from "../report/render.js";
import { isReportGood } from "../report/verdict.js";
import { silentLog, type OutputFormat, type ProgressLog, type WritableText } from "../log/progress.js";
import { GitSourceFetcher } from "../git/source-fetcher.js";
import { GitIndexSource } from "../index/package-index.js";
import { CommandManifestEvaluator } from "../manifest/evaluator.js";

export type CheckServices = {
  diffSource: DiffSource;
  membership: MembershipService;
  /** null prints the report without posting it. */
  commentSink: CommentSink | null;
  fetcher: SourceFetcher;
  evaluator: ManifestEvaluator;
  indexSource: IndexSource;
  registry: SchemaRegistry;
};

export type CheckOptions = {
  pr: number;
  reporter: string;
  config: IndexGuardConfig;
  format: OutputFormat;
  out?: WritableText;
  log?: ProgressLog;
};

export type CheckResult = {
  report: Report;
  text: string;
  good: boolean;
};

/** The git- and command-backed collaborators described by the config. */
export function createLocalServices(
  config: IndexGuardConfig,
  registry: SchemaRegistry,
  cwd = process.cwd(),
): Pick<CheckServices, "fetcher" | "evaluator" | "indexSource"> {
  return {
    fetcher: new GitSourceFetcher(config.forge_url_template),
    evaluator: new CommandManifestEvaluator(config.manifest, registry),
    indexSource: new GitIndexSource({
      repository: config.index_repository,
      branch: config.index_branch,
      cacheDir: path.resolve(cwd, config.index_cache_dir),
      indexRoot: config.index_root,
      registry,
    }),
  };
}

/**
 * Check one pull request: build the report, print it, post it, then decide.
 * The printed and posted text are identical.
 */
export async function runCheck(opts: CheckOptions, services: CheckServices): Promise<CheckResult> {
  const out = opts.out ?? process.stdout;
  const log = opts.log ?? silentLog;
  const { config } = opts;

  const diff = await services.diffSource.getPullRequestDiff(opts.pr);
  const report = await makeReport(diff, {
    user: opts.reporter,
    rules: {
      newFilePrefix: config.new_file_prefix,
      indexRoot: config.index_root,
      allowedPaths: config.allowed_paths,
    },
    registry: services.registry,
    membership: services.membership,
    fetcher: services.fetcher,
    evaluator: services.evaluator,
    indexSource: services.indexSource,
    manifestFileName: config.manifest.file_name,
    log,
  });

  const text = renderReport(report, config.glyphs);
  const good = isReportGood(report);

  if (opts.format === "jsonl") {
    out.write(JSON.stringify({ level: good ? "info" : "error", code: good ? "REPORT_OK" : "REPORT_FAILED", report: text }) + "\n");
  } else {
    out.write(text);
  }

  if (services.commentSink) {
    await services.commentSink.postComment(opts.pr, text);
    log({ level: "info", code: "COMMENT_POSTED", message: `report posted on #${opts.pr}` });
  }

  return { report, text, good };
}
