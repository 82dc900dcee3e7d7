import type { Report, ReportItem } from "../types/report.js";
import type { IndexSource } from "../services/types.js";
import type { SchemaRegistry } from "../schema/registry.js";
import { parseDiff } from "../diff/parser.js";
import { checkDiffPaths, type PathRules } from "../diff/path-classifier.js";
import { extractPackages } from "../package/extractor.js";
import { buildPackageReport, type PackageCheckContext } from "../check/package-report.js";
import { silentLog } from "../log/progress.js";

export type PipelineContext = Omit<PackageCheckContext, "index"> & {
  rules: PathRules;
  registry: SchemaRegistry;
  /** Refreshed once per run, after the diff has been accepted and before any package is checked. */
  indexSource: IndexSource;
};

/**
 * Build the report for one pull request diff.
 *
 * Diff → patches → path diagnostics → package descriptors → package reports.
 * Syntax and extraction problems produce an `invalid_diff` report; collaborator
 * transport failures are thrown.
 */
export async function makeReport(diff: string, ctx: PipelineContext): Promise<Report> {
  const log = ctx.log ?? silentLog;

  const parsed = parseDiff(diff);
  if (!parsed.ok) {
    log({ level: "error", code: parsed.error.code, message: parsed.error.message });
    return { kind: "invalid_diff", error: parsed.error };
  }

  const { retained, reports } = checkDiffPaths(parsed.patches, ctx.rules);
  for (const r of reports) {
    log({ level: r.isGood ? "warn" : "error", code: "OUT_OF_SCOPE_PATH", message: r.path });
  }

  const extracted = extractPackages(retained, ctx.rules, ctx.registry);
  if (!extracted.ok) {
    log({ level: "error", code: extracted.error.code, message: extracted.error.message });
    return { kind: "invalid_diff", error: extracted.error };
  }
  log({ level: "info", code: "PACKAGES_FOUND", message: `${extracted.packages.length} package(s) added` });

  const index = await ctx.indexSource.refresh();
  log({ level: "info", code: "INDEX_READY", message: "index snapshot loaded" });

  const items: ReportItem[] = [...reports];
  for (const pkg of extracted.packages) {
    items.push(await buildPackageReport(pkg, { ...ctx, index }));
  }

  return { kind: "items", items };
}
