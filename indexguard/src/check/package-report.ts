import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { PackageDescriptor } from "../types/descriptor.js";
import { indexPath } from "../types/descriptor.js";
import type { PackageReport, PackageStatus } from "../types/report.js";
import type {
  ManifestEvaluator,
  MembershipService,
  PackageIndex,
  SourceFetcher,
} from "../services/types.js";
import { safePath } from "../security/paths.js";
import { silentLog, type ProgressLog } from "../log/progress.js";
import { checkPermission } from "./permission.js";
import { checkManifest } from "./manifest-check.js";

export type PackageCheckContext = {
  /** Handle of the pull request author. */
  user: string;
  membership: MembershipService;
  fetcher: SourceFetcher;
  evaluator: ManifestEvaluator;
  index: PackageIndex;
  manifestFileName: string;
  /** Parent of the per-package scratch directories. Defaults to the OS temp dir. */
  scratchRoot?: string;
  log?: ProgressLog;
};

async function fetchAndCheck(
  pkg: PackageDescriptor,
  ctx: PackageCheckContext,
  scratch: string,
  log: ProgressLog,
): Promise<PackageStatus> {
  const name = indexPath(pkg.id);

  const fetched = await ctx.fetcher.fetch(pkg.id, scratch);
  if (!fetched.ok) {
    log({ level: "warn", code: "FETCH_FAILED", message: `${name}: ${fetched.message}` });
    return { kind: "fetch_failed", message: fetched.message };
  }

  const manifestFile = safePath(scratch, pkg.id.path, ctx.manifestFileName);
  const evaluated = await ctx.evaluator.evaluate(manifestFile);
  if (!evaluated.ok) {
    log({ level: "warn", code: "EVAL_FAILED", message: `${name}: ${evaluated.message}` });
    return { kind: "eval_failed", message: evaluated.message };
  }

  const checks = await checkManifest(pkg, evaluated.manifest, ctx.index);
  return { kind: "manifest", checks };
}

/**
 * Run every check for one submitted package.
 *
 * Fetch and evaluation failures are recorded on the report; membership and index
 * failures are thrown and abort the run. The scratch checkout is always removed.
 */
export async function buildPackageReport(
  pkg: PackageDescriptor,
  ctx: PackageCheckContext,
): Promise<PackageReport> {
  const log = ctx.log ?? silentLog;
  const { org, name } = pkg.id;
  log({ level: "info", code: "PACKAGE_CHECK", message: `checking ${indexPath(pkg.id)} at ${pkg.id.commit}` });

  const permission = await checkPermission(ctx.membership, ctx.user, org, name);

  const scratch = await fs.mkdtemp(path.join(ctx.scratchRoot ?? os.tmpdir(), "indexguard-pkg-"));
  try {
    const status = await fetchAndCheck(pkg, ctx, scratch, log);
    return { kind: "package", descriptor: pkg, permission, status };
  } finally {
    await fs.rm(scratch, { recursive: true, force: true });
  }
}
