import type { GlyphSet } from "../types/config.js";
import { formatIdentity, indexPath } from "../types/descriptor.js";
import type { DependencyCheck, ManifestCheck, PackageReport, PathReport, Report } from "../types/report.js";
import { formatSemVer } from "../package/version.js";
import { manifestVersionMatches } from "./verdict.js";

type Glyphs = { ok: string; warn: string; fail: string };

export const GLYPHS: Record<GlyphSet, Glyphs> = {
  emoji: { ok: "✅", warn: "⚠️", fail: "❌" },
  ascii: { ok: "[ok]", warn: "[warn]", fail: "[fail]" },
};

const INDENT_STEP = "  ";

function renderPath(item: PathReport, g: Glyphs, lines: string[]): void {
  const sym = item.isGood ? g.warn : g.fail;
  lines.push(` - ${sym} this PR modifies ${item.path}`);
}

function renderDependency(dep: DependencyCheck, g: Glyphs, pad: string, lines: string[]): void {
  const id = formatIdentity(dep.dependency.id);
  const req = dep.dependency.version;
  if (dep.hasMatch) {
    lines.push(`${pad}- ${g.ok} ${id} ${req}`);
  } else if (dep.knownVersions.length === 0) {
    lines.push(`${pad}- ${g.fail} ${id} doesn't exist in the index`);
  } else {
    lines.push(
      `${pad}- ${g.fail} ${id} ${req} doesn't match any versions: known versions are ${dep.knownVersions.join(", ")}`,
    );
  }
}

function renderManifest(checks: ManifestCheck, g: Glyphs, pad: string, lines: string[]): void {
  if (manifestVersionMatches(checks)) {
    lines.push(`${pad}* ${g.ok} manifest version matches`);
  } else {
    lines.push(
      `${pad}* ${g.fail} index version ${checks.packageVersion} doesn't match manifest version ${checks.manifestVersion}`,
    );
  }

  if (checks.dependencies.length === 0) {
    lines.push(`${pad}* ${g.ok} no dependencies to check`);
    return;
  }
  lines.push(`${pad}checking dependencies:`);
  for (const dep of checks.dependencies) {
    renderDependency(dep, g, pad, lines);
  }
}

function renderPackage(item: PackageReport, g: Glyphs, lines: string[]): void {
  const { descriptor, permission, status } = item;
  const pad = " ".repeat(3);
  lines.push(` - package ${indexPath(descriptor.id)}, version ${formatSemVer(descriptor.version)}`);

  if (permission.isAllowed) {
    lines.push(`${pad}* ${g.ok} this PR is by ${permission.user}, a collaborator on ${permission.org}/${permission.repo}`);
  } else {
    lines.push(`${pad}* ${g.fail} this PR is by ${permission.user}, who is not a public member of ${permission.org}`);
  }

  if (status.kind === "fetch_failed") {
    lines.push(`${pad}* ${g.fail} failed to fetch package: ${status.message}`);
    return;
  }
  lines.push(`${pad}* ${g.ok} fetched package`);

  if (status.kind === "eval_failed") {
    lines.push(`${pad}* ${g.fail} failed to evaluate manifest: ${status.message}`);
    return;
  }
  lines.push(`${pad}* ${g.ok} evaluated manifest`);
  renderManifest(status.checks, g, pad + INDENT_STEP, lines);
}

/**
 * Render a report as the text that is both printed and posted on the pull request.
 * Pure: the same report always renders to the same string.
 */
export function renderReport(report: Report, glyphs: GlyphSet = "emoji"): string {
  const g = GLYPHS[glyphs];
  const lines: string[] = [];

  switch (report.kind) {
    case "invalid_diff":
      lines.push(`${g.fail} invalid index changes: ${report.error.message}`);
      break;
    case "items":
      for (const item of report.items) {
        switch (item.kind) {
          case "path":
            renderPath(item, g, lines);
            break;
          case "package":
            renderPackage(item, g, lines);
            break;
        }
      }
      break;
  }

  return lines.map((l) => `${l}\n`).join("");
}
