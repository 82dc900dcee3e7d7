import { minimatch } from "minimatch";
import type { Patch } from "../types/patch.js";
import type { PathReport } from "../types/report.js";

export type PathRules = {
  newFilePrefix: string;
  indexRoot: string;
  /** minimatch patterns, matched against the path without its prefix. */
  allowedPaths: string[];
};

export type PathClass =
  | { kind: "in_scope" }
  | { kind: "out_of_scope"; report: PathReport };

/**
 * Classify a new-file path from the diff.
 *
 * Modifications to our CI are not necessarily bad, so paths matching an allowed
 * pattern only warn. Any other path outside the index root is a mistake.
 */
export function classifyPath(filePath: string, rules: PathRules): PathClass {
  const parts = filePath.split("/");
  if (parts[0] !== rules.newFilePrefix) {
    return { kind: "out_of_scope", report: { kind: "path", path: filePath, isGood: false } };
  }

  if (parts[1] === rules.indexRoot) {
    return { kind: "in_scope" };
  }

  const withoutPrefix = parts.slice(1).join("/");
  const isGood = rules.allowedPaths.some((pattern) => minimatch(withoutPrefix, pattern, { dot: true }));
  return { kind: "out_of_scope", report: { kind: "path", path: withoutPrefix, isGood } };
}

/**
 * Drop patches that don't touch the index, returning a diagnostic for each one
 * in diff order.
 */
export function checkDiffPaths(
  patches: readonly Patch[],
  rules: PathRules,
): { retained: Patch[]; reports: PathReport[] } {
  const retained: Patch[] = [];
  const reports: PathReport[] = [];

  for (const patch of patches) {
    const cls = classifyPath(patch.newPath, rules);
    if (cls.kind === "in_scope") {
      retained.push(patch);
    } else {
      reports.push(cls.report);
    }
  }

  return { retained, reports };
}
