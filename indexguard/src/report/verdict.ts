import type {
  DependencyCheck,
  ManifestCheck,
  PackageReport,
  Report,
  ReportItem,
} from "../types/report.js";
import { versionsEqual } from "../package/version.js";

export function isDependencyCheckGood(check: DependencyCheck): boolean {
  return check.hasMatch;
}

export function manifestVersionMatches(check: ManifestCheck): boolean {
  return versionsEqual(check.packageVersion, check.manifestVersion);
}

export function isManifestCheckGood(check: ManifestCheck): boolean {
  return manifestVersionMatches(check) && check.dependencies.every(isDependencyCheckGood);
}

export function isPackageReportGood(report: PackageReport): boolean {
  if (!report.permission.isAllowed) return false;
  switch (report.status.kind) {
    case "fetch_failed":
    case "eval_failed":
      return false;
    case "manifest":
      return isManifestCheckGood(report.status.checks);
  }
}

export function isItemGood(item: ReportItem): boolean {
  switch (item.kind) {
    case "path":
      return item.isGood;
    case "package":
      return isPackageReportGood(item);
  }
}

/** Whether the submission can be accepted without a human looking at it. */
export function isReportGood(report: Report): boolean {
  switch (report.kind) {
    case "invalid_diff":
      return false;
    case "items":
      return report.items.every(isItemGood);
  }
}
