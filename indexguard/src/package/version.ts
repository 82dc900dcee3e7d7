import semver from "semver";
import type { SemVer } from "../types/descriptor.js";

export function formatSemVer(v: SemVer): string {
  const core = `${v.major}.${v.minor}.${v.patch}`;
  return v.pre === "" ? core : `${core}-${v.pre}`;
}

/** Normalized form of a version string, or null if it isn't strict semver. */
export function normalizeVersion(version: string): string | null {
  return semver.valid(version);
}

export function isValidRequirement(requirement: string): boolean {
  return semver.validRange(requirement) !== null;
}

/**
 * Exact semantic-version equality. `0.2.0` and `0.2.0-pre` are different versions.
 */
export function versionsEqual(a: string, b: string): boolean {
  return semver.eq(a, b);
}

/** Pre-release versions only satisfy ranges that name the same release tuple. */
export function satisfies(version: string, requirement: string): boolean {
  return semver.satisfies(version, requirement);
}
