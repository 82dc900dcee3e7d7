import type { IndexDependency, PackageDescriptor } from "./descriptor.js";

/** Fatal problems with the diff itself; any of these turns the report into `invalid_diff`. */
export type IndexChangeErrorCode =
  | "DIFF_SYNTAX"
  | "BAD_PREFIX"
  | "MISSING_ORG"
  | "MISSING_REPO"
  | "DELETION"
  | "INVALID_DESCRIPTOR"
  | "ORG_NAME_MISMATCH"
  | "PATH_TOO_DEEP";

export type IndexChangeError = {
  readonly code: IndexChangeErrorCode;
  readonly message: string;
};

/** Someone submitted a package. Do we think it's theirs? */
export type Permission = {
  readonly user: string;
  readonly org: string;
  readonly repo: string;
  readonly isAllowed: boolean;
};

export type DependencyCheck = {
  readonly dependency: IndexDependency;
  /** Versions of the dependency present in the index, in index order. */
  readonly knownVersions: readonly string[];
  readonly hasMatch: boolean;
};

export type ManifestCheck = {
  readonly packageVersion: string;
  readonly manifestVersion: string;
  readonly dependencies: readonly DependencyCheck[];
};

export type PackageStatus =
  | { readonly kind: "fetch_failed"; readonly message: string }
  | { readonly kind: "eval_failed"; readonly message: string }
  | { readonly kind: "manifest"; readonly checks: ManifestCheck };

export type PackageReport = {
  readonly kind: "package";
  readonly descriptor: PackageDescriptor;
  readonly permission: Permission;
  readonly status: PackageStatus;
};

/** A file outside the index root was touched. Good only for allowed adjacent paths. */
export type PathReport = {
  readonly kind: "path";
  readonly path: string;
  readonly isGood: boolean;
};

export type ReportItem = PathReport | PackageReport;

export type Report =
  | { readonly kind: "invalid_diff"; readonly error: IndexChangeError }
  | { readonly kind: "items"; readonly items: readonly ReportItem[] };
