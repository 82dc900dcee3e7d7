/** Package descriptors as stored in the index, one JSON object per line. */

export type SemVer = {
  readonly major: number;
  readonly minor: number;
  readonly patch: number;
  /** Pre-release tag without the leading dash; empty for releases. */
  readonly pre: string;
};

/** Commit-pinned location of a package's sources on a forge. */
export type PackageIdentity = {
  readonly forge: "github";
  readonly org: string;
  readonly name: string;
  /** Subdirectory of the repository holding the package; "" for the repository root. */
  readonly path: string;
  readonly commit: string;
};

/** Unpinned identity used by dependency declarations. */
export type DependencyIdentity = Omit<PackageIdentity, "commit">;

export type IndexDependency = {
  readonly id: DependencyIdentity;
  /** Semantic-version range, e.g. "^1.2.0". */
  readonly version: string;
};

export type PackageMetadata = {
  readonly authors: readonly string[];
  readonly description: string;
  readonly keywords: readonly string[];
  readonly license: string;
  readonly formatVersion: number;
};

export type PackageDescriptor = {
  readonly id: PackageIdentity;
  readonly version: SemVer;
  readonly minimalToolVersion: SemVer;
  /** Keyed by the name the package uses for the dependency. */
  readonly dependencies: Readonly<Record<string, IndexDependency>>;
  readonly metadata: PackageMetadata;
};

/** `org/name` or `org/name/path`, relative to the index root. */
export function indexPath(id: DependencyIdentity): string {
  const base = `${id.org}/${id.name}`;
  return id.path === "" ? base : `${base}/${id.path}`;
}

/** Display form of an identity, e.g. `github/acme/widgets`. */
export function formatIdentity(id: DependencyIdentity): string {
  return `${id.forge}/${indexPath(id)}`;
}

export function forgeUrl(id: DependencyIdentity, template: string): string {
  return template.replace("{org}", id.org).replace("{name}", id.name);
}
