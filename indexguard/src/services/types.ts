/**
 * Collaborators of the validation pipeline. Concrete adapters live in github/, git/,
 * index/ and manifest/; tests substitute in-process fakes.
 */
import type { DependencyIdentity, PackageIdentity } from "../types/descriptor.js";

export type ServiceResult<T = Record<never, never>> = ({ ok: true } & T) | { ok: false; message: string };

export type DiffSource = {
  /** Raw unified diff of a pull request. Throws if it can't be read. */
  getPullRequestDiff(pr: number): Promise<string>;
};

export type MembershipService = {
  /** Throws on transport or auth failures. */
  isPublicMember(user: string, org: string): Promise<boolean>;
};

export type SourceFetcher = {
  /** Materialize the package's repository at its pinned commit into `destination`. */
  fetch(id: PackageIdentity, destination: string): Promise<ServiceResult>;
};

export type EvaluatedManifest = {
  /** Normalized semantic version declared by the manifest. */
  version: string;
};

export type ManifestEvaluator = {
  evaluate(manifestFile: string): Promise<ServiceResult<{ manifest: EvaluatedManifest }>>;
};

/** Read-only snapshot of the index, taken once per run. */
export type PackageIndex = {
  /** Known versions of a package, in index order; empty if it isn't in the index. */
  availableVersions(id: DependencyIdentity): Promise<string[]>;
};

export type IndexSource = {
  refresh(): Promise<PackageIndex>;
};

export type CommentSink = {
  postComment(pr: number, body: string): Promise<void>;
};
