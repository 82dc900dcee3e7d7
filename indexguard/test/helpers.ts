import fs from "node:fs";
import path from "node:path";
import type { DependencyIdentity, PackageIdentity } from "../src/types/descriptor.js";
import type {
  EvaluatedManifest,
  ManifestEvaluator,
  MembershipService,
  PackageIndex,
  ServiceResult,
  SourceFetcher,
} from "../src/services/types.js";
import { indexPath } from "../src/types/descriptor.js";

export const COMMIT = "0123456789abcdef0123456789abcdef01234567";

type Semver = { major: number; minor: number; patch: number; pre: string };

function semver(v: string): Semver {
  const [core, pre = ""] = v.split("-", 2);
  const [major, minor, patch] = core.split(".").map(Number);
  return { major, minor, patch, pre };
}

export type DescriptorInput = {
  org?: string;
  name?: string;
  path?: string;
  commit?: string;
  version?: string;
  description?: string;
  dependencies?: Record<string, { org: string; name: string; path?: string; version: string }>;
};

/** One index line, as a contributor would add it. */
export function descriptorLine(input: DescriptorInput = {}): string {
  const github: Record<string, string> = {
    org: input.org ?? "acme",
    name: input.name ?? "widgets",
    commit: input.commit ?? COMMIT,
  };
  if (input.path !== undefined) github.path = input.path;

  const dependencies = Object.fromEntries(
    Object.entries(input.dependencies ?? {}).map(([key, d]) => {
      const depId: Record<string, string> = { org: d.org, name: d.name };
      if (d.path !== undefined) depId.path = d.path;
      return [key, { id: { github: depId }, version: d.version }];
    }),
  );

  return JSON.stringify({
    id: { github },
    version: semver(input.version ?? "0.2.0"),
    minimal_nickel_version: semver("1.9.0"),
    dependencies,
    authors: ["Test Author"],
    description: input.description ?? "test package",
    keywords: [],
    license: "MIT",
    v: 0,
  });
}

/** A `git diff` of files added from scratch. */
export function newFileDiff(files: Record<string, string[]>): string {
  return Object.entries(files)
    .map(([file, lines]) =>
      [
        `diff --git a/${file} b/${file}`,
        "new file mode 100644",
        "--- /dev/null",
        `+++ b/${file}`,
        `@@ -0,0 +1,${lines.length} @@`,
        ...lines.map((l) => `+${l}`),
      ].join("\n"),
    )
    .join("\n") + "\n";
}

export class FakeMembership implements MembershipService {
  readonly calls: Array<[string, string]> = [];

  constructor(private readonly members: Record<string, string[]> = {}) {}

  async isPublicMember(user: string, org: string): Promise<boolean> {
    this.calls.push([user, org]);
    return (this.members[org] ?? []).includes(user);
  }
}

export class FakeFetcher implements SourceFetcher {
  readonly destinations: string[] = [];

  constructor(private readonly failures: Record<string, string> = {}) {}

  async fetch(id: PackageIdentity, destination: string): Promise<ServiceResult> {
    this.destinations.push(destination);
    const failure = this.failures[indexPath(id)];
    if (failure !== undefined) return { ok: false, message: failure };
    fs.writeFileSync(path.join(destination, "marker"), id.commit);
    return { ok: true };
  }
}

export class FakeEvaluator implements ManifestEvaluator {
  readonly files: string[] = [];

  constructor(private readonly result: ServiceResult<{ manifest: EvaluatedManifest }>) {}

  async evaluate(manifestFile: string): Promise<ServiceResult<{ manifest: EvaluatedManifest }>> {
    this.files.push(manifestFile);
    return this.result;
  }
}

/** Versions keyed by `org/name[/path]`. */
export class MemoryIndex implements PackageIndex {
  constructor(private readonly versions: Record<string, string[]> = {}) {}

  async availableVersions(id: DependencyIdentity): Promise<string[]> {
    return [...(this.versions[indexPath(id)] ?? [])];
  }
}
