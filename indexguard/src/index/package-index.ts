import fs from "node:fs/promises";
import { existsSync, mkdirSync } from "node:fs";
import path from "node:path";
import type { DependencyIdentity } from "../types/descriptor.js";
import { indexPath } from "../types/descriptor.js";
import type { IndexSource, PackageIndex } from "../services/types.js";
import type { SchemaRegistry } from "../schema/registry.js";
import { parseDescriptorLine } from "../package/descriptor.js";
import { formatSemVer } from "../package/version.js";
import { safePath } from "../security/paths.js";
import { GitOperations, defaultGitFactory, type GitFactory } from "../git/operations.js";

/**
 * No file, or a directory. A repository's root package and its subdirectory packages
 * can't both be stored under `<org>/<name>`, since that path would have to be a file and
 * a directory at once; when it is a directory, the root package is reported as absent.
 */
function isAbsent(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && (err.code === "ENOENT" || err.code === "EISDIR");
}

/**
 * A checked-out copy of the index. Each package has one file under
 * `<root>/<org>/<name>[/<path>]` holding one descriptor per line, oldest first.
 */
export class PackageIndexSnapshot implements PackageIndex {
  constructor(
    private readonly checkoutDir: string,
    private readonly indexRoot: string,
    private readonly registry: SchemaRegistry,
  ) {}

  async availableVersions(id: DependencyIdentity): Promise<string[]> {
    const file = safePath(this.checkoutDir, this.indexRoot, ...indexPath(id).split("/"));

    let content: string;
    try {
      content = await fs.readFile(file, "utf8");
    } catch (err) {
      if (isAbsent(err)) return [];
      throw err;
    }

    const versions: string[] = [];
    for (const [i, line] of content.split("\n").entries()) {
      if (line.trim() === "") continue;
      const parsed = parseDescriptorLine(line, this.registry);
      if (!parsed.ok) {
        throw new Error(`Corrupt index entry ${path.relative(this.checkoutDir, file)}:${i + 1}: ${parsed.message}`);
      }
      versions.push(formatSemVer(parsed.descriptor.version));
    }
    return versions;
  }
}

export type GitIndexSourceOptions = {
  repository: string;
  branch: string;
  cacheDir: string;
  indexRoot: string;
  registry: SchemaRegistry;
  gitFactory?: GitFactory;
};

/**
 * Keeps a shallow clone of the index repository up to date.
 * Any git failure is thrown: without the index no dependency can be checked.
 */
export class GitIndexSource implements IndexSource {
  constructor(private readonly opts: GitIndexSourceOptions) {}

  async refresh(): Promise<PackageIndex> {
    const { repository, branch, registry, indexRoot } = this.opts;
    const cacheDir = path.resolve(this.opts.cacheDir);
    const factory = this.opts.gitFactory ?? defaultGitFactory;

    if (existsSync(path.join(cacheDir, ".git"))) {
      const git = new GitOperations(cacheDir, factory);
      await git.fetchShallow(repository, branch);
      await git.resetHard("FETCH_HEAD");
    } else {
      const parent = path.dirname(cacheDir);
      mkdirSync(parent, { recursive: true });
      await new GitOperations(parent, factory).clone(repository, branch, cacheDir);
    }

    return new PackageIndexSnapshot(cacheDir, indexRoot, registry);
  }
}
