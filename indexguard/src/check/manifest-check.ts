import type { PackageDescriptor } from "../types/descriptor.js";
import type { DependencyCheck, ManifestCheck } from "../types/report.js";
import type { EvaluatedManifest, PackageIndex } from "../services/types.js";
import { formatSemVer, satisfies } from "../package/version.js";

/**
 * Cross-check an index entry against the manifest fetched from its source.
 *
 * Dependencies are the ones declared by the index entry, checked in name order.
 * Index failures propagate: they mean the checker is broken, not the package.
 */
export async function checkManifest(
  pkg: PackageDescriptor,
  manifest: EvaluatedManifest,
  index: PackageIndex,
): Promise<ManifestCheck> {
  const dependencies: DependencyCheck[] = [];
  const names = Object.keys(pkg.dependencies).sort();

  for (const name of names) {
    const dependency = pkg.dependencies[name];
    const knownVersions = await index.availableVersions(dependency.id);
    dependencies.push({
      dependency,
      knownVersions,
      hasMatch: knownVersions.some((v) => satisfies(v, dependency.version)),
    });
  }

  return {
    packageVersion: formatSemVer(pkg.version),
    manifestVersion: manifest.version,
    dependencies,
  };
}
