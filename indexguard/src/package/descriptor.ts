import type {
  DependencyIdentity,
  IndexDependency,
  PackageDescriptor,
  SemVer,
} from "../types/descriptor.js";
import type { SchemaRegistry } from "../schema/registry.js";
import { formatSemVer, isValidRequirement, normalizeVersion } from "./version.js";

/** Wire format of one index line. Validated by schemas/package-descriptor.schema.json. */
type SemVerFormat = { major: number; minor: number; patch: number; pre: string };

type GithubIdFormat = { org: string; name: string; path?: string };

type DescriptorFormat = {
  id: { github: GithubIdFormat & { commit: string } };
  version: SemVerFormat;
  minimal_nickel_version: SemVerFormat;
  dependencies: Record<string, { id: { github: GithubIdFormat }; version: string }>;
  authors?: string[];
  description?: string;
  keywords?: string[];
  license?: string;
  v?: number;
};

export type DescriptorParseResult =
  | { ok: true; descriptor: PackageDescriptor }
  | { ok: false; message: string };

function toSemVer(v: SemVerFormat): SemVer {
  return { major: v.major, minor: v.minor, patch: v.patch, pre: v.pre };
}

function toDependencyId(id: GithubIdFormat): DependencyIdentity {
  return { forge: "github", org: id.org, name: id.name, path: id.path ?? "" };
}

function fromFormat(raw: DescriptorFormat): PackageDescriptor {
  const dependencies: Record<string, IndexDependency> = Object.fromEntries(
    Object.entries(raw.dependencies).map(([key, dep]) => [
      key,
      { id: toDependencyId(dep.id.github), version: dep.version },
    ]),
  );

  return {
    id: { ...toDependencyId(raw.id.github), commit: raw.id.github.commit },
    version: toSemVer(raw.version),
    minimalToolVersion: toSemVer(raw.minimal_nickel_version),
    dependencies,
    metadata: {
      authors: raw.authors ?? [],
      description: raw.description ?? "",
      keywords: raw.keywords ?? [],
      license: raw.license ?? "",
      formatVersion: raw.v ?? 0,
    },
  };
}

/**
 * Deserialize one line of an index file into a package descriptor.
 *
 * The JSON shape is checked against the descriptor schema; versions and dependency
 * requirements must additionally parse as semantic versions and ranges.
 */
export function parseDescriptorLine(line: string, registry: SchemaRegistry): DescriptorParseResult {
  let json: unknown;
  try {
    json = JSON.parse(line);
  } catch (e) {
    return { ok: false, message: e instanceof Error ? e.message : String(e) };
  }

  const checked = registry.check<DescriptorFormat>("package-descriptor", json);
  if (!checked.valid) {
    return { ok: false, message: checked.errors };
  }

  const raw = checked.value;
  for (const field of ["version", "minimal_nickel_version"] as const) {
    const formatted = formatSemVer(raw[field]);
    if (normalizeVersion(formatted) === null) {
      return { ok: false, message: `${field} ${formatted} is not a valid semantic version` };
    }
  }
  for (const [key, dep] of Object.entries(raw.dependencies)) {
    if (!isValidRequirement(dep.version)) {
      return { ok: false, message: `dependency ${key} has an invalid version requirement "${dep.version}"` };
    }
  }

  return { ok: true, descriptor: fromFormat(raw) };
}
