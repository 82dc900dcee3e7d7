import type { PackageDescriptor } from "../types/descriptor.js";
import { indexPath } from "../types/descriptor.js";
import type { Patch } from "../types/patch.js";
import type { IndexChangeError, IndexChangeErrorCode } from "../types/report.js";
import type { SchemaRegistry } from "../schema/registry.js";
import type { PathRules } from "../diff/path-classifier.js";
import { parseDescriptorLine } from "./descriptor.js";

export type ExtractResult =
  | { ok: true; packages: PackageDescriptor[] }
  | { ok: false; error: IndexChangeError };

function fail(code: IndexChangeErrorCode, message: string): ExtractResult {
  return { ok: false, error: { code, message } };
}

/**
 * Collect the package descriptors added by in-scope patches, in file-then-line order.
 *
 * The first problem aborts the whole extraction: a partially accepted diff could hide
 * a bad entry among good ones. Only additions are allowed; a removed line means the
 * diff needs a human.
 */
export function extractPackages(
  patches: readonly Patch[],
  rules: Pick<PathRules, "newFilePrefix" | "indexRoot">,
  registry: SchemaRegistry,
): ExtractResult {
  const packages: PackageDescriptor[] = [];
  const expectedStart = `${rules.newFilePrefix}/${rules.indexRoot}`;

  for (const patch of patches) {
    const filePath = patch.newPath;
    const [prefix, root, org, name, ...rest] = filePath.split("/");
    if (prefix !== rules.newFilePrefix || root !== rules.indexRoot) {
      return fail("BAD_PREFIX", `expected new files to start with "${expectedStart}", got "${filePath}"`);
    }
    if (!org) {
      return fail("MISSING_ORG", `missing org, got "${filePath}"`);
    }
    if (!name) {
      return fail("MISSING_REPO", `missing repo, got "${filePath}"`);
    }
    if (rest.length > 1 || rest[0] === "") {
      return fail(
        "PATH_TOO_DEEP",
        `path too deep: expected ${rules.indexRoot}/<org>/<name>[/<path>], got "${filePath}"`,
      );
    }

    const filePackagePath = `${rules.indexRoot}/${[org, name, ...rest].join("/")}`;

    for (const line of patch.hunks.flatMap((h) => h.lines)) {
      switch (line.kind) {
        case "context":
          break;
        case "removed":
          return fail("DELETION", `you can't delete a line: "${line.text}"`);
        case "added": {
          const parsed = parseDescriptorLine(line.text, registry);
          if (!parsed.ok) {
            return fail("INVALID_DESCRIPTOR", `invalid package descriptor: ${parsed.message}`);
          }
          const packagePath = `${rules.indexRoot}/${indexPath(parsed.descriptor.id)}`;
          if (packagePath !== filePackagePath) {
            return fail(
              "ORG_NAME_MISMATCH",
              `org/name mismatch: path was "${filePackagePath}", package was "${packagePath}"`,
            );
          }
          packages.push(parsed.descriptor);
          break;
        }
      }
    }
  }

  return { ok: true, packages };
}
