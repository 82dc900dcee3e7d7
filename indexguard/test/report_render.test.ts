import { describe, expect, it } from "vitest";
import { renderReport } from "../src/report/render.js";
import { isReportGood } from "../src/report/verdict.js";
import type { IndexDependency, PackageDescriptor } from "../src/types/descriptor.js";
import type { PackageReport, PackageStatus, PathReport, Permission, Report } from "../src/types/report.js";
import { COMMIT } from "./helpers.js";

const descriptor: PackageDescriptor = {
  id: { forge: "github", org: "acme", name: "widgets", path: "", commit: COMMIT },
  version: { major: 0, minor: 2, patch: 0, pre: "" },
  minimalToolVersion: { major: 1, minor: 9, patch: 0, pre: "" },
  dependencies: {},
  metadata: { authors: [], description: "", keywords: [], license: "", formatVersion: 0 },
};

const allowed: Permission = { user: "ada", org: "acme", repo: "widgets", isAllowed: true };

function dep(name: string, version: string): IndexDependency {
  return { id: { forge: "github", org: "acme", name, path: "" }, version };
}

function packageItem(status: PackageStatus, permission: Permission = allowed): PackageReport {
  return { kind: "package", descriptor, permission, status };
}

describe("renderReport", () => {
  it("renders a passing package", () => {
    const report: Report = {
      kind: "items",
      items: [
        packageItem({ kind: "manifest", checks: { packageVersion: "0.2.0", manifestVersion: "0.2.0", dependencies: [] } }),
      ],
    };
    expect(renderReport(report)).toBe(
      [
        " - package acme/widgets, version 0.2.0",
        "   * ✅ this PR is by ada, a collaborator on acme/widgets",
        "   * ✅ fetched package",
        "   * ✅ evaluated manifest",
        "     * ✅ manifest version matches",
        "     * ✅ no dependencies to check",
        "",
      ].join("\n"),
    );
    expect(isReportGood(report)).toBe(true);
  });

  it("renders a version mismatch and dependency results", () => {
    const report: Report = {
      kind: "items",
      items: [
        packageItem({
          kind: "manifest",
          checks: {
            packageVersion: "0.2.0",
            manifestVersion: "0.1.0",
            dependencies: [
              { dependency: dep("gears", "^2"), knownVersions: ["1.0.0", "1.1.0"], hasMatch: false },
              { dependency: dep("nowhere", "^1"), knownVersions: [], hasMatch: false },
              { dependency: dep("util", "^1"), knownVersions: ["1.0.0"], hasMatch: true },
            ],
          },
        }),
      ],
    };
    expect(renderReport(report)).toBe(
      [
        " - package acme/widgets, version 0.2.0",
        "   * ✅ this PR is by ada, a collaborator on acme/widgets",
        "   * ✅ fetched package",
        "   * ✅ evaluated manifest",
        "     * ❌ index version 0.2.0 doesn't match manifest version 0.1.0",
        "     checking dependencies:",
        "     - ❌ github/acme/gears ^2 doesn't match any versions: known versions are 1.0.0, 1.1.0",
        "     - ❌ github/acme/nowhere doesn't exist in the index",
        "     - ✅ github/acme/util ^1",
        "",
      ].join("\n"),
    );
    expect(isReportGood(report)).toBe(false);
  });

  it("stops after a fetch failure", () => {
    const report: Report = {
      kind: "items",
      items: [
        packageItem(
          { kind: "fetch_failed", message: "commit not found" },
          { user: "mallory", org: "acme", repo: "widgets", isAllowed: false },
        ),
      ],
    };
    expect(renderReport(report)).toBe(
      [
        " - package acme/widgets, version 0.2.0",
        "   * ❌ this PR is by mallory, who is not a public member of acme",
        "   * ❌ failed to fetch package: commit not found",
        "",
      ].join("\n"),
    );
  });

  it("stops after an evaluation failure", () => {
    const report: Report = { kind: "items", items: [packageItem({ kind: "eval_failed", message: "syntax error" })] };
    expect(renderReport(report)).toBe(
      [
        " - package acme/widgets, version 0.2.0",
        "   * ✅ this PR is by ada, a collaborator on acme/widgets",
        "   * ✅ fetched package",
        "   * ❌ failed to evaluate manifest: syntax error",
        "",
      ].join("\n"),
    );
    expect(isReportGood(report)).toBe(false);
  });

  it("renders path diagnostics", () => {
    const warning: PathReport = { kind: "path", path: ".github/workflows/ci.yml", isGood: true };
    const report: Report = { kind: "items", items: [warning, { kind: "path", path: "README.md", isGood: false }] };
    expect(renderReport(report)).toBe(
      " - ⚠️ this PR modifies .github/workflows/ci.yml\n - ❌ this PR modifies README.md\n",
    );
    expect(isReportGood({ kind: "items", items: [warning] })).toBe(true);
    expect(isReportGood(report)).toBe(false);
  });

  it("renders an invalid diff as a single line", () => {
    const report: Report = {
      kind: "invalid_diff",
      error: { code: "DELETION", message: `you can't delete a line: "x"` },
    };
    expect(renderReport(report)).toBe(`❌ invalid index changes: you can't delete a line: "x"\n`);
    expect(isReportGood(report)).toBe(false);
  });

  it("renders ascii glyphs and is deterministic", () => {
    const report: Report = { kind: "items", items: [{ kind: "path", path: "README.md", isGood: false }] };
    expect(renderReport(report, "ascii")).toBe(" - [fail] this PR modifies README.md\n");
    expect(renderReport(report, "ascii")).toBe(renderReport(report, "ascii"));
  });

  it("renders an empty report as empty text", () => {
    const report: Report = { kind: "items", items: [] };
    expect(renderReport(report)).toBe("");
    expect(isReportGood(report)).toBe(true);
  });
});
