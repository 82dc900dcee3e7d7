import { describe, expect, it } from "vitest";
import { GitSourceFetcher } from "../src/git/source-fetcher.js";
import type { GitFactory } from "../src/git/operations.js";
import type { PackageIdentity } from "../src/types/descriptor.js";
import { COMMIT } from "./helpers.js";

const TEMPLATE = "https://github.com/{org}/{name}.git";

const pkg: PackageIdentity = { forge: "github", org: "acme", name: "widgets", path: "", commit: COMMIT };

function recordingFactory(head: string, calls: string[][]): GitFactory {
  return () => ({
    raw: async (args) => {
      calls.push(args);
      return args[0] === "rev-parse" ? `${head}\n` : "";
    },
  });
}

describe("GitSourceFetcher", () => {
  it("fetches only the pinned commit and checks it out", async () => {
    const calls: string[][] = [];
    const res = await new GitSourceFetcher(TEMPLATE, recordingFactory(COMMIT, calls)).fetch(pkg, "/tmp/scratch");
    expect(res).toEqual({ ok: true });
    expect(calls).toEqual([
      ["init", "--quiet"],
      ["fetch", "--quiet", "--depth=1", "https://github.com/acme/widgets.git", COMMIT],
      ["checkout", "--quiet", "--detach", "FETCH_HEAD"],
      ["rev-parse", "HEAD"],
    ]);
  });

  it("fails when the checkout isn't at the pinned commit", async () => {
    const other = "f".repeat(40);
    const res = await new GitSourceFetcher(TEMPLATE, recordingFactory(other, [])).fetch(pkg, "/tmp/scratch");
    expect(res).toEqual({
      ok: false,
      message: `expected https://github.com/acme/widgets.git at ${COMMIT}, checked out ${other}`,
    });
  });

  it("returns git errors as a failed fetch", async () => {
    const fetcher = new GitSourceFetcher(TEMPLATE, () => ({
      raw: async (args) => {
        if (args[0] === "fetch") throw new Error("fatal: couldn't find remote ref");
        return "";
      },
    }));
    expect(await fetcher.fetch(pkg, "/tmp/scratch")).toEqual({
      ok: false,
      message: "fatal: couldn't find remote ref",
    });
  });
});
