import fs from "node:fs/promises";
import type { DiffSource } from "../services/types.js";

/** A diff saved to disk, e.g. by `gh pr diff`, for checking without GitHub access. */
export class FileDiffSource implements DiffSource {
  constructor(private readonly filePath: string) {}

  async getPullRequestDiff(): Promise<string> {
    return fs.readFile(this.filePath, "utf8");
  }
}
