import { simpleGit } from "simple-git";

/** The slice of simple-git the fetchers use; tests pass a recording fake. */
export type GitRunner = {
  raw(args: string[]): Promise<string>;
};

export type GitFactory = (baseDir: string) => GitRunner;

export const defaultGitFactory: GitFactory = (baseDir) => simpleGit(baseDir);

/**
 * Git operations wrapper for one working directory.
 */
export class GitOperations {
  private git: GitRunner;

  constructor(repoPath: string, factory: GitFactory = defaultGitFactory) {
    this.git = factory(repoPath);
  }

  async init(): Promise<void> {
    await this.git.raw(["init", "--quiet"]);
  }

  /** Shallow-fetch a single ref or commit from `url` into FETCH_HEAD. */
  async fetchShallow(url: string, ref: string): Promise<void> {
    await this.git.raw(["fetch", "--quiet", "--depth=1", url, ref]);
  }

  async checkoutDetached(ref: string): Promise<void> {
    await this.git.raw(["checkout", "--quiet", "--detach", ref]);
  }

  async resetHard(ref: string): Promise<void> {
    await this.git.raw(["reset", "--quiet", "--hard", ref]);
  }

  async clone(url: string, branch: string, dest: string): Promise<void> {
    await this.git.raw(["clone", "--quiet", "--depth=1", "--branch", branch, url, dest]);
  }

  /** Get HEAD SHA. */
  async getCurrentSha(): Promise<string> {
    const result = await this.git.raw(["rev-parse", "HEAD"]);
    return result.trim();
  }
}
