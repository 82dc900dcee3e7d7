import type { PackageIdentity } from "../types/descriptor.js";
import { forgeUrl } from "../types/descriptor.js";
import type { ServiceResult, SourceFetcher } from "../services/types.js";
import { GitOperations, defaultGitFactory, type GitFactory } from "./operations.js";

/**
 * Fetches a package's repository at exactly its pinned commit.
 *
 * Only the one commit is fetched, so a descriptor naming a commit the forge doesn't
 * have fails here rather than later.
 */
export class GitSourceFetcher implements SourceFetcher {
  constructor(
    private readonly urlTemplate: string,
    private readonly gitFactory: GitFactory = defaultGitFactory,
  ) {}

  async fetch(id: PackageIdentity, destination: string): Promise<ServiceResult> {
    const url = forgeUrl(id, this.urlTemplate);
    const git = new GitOperations(destination, this.gitFactory);
    try {
      await git.init();
      await git.fetchShallow(url, id.commit);
      await git.checkoutDetached("FETCH_HEAD");
      const head = await git.getCurrentSha();
      if (head !== id.commit) {
        return { ok: false, message: `expected ${url} at ${id.commit}, checked out ${head}` };
      }
      return { ok: true };
    } catch (e) {
      return { ok: false, message: e instanceof Error ? e.message : String(e) };
    }
  }
}
