import { Octokit } from "@octokit/rest";
import type { CommentSink, DiffSource, MembershipService } from "../services/types.js";

export type PullRequestRef = {
  owner: string;
  repo: string;
};

export function createOctokit(token?: string): Octokit {
  return new Octokit({ auth: token, userAgent: "indexguard" });
}

/** Octokit errors carry the HTTP status of the failed request. */
export function isNotFound(err: unknown): boolean {
  return typeof err === "object" && err !== null && "status" in err && err.status === 404;
}

/**
 * Public organization membership. Repository collaborator status would need a token
 * with more than the default CI permissions, so it isn't used.
 */
export class GitHubMembershipService implements MembershipService {
  constructor(private readonly octokit: Octokit) {}

  /** 204 means a public member, 404 means not one; anything else is an error. */
  async isPublicMember(user: string, org: string): Promise<boolean> {
    try {
      await this.octokit.rest.orgs.checkPublicMembershipForUser({ org, username: user });
      return true;
    } catch (err) {
      if (isNotFound(err)) return false;
      throw err;
    }
  }
}

/** Reads a pull request's diff and posts the report on it. */
export class GitHubPullRequestService implements DiffSource, CommentSink {
  constructor(
    private readonly octokit: Octokit,
    private readonly ref: PullRequestRef,
  ) {}

  async getPullRequestDiff(pr: number): Promise<string> {
    const res = await this.octokit.rest.pulls.get({
      owner: this.ref.owner,
      repo: this.ref.repo,
      pull_number: pr,
      mediaType: { format: "diff" },
    });
    const data: unknown = res.data;
    if (typeof data !== "string") {
      throw new Error(`Expected a diff for ${this.ref.owner}/${this.ref.repo}#${pr}, got ${typeof data}`);
    }
    return data;
  }

  async postComment(pr: number, body: string): Promise<void> {
    await this.octokit.rest.issues.createComment({
      owner: this.ref.owner,
      repo: this.ref.repo,
      issue_number: pr,
      body,
    });
  }
}
