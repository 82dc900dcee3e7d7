import type { MembershipService } from "../services/types.js";
import type { Permission } from "../types/report.js";

/**
 * Decide whether `user` may publish a package owned by `org`.
 *
 * Publishing under your own name never needs a lookup. Otherwise the user must be a
 * public member of the organization; repository collaborator status would need more
 * than the default CI token, so it isn't consulted.
 */
export async function checkPermission(
  membership: MembershipService,
  user: string,
  org: string,
  repo: string,
): Promise<Permission> {
  const isAllowed = user === org || (await membership.isPublicMember(user, org));
  return { user, org, repo, isAllowed };
}
