/**
 * History rewriting after publication.
 *
 * Re-creates the push list with review links in the messages, re-parents the
 * commits above it, and moves the ref once, at the end, with a
 * compare-and-swap so a concurrent change to the ref makes the update fail.
 */

import { UserError } from "./errors.js";
import { createLogger } from "./logger.js";
import { withRevisionLink } from "./message.js";
import type { CommitNode, RangeResolution } from "./models.js";
import type { Session } from "./session.js";

const log = createLogger("rewrite");

export interface RewrittenCommit {
  old_sha: string;
  new_sha: string;
}

export interface RewriteResult {
  head: string;
  updated: boolean;
  rewritten: RewrittenCommit[];
}

/**
 * @param links revision URL by push-commit hash; commits without an entry
 *   keep their message
 */
export function rewriteHistory(
  session: Session,
  range: RangeResolution,
  links: Readonly<Record<string, string>>,
): RewriteResult {
  const rewritten: RewrittenCommit[] = [];
  let parent = range.start.sha;

  const carry = (commit: CommitNode, message: string): void => {
    if (rewritten.length === 0 && message === commit.message && commit.parents[0] === parent) {
      // Nothing below this commit changed, keep it as is
      parent = commit.sha;
      return;
    }
    const sha = session.backend.commitTree({
      tree: commit.tree,
      parent,
      message,
      author: commit.author,
      committer: commit.committer,
    });
    rewritten.push({ old_sha: commit.sha, new_sha: sha });
    parent = sha;
  };

  for (const commit of range.push) {
    const url = links[commit.sha];
    carry(commit, url === undefined ? commit.message : withRevisionLink(commit.message, url));
  }
  for (const commit of range.reparent) {
    carry(commit, commit.message);
  }

  if (rewritten.length === 0) {
    return { head: range.head.sha, updated: false, rewritten };
  }

  if (range.ref_name === null) {
    throw new UserError(`Cannot move ${range.head.sha}: it is not reachable through a ref`);
  }

  session.backend.updateRef(range.ref_name, parent, range.head.sha, "revlift: embed review links");
  log.info({ ref: range.ref_name, from: range.head.sha, to: parent, rewritten: rewritten.length }, "moved ref");

  return { head: parent, updated: true, rewritten };
}
