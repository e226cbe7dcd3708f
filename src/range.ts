/**
 * Range resolution over linear history.
 *
 * Splits the ancestry of a ref into the commits to publish (the push list)
 * and the commits above them that only need re-parenting after a rewrite.
 */

import { UserError } from "./errors.js";
import { createLogger } from "./logger.js";
import type { CommitNode, RangeResolution } from "./models.js";
import type { Session } from "./session.js";

const log = createLogger("range");

export interface RangeEndpoints {
  start: string;
  end: string;
}

/**
 * Interpret a range expression relative to `ref`.
 *
 * `A..B` is taken as written, with an empty `B` meaning `ref`. A single
 * revision `C` means `C^..C`.
 */
export function parseRevspec(revspec: string, ref: string): RangeEndpoints {
  const expression = revspec.trim();
  if (expression.length === 0) {
    throw new UserError("Empty range expression");
  }

  const dots = expression.indexOf("..");
  if (dots === -1) {
    return { start: `${expression}^`, end: expression };
  }

  const start = expression.slice(0, dots);
  const end = expression.slice(dots + 2);
  if (end.startsWith(".")) {
    throw new UserError(`Symmetric ranges are not supported: ${revspec}`);
  }
  if (start.length === 0) {
    throw new UserError(`Range is missing its start: ${revspec}`);
  }

  return { start, end: end.length > 0 ? end : ref };
}

/**
 * Resolve `revspec` against `ref` into push and reparent lists.
 *
 * @throws UserError for unknown revisions, endpoints that are not linear
 *   ancestors of `ref`, or an empty push list
 */
export function resolveRange(session: Session, ref: string, revspec: string): RangeResolution {
  const endpoints = parseRevspec(revspec, ref);

  const head = session.resolve(ref);
  const start = session.resolve(endpoints.start);
  const end = session.resolve(endpoints.end);

  const reparent = walkUntil(session, head, end, ref);
  const push = walkUntil(session, end, start, endpoints.end);

  if (push.length === 0) {
    throw new UserError(`Range ${revspec} is empty: nothing to push`);
  }

  log.info(
    { ref, revspec, push: push.length, reparent: reparent.length },
    "resolved range",
  );

  return {
    start,
    head,
    ref_name: session.backend.symbolicRefName(ref),
    push,
    reparent,
  };
}

/**
 * Follow single-parent links from `from` until `stop`, excluding `stop`.
 * Returns the visited commits oldest first.
 */
function walkUntil(
  session: Session,
  from: CommitNode,
  stop: CommitNode,
  fromLabel: string,
): CommitNode[] {
  const visited: CommitNode[] = [];
  let node = from;

  while (node.sha !== stop.sha) {
    visited.push(node);
    if (node.parents.length !== 1) {
      const reason = node.parents.length === 0 ? "a root commit" : "a merge commit";
      throw new UserError(
        `${stop.sha} is not a linear ancestor of ${fromLabel}: reached ${reason} (${node.sha})`,
      );
    }
    node = session.commit(node.parents[0]);
  }

  return visited.reverse();
}
