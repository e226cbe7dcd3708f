/**
 * Secondary-hash crosswalk through an uncompressed v1 (HG10UN) bundle.
 *
 * Commits that the secondary VCS has not seen yet get their hashes from the
 * changeset group of a bundle exported for the range. Each changeset chunk
 * links a parent hash to its child, and the push list is walked oldest first
 * to translate parent hashes into child hashes.
 *
 * Chunk layout after the 6-byte magic:
 *
 *   [0, 4)    length, big-endian, counting these 4 bytes
 *   [4, 24)   node
 *   [24, 44)  parent1
 *   [44, 64)  parent2 (must be null)
 *   [64, 84)  changeset (must equal node)
 *   [84, length) delta payload, skipped
 *
 * A length of 84 or less ends the group. A chunk with an empty payload is
 * therefore indistinguishable from the terminator and ends the group too.
 */

import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { NULL_HASH } from "./backend.js";
import { BundleIntegrityError, UserError } from "./errors.js";
import { createLogger } from "./logger.js";
import type { CommitNode } from "./models.js";
import { hasRealSecondaryHash, type Session } from "./session.js";

const log = createLogger("bundle");

export const BUNDLE_MAGIC = "HG10UN";
export const CHUNK_HEADER_SIZE = 84;
const HASH_SIZE = 20;

export interface ChangesetChunk {
  node: string;
  parent1: string;
  parent2: string;
  changeset: string;
}

/**
 * Read the changeset chunks of a bundle, stopping at the first terminator.
 *
 * @throws UserError on a bad magic header or a truncated stream
 */
export function readChangesetChunks(bundle: Buffer): ChangesetChunk[] {
  if (bundle.length < BUNDLE_MAGIC.length ||
      bundle.toString("latin1", 0, BUNDLE_MAGIC.length) !== BUNDLE_MAGIC) {
    throw new UserError(`Bundle does not start with ${BUNDLE_MAGIC}`);
  }

  const chunks: ChangesetChunk[] = [];
  let offset = BUNDLE_MAGIC.length;

  for (;;) {
    if (offset + 4 > bundle.length) {
      throw new UserError(`Bundle is truncated at byte ${offset}: missing chunk length`);
    }
    const length = bundle.readUInt32BE(offset);
    if (length <= CHUNK_HEADER_SIZE) break;

    if (offset + length > bundle.length) {
      throw new UserError(
        `Bundle is truncated at byte ${offset}: chunk of ${length} bytes exceeds the stream`,
      );
    }

    const hashAt = (index: number): string => {
      const start = offset + 4 + index * HASH_SIZE;
      return bundle.toString("hex", start, start + HASH_SIZE);
    };

    chunks.push({
      node: hashAt(0),
      parent1: hashAt(1),
      parent2: hashAt(2),
      changeset: hashAt(3),
    });

    offset += length;
  }

  return chunks;
}

/**
 * Parent → child table from a bundle's changeset chunks.
 *
 * @throws BundleIntegrityError when a chunk has a second parent or its
 *   changeset differs from its node
 */
export function buildHashMapping(bundle: Buffer): Map<string, string> {
  const mapping = new Map<string, string>();

  for (const chunk of readChangesetChunks(bundle)) {
    if (chunk.parent2 !== NULL_HASH) {
      throw new BundleIntegrityError(chunk.node, `unexpected second parent ${chunk.parent2}`);
    }
    if (chunk.changeset !== chunk.node) {
      throw new BundleIntegrityError(chunk.node, `changeset ${chunk.changeset} does not match node`);
    }
    mapping.set(chunk.parent1, chunk.node);
  }

  return mapping;
}

/**
 * Give every commit in `push` (oldest first) its secondary-VCS hash.
 *
 * Walks back from the first commit to the nearest ancestor with a real
 * secondary hash, exports a bundle from there to the last commit and
 * propagates hashes forward. Mutates the commit nodes in place.
 *
 * @throws UserError when no ancestor has a secondary hash or the bundle does
 *   not cover every commit
 */
export function ensureSecondaryHashes(session: Session, push: CommitNode[]): void {
  if (push.length === 0) return;

  push.forEach((commit) => session.secondaryHash(commit));
  if (push.every(hasRealSecondaryHash)) return;

  const { anchor, unresolved } = findAnchor(session, push[0]);
  const commits = [...unresolved, ...push];
  const tip = push[push.length - 1];

  log.info(
    { anchor: anchor.sha, tip: tip.sha, commits: commits.length },
    "exporting bundle for secondary hashes",
  );

  const mapping = buildHashMapping(exportBundle(session, anchor.sha, tip.sha));

  for (const commit of commits) {
    const parent = session.commit(commit.parents[0]);
    const parentHash = parent.secondary_hash;
    const child = parentHash ? mapping.get(parentHash) : undefined;
    if (child === undefined) {
      throw new UserError(
        `Bundle has no changeset for ${commit.sha} (parent ${parentHash ?? "unresolved"})`,
      );
    }
    commit.secondary_hash = child;
  }
}

/**
 * Walk ancestry from `first`'s parent to the nearest commit with a real
 * secondary hash, collecting the commits in between oldest first.
 */
function findAnchor(
  session: Session,
  first: CommitNode,
): { anchor: CommitNode; unresolved: CommitNode[] } {
  const unresolved: CommitNode[] = [];
  let node = first;

  for (;;) {
    if (node.parents.length !== 1) {
      throw new UserError(
        `No ancestor of ${first.sha} has a known secondary hash`,
      );
    }
    const parent = session.commit(node.parents[0]);
    session.secondaryHash(parent);
    if (hasRealSecondaryHash(parent)) {
      return { anchor: parent, unresolved };
    }
    unresolved.unshift(parent);
    node = parent;
  }
}

function exportBundle(session: Session, base: string, tip: string): Buffer {
  const scratch = mkdtempSync(join(tmpdir(), "revlift-bundle-"));
  try {
    const destination = join(scratch, "bundle.hg");
    session.backend.exportBundle(base, tip, destination);
    return readFileSync(destination);
  } finally {
    rmSync(scratch, { recursive: true, force: true });
  }
}
