/**
 * Per-commit change set construction.
 *
 * Parses the NUL-delimited `git diff-tree --raw -z` listing of one commit,
 * resolves add/delete/modify/rename/copy records into one ChangeRecord per
 * path and computes hunks for every path whose content needs describing.
 */

import type { Backend } from "./backend.js";
import { NULL_HASH } from "./backend.js";
import { UserError } from "./errors.js";
import { buildHunks } from "./hunks.js";
import { createLogger } from "./logger.js";
import type { ChangeKind, ChangeRecord, CommitNode } from "./models.js";
import type { Session } from "./session.js";

const log = createLogger("changes");

export interface RawChange {
  old_mode: string;
  new_mode: string;
  old_blob: string;
  new_blob: string;
  /** Status letter: A, D, M, R, C, … */
  status: string;
  /** Similarity score for renames and copies. */
  score?: number;
  /** Current path for A/D/M; the source for R/C. */
  path: string;
  /** Destination path for R/C. */
  destination?: string;
}

const GITLINK_MODE = "160000";

const RAW_HEADER = /^:(\d{6}) (\d{6}) ([0-9a-f]+) ([0-9a-f]+) ([A-Z])(\d*)$/;

/**
 * Build the change set of `commit` against its first parent.
 *
 * @returns ChangeRecords keyed by path, in raw-listing order
 */
export function buildChangeSet(session: Session, commit: CommitNode): Map<string, ChangeRecord> {
  if (commit.parents.length > 1) {
    throw new UserError(`Commit ${commit.sha} is a merge; only linear history is supported`);
  }

  const records = parseRawChanges(session.backend.diffTree(commit));
  const changes = collectChanges(records, session.backend);
  log.debug({ commit: commit.sha, paths: changes.size }, "built change set");
  return changes;
}

/**
 * Split raw diff-tree output into records. Each record is a `:`-prefixed
 * header followed by one path, or two for renames and copies.
 */
export function parseRawChanges(raw: string): RawChange[] {
  const tokens = raw.split("\0");
  const records: RawChange[] = [];

  let i = 0;
  while (i < tokens.length) {
    const header = tokens[i].replace(/^\n+/, "");
    i++;
    if (header.length === 0) continue;

    const match = header.match(RAW_HEADER);
    if (!match) {
      throw new UserError(`Malformed raw change record: ${header}`);
    }

    const [, oldMode, newMode, oldBlob, newBlob, status, score] = match;
    const pathCount = status === "R" || status === "C" ? 2 : 1;
    const paths = tokens.slice(i, i + pathCount);
    i += pathCount;

    if (paths.length < pathCount || paths.some((p) => p.length === 0)) {
      throw new UserError(`Raw change record is missing its path: ${header}`);
    }

    records.push({
      old_mode: oldMode,
      new_mode: newMode,
      old_blob: oldBlob,
      new_blob: newBlob,
      status,
      score: score ? parseInt(score, 10) : undefined,
      path: paths[0],
      destination: pathCount === 2 ? paths[1] : undefined,
    });
  }

  return records;
}

/**
 * Fold raw records into ChangeRecords, reading blob bodies through `blobs`.
 *
 * Rename and copy sources share the record keyed by their own path; their
 * kind is merged in record order (see `mergeAwayKind`).
 */
export function collectChanges(
  records: RawChange[],
  blobs: Pick<Backend, "readBlob">,
): Map<string, ChangeRecord> {
  const changes = new Map<string, ChangeRecord>();

  const getChange = (path: string): ChangeRecord => {
    let change = changes.get(path);
    if (!change) {
      change = { current_path: path, away_paths: [], uploads: [], hunks: [] };
      changes.set(path, change);
    }
    return change;
  };

  for (const record of records) {
    let change: ChangeRecord;

    switch (record.status) {
      case "A":
        change = getChange(record.path);
        change.kind = "ADD";
        change.new_mode = record.new_mode;
        break;

      case "D":
        change = getChange(record.path);
        change.kind = "DELETE";
        change.old_mode = record.old_mode;
        change.old_path = record.path;
        break;

      case "M":
        change = getChange(record.path);
        if (change.old_path !== undefined && change.old_path !== change.current_path) {
          throw new Error(`Modified path ${change.current_path} has old path ${change.old_path}`);
        }
        change.kind = "CHANGE";
        change.old_path = record.path;
        if (record.old_mode !== record.new_mode) {
          change.old_mode = record.old_mode;
          change.new_mode = record.new_mode;
        }
        break;

      case "R":
      case "C": {
        const destination = record.destination ?? record.path;
        change = getChange(destination);
        change.kind = record.status === "R" ? "MOVE_HERE" : "COPY_HERE";
        change.old_path = record.path;
        change.old_mode = record.old_mode;
        change.new_mode = record.new_mode;

        const source = getChange(record.path);
        source.old_path = record.path;
        source.old_mode ??= record.old_mode;
        source.kind = mergeAwayKind(source.kind, record.status === "R" ? "MOVE_AWAY" : "COPY_AWAY");
        source.away_paths.push(destination);
        break;
      }

      default:
        throw new UserError(
          `Unsupported change status '${record.status}' for ${record.path}`,
        );
    }

    if (record.old_blob !== record.new_blob || change.binary === undefined) {
      const result = buildHunks({
        oldBody: readBody(blobs, record.old_blob, record.old_mode),
        newBody: readBody(blobs, record.new_blob, record.new_mode),
        oldPath: change.old_path ?? change.current_path,
        newPath: change.current_path,
        identical: record.old_blob === record.new_blob,
      });
      change.binary = result.binary;
      change.file_type = result.file_type;
      change.uploads = result.uploads;
      change.hunks = result.hunks;
    }
  }

  return changes;
}

/**
 * Combine a source's existing kind with a new away-kind. A source that is
 * not moved or copied yet takes the new kind; one that already is, by either
 * kind, becomes MULTICOPY.
 */
export function mergeAwayKind(
  current: ChangeKind | undefined,
  away: "MOVE_AWAY" | "COPY_AWAY",
): ChangeKind {
  switch (current) {
    case "MOVE_AWAY":
    case "COPY_AWAY":
    case "MULTICOPY":
      return "MULTICOPY";
    default:
      return away;
  }
}

/**
 * Content of one side. A gitlink (submodule pointer) names a commit, not a
 * blob, and is described by the same line git diff prints for it.
 */
function readBody(blobs: Pick<Backend, "readBlob">, blobId: string, mode: string): Buffer {
  if (blobId === NULL_HASH) return Buffer.alloc(0);
  if (mode === GITLINK_MODE) return Buffer.from(`Subproject commit ${blobId}\n`);
  return blobs.readBlob(blobId);
}
