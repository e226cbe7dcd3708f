/**
 * revlift canonical data models.
 *
 * ChangeRecord and Hunk describe one commit's changes the way the review
 * service expects them. CommitNode is the ancestry primitive shared by range
 * resolution, the hash crosswalk and history rewriting.
 */

// ---------------------------------------------------------------------------
// Change kinds and file types
// ---------------------------------------------------------------------------

export type ChangeKind =
  | "ADD"
  | "CHANGE"
  | "DELETE"
  | "MOVE_AWAY"
  | "COPY_AWAY"
  | "MOVE_HERE"
  | "COPY_HERE"
  | "MULTICOPY";

export type FileType = "TEXT" | "IMAGE" | "BINARY";

/** Wire code for a change kind. Exhaustive: a new kind must be mapped here. */
export function changeKindCode(kind: ChangeKind): number {
  switch (kind) {
    case "ADD":
      return 1;
    case "CHANGE":
      return 2;
    case "DELETE":
      return 3;
    case "MOVE_AWAY":
      return 4;
    case "COPY_AWAY":
      return 5;
    case "MOVE_HERE":
      return 6;
    case "COPY_HERE":
      return 7;
    case "MULTICOPY":
      return 8;
    default:
      return assertNever(kind);
  }
}

export function fileTypeCode(fileType: FileType): number {
  switch (fileType) {
    case "TEXT":
      return 1;
    case "IMAGE":
      return 2;
    case "BINARY":
      return 3;
    default:
      return assertNever(fileType);
  }
}

function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${String(value)}`);
}

// ---------------------------------------------------------------------------
// Per-commit change model
// ---------------------------------------------------------------------------

export interface Hunk {
  old_offset: number;
  old_length: number;
  new_offset: number;
  new_length: number;
  old_eof_newline: boolean;
  new_eof_newline: boolean;
  add_lines: number;
  del_lines: number;
  corpus: string;
}

export type UploadSide = "old" | "new";

export interface UploadDescriptor {
  side: UploadSide;
  body: Buffer;
  mime_type: string;
  /** Assigned by the upload step that runs outside this package. */
  upload_id?: string;
}

export interface ChangeRecord {
  current_path: string;
  old_path?: string;
  away_paths: string[];
  old_mode?: string;
  new_mode?: string;
  kind?: ChangeKind;
  /** Undefined until the bodies have been compared. */
  binary?: boolean;
  file_type?: FileType;
  uploads: UploadDescriptor[];
  hunks: Hunk[];
}

// ---------------------------------------------------------------------------
// Ancestry
// ---------------------------------------------------------------------------

export interface Identity {
  name: string;
  email: string;
  /** Raw git date: `<unix-seconds> <tz-offset>`. */
  date: string;
}

export interface CommitNode {
  readonly sha: string;
  readonly parents: readonly string[];
  readonly tree: string;
  readonly author: Identity;
  readonly committer: Identity;
  readonly message: string;
  /**
   * Hash of the same changeset in the secondary VCS.
   * `undefined` until looked up, `null` when the secondary VCS has no record.
   */
  secondary_hash?: string | null;
}

export interface RangeResolution {
  start: CommitNode;
  head: CommitNode;
  /** Full ref name to move after a rewrite, or null when `head` is not a symbolic ref. */
  ref_name: string | null;
  /** Commits to publish, oldest first. */
  push: CommitNode[];
  /** Commits above the pushed range that get re-parented, oldest first. */
  reparent: CommitNode[];
}

/** Compact commit view used in tool output. */
export interface CommitSummary {
  sha: string;
  parents: string[];
  title: string;
}

export function summarizeCommit(commit: CommitNode): CommitSummary {
  return {
    sha: commit.sha,
    parents: [...commit.parents],
    title: commit.message.split("\n")[0],
  };
}
