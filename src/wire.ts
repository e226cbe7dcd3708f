/**
 * Review-service patch payload.
 *
 * `toWire` is a direct projection of a ChangeRecord. Upload ids and the
 * commit's secondary hash must be filled in before it is called.
 */

import { z } from "zod";
import { changeKindCode, fileTypeCode } from "./models.js";
import type { ChangeRecord, CommitNode, Hunk } from "./models.js";

export const wireHunkSchema = z.object({
  oldOffset: z.number().int(),
  oldLength: z.number().int(),
  newOffset: z.number().int(),
  newLength: z.number().int(),
  addLines: z.number().int(),
  delLines: z.number().int(),
  isMissingOldNewline: z.boolean(),
  isMissingNewNewline: z.boolean(),
  corpus: z.string(),
});

const propertiesSchema = z.object({
  "unix:filemode": z.string().optional(),
});

export const wirePatchSchema = z.object({
  metadata: z.record(z.string(), z.union([z.string(), z.number()])),
  oldPath: z.string().nullable(),
  currentPath: z.string(),
  awayPaths: z.array(z.string()),
  oldProperties: propertiesSchema,
  newProperties: propertiesSchema,
  commitHash: z.string(),
  type: z.number().int(),
  fileType: z.number().int(),
  hunks: z.array(wireHunkSchema),
});

export type WireHunk = z.infer<typeof wireHunkSchema>;
export type WirePatch = z.infer<typeof wirePatchSchema>;

/**
 * Translate one change into the review-service schema.
 *
 * @throws Error when the change has no kind, an upload has no id, or the
 *   commit has no secondary hash; all three mean the caller skipped a step
 */
export function toWire(change: ChangeRecord, commit: CommitNode): WirePatch {
  if (change.kind === undefined) {
    throw new Error(`Change for ${change.current_path} has no kind`);
  }
  if (!commit.secondary_hash) {
    throw new Error(`Commit ${commit.sha} has no secondary hash; resolve it before translating`);
  }

  const metadata: Record<string, string | number> = {};
  for (const upload of change.uploads) {
    if (upload.upload_id === undefined) {
      throw new Error(`Upload of ${upload.side} ${change.current_path} has no id`);
    }
    metadata[`${upload.side}:binary-id`] = upload.upload_id;
    metadata[`${upload.side}:file:size`] = upload.body.length;
    metadata[`${upload.side}:file:mime-type`] = upload.mime_type;
  }

  return {
    metadata,
    oldPath: change.old_path ?? null,
    currentPath: change.current_path,
    awayPaths: [...change.away_paths],
    oldProperties: fileModeProperties(change.old_mode),
    newProperties: fileModeProperties(change.new_mode),
    commitHash: commit.secondary_hash,
    type: changeKindCode(change.kind),
    fileType: fileTypeCode(change.file_type ?? "TEXT"),
    hunks: change.hunks.map(toWireHunk),
  };
}

export function toWireHunk(hunk: Hunk): WireHunk {
  return {
    oldOffset: hunk.old_offset,
    oldLength: hunk.old_length,
    newOffset: hunk.new_offset,
    newLength: hunk.new_length,
    addLines: hunk.add_lines,
    delLines: hunk.del_lines,
    isMissingOldNewline: !hunk.old_eof_newline,
    isMissingNewNewline: !hunk.new_eof_newline,
    corpus: hunk.corpus,
  };
}

function fileModeProperties(mode: string | undefined): { "unix:filemode"?: string } {
  return mode === undefined ? {} : { "unix:filemode": mode };
}
