/**
 * Hunk construction for one changed path.
 *
 * Bodies containing a NUL byte or bytes that are not valid UTF-8 are binary
 * and become upload descriptors.
 * Text bodies produce exactly one full-context hunk covering both files, with
 * the corpus in unified-diff form including "\ No newline at end of file"
 * markers.
 */

import { diffArrays } from "diff";
import { lookup } from "mime-types";
import { TextDecoder } from "node:util";
import type { FileType, Hunk, UploadDescriptor } from "./models.js";

export const NO_NEWLINE_MARKER = "\\ No newline at end of file";

const FALLBACK_MIME_TYPE = "application/octet-stream";

export interface HunkInput {
  oldBody: Buffer;
  newBody: Buffer;
  oldPath: string;
  newPath: string;
  /** Both sides are the same blob, so the content is known to be equal. */
  identical: boolean;
}

export interface HunkResult {
  binary: boolean;
  file_type: FileType;
  uploads: UploadDescriptor[];
  hunks: Hunk[];
}

export function buildHunks(input: HunkInput): HunkResult {
  const oldText = decodeText(input.oldBody);
  const newText = decodeText(input.newBody);
  if (oldText === null || newText === null) {
    return buildBinaryResult(input);
  }

  const oldLines = splitLines(oldText);
  const newLines = splitLines(newText);

  const hunk = input.identical
    ? contextOnlyHunk(newLines)
    : (diffHunk(oldLines, newLines) ?? contextOnlyHunk(newLines));

  return { binary: false, file_type: "TEXT", uploads: [], hunks: [hunk] };
}

/**
 * Split text into lines, each keeping its trailing "\n" when it has one.
 */
export function splitLines(text: string): string[] {
  const lines: string[] = [];
  let start = 0;

  while (start < text.length) {
    const end = text.indexOf("\n", start);
    if (end === -1) {
      lines.push(text.slice(start));
      break;
    }
    lines.push(text.slice(start, end + 1));
    start = end + 1;
  }

  return lines;
}

export function guessMimeType(path: string): string {
  return lookup(path) || FALLBACK_MIME_TYPE;
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

const utf8 = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

/**
 * Text of a body, or null when it holds a NUL byte or is not valid UTF-8.
 * Either way the body is uploaded as is rather than diffed.
 */
function decodeText(body: Buffer): string | null {
  if (body.includes(0)) return null;
  try {
    return utf8.decode(body);
  } catch (err) {
    if (err instanceof TypeError) return null;
    throw err;
  }
}

function buildBinaryResult(input: HunkInput): HunkResult {
  const oldMime = guessMimeType(input.oldPath);
  const newMime = guessMimeType(input.newPath);
  const isImage = oldMime.startsWith("image/") || newMime.startsWith("image/");

  return {
    binary: true,
    file_type: isImage ? "IMAGE" : "BINARY",
    uploads: [
      { side: "old", body: input.oldBody, mime_type: oldMime },
      { side: "new", body: input.newBody, mime_type: newMime },
    ],
    hunks: [],
  };
}

/**
 * A hunk in which every line is unchanged.
 */
function contextOnlyHunk(lines: string[]): Hunk {
  const { corpus } = assembleCorpus(lines.map((line) => ` ${line}`));
  return {
    old_offset: 1,
    old_length: lines.length,
    new_offset: 1,
    new_length: lines.length,
    old_eof_newline: true,
    new_eof_newline: true,
    add_lines: 0,
    del_lines: 0,
    corpus,
  };
}

/**
 * Diff with unlimited context, so the single hunk spans both files.
 * Returns null when the line sequences are equal.
 */
function diffHunk(oldLines: string[], newLines: string[]): Hunk | null {
  const parts = diffArrays(oldLines, newLines);
  if (parts.every((part) => !part.added && !part.removed)) return null;

  const diffLines: string[] = [];
  for (const part of parts) {
    const prefix = part.added ? "+" : part.removed ? "-" : " ";
    for (const line of part.value) {
      diffLines.push(prefix + line);
    }
  }

  const assembled = assembleCorpus(diffLines);
  const oldRange = unifiedRange(oldLines.length);
  const newRange = unifiedRange(newLines.length);

  return {
    old_offset: oldRange.offset,
    old_length: oldRange.length,
    new_offset: newRange.offset,
    new_length: newRange.length,
    old_eof_newline: assembled.oldEofNewline,
    new_eof_newline: assembled.newEofNewline,
    add_lines: assembled.addLines,
    del_lines: assembled.delLines,
    corpus: assembled.corpus,
  };
}

/**
 * Range of a whole file in a unified-diff header: an empty side is `0,0`.
 */
function unifiedRange(lineCount: number): { offset: number; length: number } {
  return lineCount === 0 ? { offset: 0, length: 0 } : { offset: 1, length: lineCount };
}

function assembleCorpus(diffLines: string[]): {
  corpus: string;
  oldEofNewline: boolean;
  newEofNewline: boolean;
  addLines: number;
  delLines: number;
} {
  let corpus = "";
  let oldEofNewline = true;
  let newEofNewline = true;
  let addLines = 0;
  let delLines = 0;

  for (const line of diffLines) {
    corpus += line;

    if (!line.endsWith("\n")) {
      corpus += `\n${NO_NEWLINE_MARKER}\n`;
      if (!line.startsWith("+")) oldEofNewline = false;
      if (!line.startsWith("-")) newEofNewline = false;
    }

    if (line.startsWith("+")) addLines++;
    else if (line.startsWith("-")) delLines++;
  }

  return { corpus, oldEofNewline, newEofNewline, addLines, delLines };
}
