/**
 * Library entry point.
 */

export * from "./models.js";
export * from "./errors.js";
export { GitBackend, NULL_HASH, type Backend, type CommitTreeArgs } from "./backend.js";
export { Session, IdentityMap, hasRealSecondaryHash } from "./session.js";
export { buildHunks, splitLines, guessMimeType, NO_NEWLINE_MARKER } from "./hunks.js";
export type { HunkInput, HunkResult } from "./hunks.js";
export { buildChangeSet, parseRawChanges, collectChanges, mergeAwayKind } from "./changes.js";
export type { RawChange } from "./changes.js";
export { resolveRange, parseRevspec } from "./range.js";
export {
  ensureSecondaryHashes,
  buildHashMapping,
  readChangesetChunks,
  BUNDLE_MAGIC,
  CHUNK_HEADER_SIZE,
} from "./bundle.js";
export type { ChangesetChunk } from "./bundle.js";
export { toWire, toWireHunk, wirePatchSchema, wireHunkSchema } from "./wire.js";
export type { WirePatch, WireHunk } from "./wire.js";
export { parseCommitMessage, withRevisionLink } from "./message.js";
export type { CommitMessageInfo, Reviewer, RevisionLink } from "./message.js";
export { rewriteHistory } from "./rewrite.js";
export type { RewriteResult, RewrittenCommit } from "./rewrite.js";
export { createServer } from "./server.js";
export type { ServerOptions } from "./server.js";
