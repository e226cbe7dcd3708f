/**
 * revlift MCP server factory.
 *
 * Creates and configures the McpServer with all tool registrations.
 * Separated from index.ts to enable in-process testing without spawning
 * a child process: tests import createServer() directly.
 *
 * All tools share one Session, so commits read by one call (and secondary
 * hashes resolved by `ensure_secondary_hashes`) are reused by the next.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { GitBackend, type Backend } from "./backend.js";
import { ensureSecondaryHashes } from "./bundle.js";
import { buildChangeSet } from "./changes.js";
import { parseCommitMessage } from "./message.js";
import { summarizeCommit, type ChangeRecord } from "./models.js";
import { resolveRange } from "./range.js";
import { rewriteHistory } from "./rewrite.js";
import { Session } from "./session.js";
import { toWire, wirePatchSchema } from "./wire.js";

// ---------------------------------------------------------------------------
// Shared schemas
// ---------------------------------------------------------------------------

const commitSummarySchema = z.object({
  sha: z.string(),
  parents: z.array(z.string()),
  title: z.string(),
});

const hunkSchema = z.object({
  old_offset: z.number(),
  old_length: z.number(),
  new_offset: z.number(),
  new_length: z.number(),
  old_eof_newline: z.boolean(),
  new_eof_newline: z.boolean(),
  add_lines: z.number(),
  del_lines: z.number(),
  corpus: z.string(),
});

const changeSchema = z.object({
  current_path: z.string(),
  old_path: z.string().optional(),
  away_paths: z.array(z.string()),
  old_mode: z.string().optional(),
  new_mode: z.string().optional(),
  kind: z.string().optional(),
  binary: z.boolean().optional(),
  file_type: z.string().optional(),
  uploads: z.array(
    z.object({
      side: z.enum(["old", "new"]),
      size: z.number(),
      mime_type: z.string(),
    })
  ),
  hunks: z.array(hunkSchema),
});

const rangeInputSchema = {
  ref: z
    .string()
    .optional()
    .describe("Ref whose history is published (default HEAD)"),
  revspec: z
    .string()
    .describe("Commits to publish: `A..B` (B defaults to ref) or a single commit"),
};

function describeChange(change: ChangeRecord) {
  return {
    current_path: change.current_path,
    old_path: change.old_path,
    away_paths: [...change.away_paths],
    old_mode: change.old_mode,
    new_mode: change.new_mode,
    kind: change.kind,
    binary: change.binary,
    file_type: change.file_type,
    uploads: change.uploads.map((u) => ({
      side: u.side,
      size: u.body.length,
      mime_type: u.mime_type,
    })),
    hunks: change.hunks.map((h) => ({ ...h })),
  };
}

function errorResult(error: unknown) {
  const message = error instanceof Error ? error.message : String(error);
  return {
    content: [{ type: "text" as const, text: message }],
    isError: true,
  };
}

function jsonResult<T extends Record<string, unknown>>(result: T) {
  return {
    content: [{ type: "text" as const, text: JSON.stringify(result, null, 2) }],
    structuredContent: result,
  };
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export interface ServerOptions {
  /** Backend to query; defaults to git in the current working directory. */
  backend?: Backend;
}

/**
 * Create a fully-configured revlift MCP server.
 *
 * The returned server is ready to be connected to any MCP transport
 * (stdio, in-memory, etc.).
 */
export function createServer(options: ServerOptions = {}): McpServer {
  const session = new Session(options.backend ?? new GitBackend(process.cwd()));

  const server = new McpServer({
    name: "revlift",
    version: "0.1.0",
  });

  // -------------------------------------------------------------------------
  // Tool: resolve_range
  // -------------------------------------------------------------------------

  server.registerTool(
    "resolve_range",
    {
      description:
        "Split the linear history of a ref into the commits to publish (oldest first) and the commits above them that a rewrite would re-parent.",
      inputSchema: z.object(rangeInputSchema),
      outputSchema: z.object({
        start: z.string(),
        head: z.string(),
        ref_name: z.string().nullable(),
        push: z.array(commitSummarySchema),
        reparent: z.array(commitSummarySchema),
      }),
    },
    async ({ ref, revspec }, _extra) => {
      try {
        const range = resolveRange(session, ref ?? "HEAD", revspec);
        return jsonResult({
          start: range.start.sha,
          head: range.head.sha,
          ref_name: range.ref_name,
          push: range.push.map(summarizeCommit),
          reparent: range.reparent.map(summarizeCommit),
        });
      } catch (error) {
        return errorResult(error);
      }
    }
  );

  // -------------------------------------------------------------------------
  // Tool: build_change_set
  // -------------------------------------------------------------------------

  server.registerTool(
    "build_change_set",
    {
      description:
        "Describe every path a commit changes: kind (add, change, delete, move, copy, multicopy), modes, binary uploads and one full-context hunk per text file.",
      inputSchema: z.object({
        commit: z.string().describe("Commit SHA or ref"),
      }),
      outputSchema: z.object({
        commit: z.string(),
        changes: z.array(changeSchema),
      }),
    },
    async ({ commit }, _extra) => {
      try {
        const node = session.resolve(commit);
        const changes = buildChangeSet(session, node);
        return jsonResult({
          commit: node.sha,
          changes: [...changes.values()].map(describeChange),
        });
      } catch (error) {
        return errorResult(error);
      }
    }
  );

  // -------------------------------------------------------------------------
  // Tool: ensure_secondary_hashes
  // -------------------------------------------------------------------------

  server.registerTool(
    "ensure_secondary_hashes",
    {
      description:
        "Resolve the Mercurial changeset hash of every commit in a range, exporting a bundle from the nearest known ancestor when needed.",
      inputSchema: z.object(rangeInputSchema),
      outputSchema: z.object({
        commits: z.array(
          z.object({
            sha: z.string(),
            secondary_hash: z.string().nullable(),
          })
        ),
      }),
    },
    async ({ ref, revspec }, _extra) => {
      try {
        const range = resolveRange(session, ref ?? "HEAD", revspec);
        ensureSecondaryHashes(session, range.push);
        return jsonResult({
          commits: range.push.map((c) => ({
            sha: c.sha,
            secondary_hash: c.secondary_hash ?? null,
          })),
        });
      } catch (error) {
        return errorResult(error);
      }
    }
  );

  // -------------------------------------------------------------------------
  // Tool: to_wire
  // -------------------------------------------------------------------------

  server.registerTool(
    "to_wire",
    {
      description:
        "Translate a commit's changes into review-service patch payloads. Binary uploads must already have ids; the commit's secondary hash must be resolved.",
      inputSchema: z.object({
        commit: z.string().describe("Commit SHA or ref"),
        upload_ids: z
          .record(z.string(), z.string())
          .optional()
          .describe("Upload ids keyed by `<path>:<side>`, side being old or new"),
      }),
      outputSchema: z.object({
        commit: z.string(),
        patches: z.array(wirePatchSchema),
      }),
    },
    async ({ commit, upload_ids }, _extra) => {
      try {
        const node = session.resolve(commit);
        session.secondaryHash(node);
        const changes = buildChangeSet(session, node);
        const patches = [...changes.values()].map((change) => {
          for (const upload of change.uploads) {
            upload.upload_id = upload_ids?.[`${change.current_path}:${upload.side}`];
          }
          return toWire(change, node);
        });
        return jsonResult({ commit: node.sha, patches });
      } catch (error) {
        return errorResult(error);
      }
    }
  );

  // -------------------------------------------------------------------------
  // Tool: parse_message
  // -------------------------------------------------------------------------

  server.registerTool(
    "parse_message",
    {
      description:
        "Extract review metadata from a commit message: title, summary, bug number, reviewers, Depends-on revisions and the Differential Revision link.",
      inputSchema: z.object({
        commit: z.string().describe("Commit SHA or ref"),
      }),
      outputSchema: z.object({
        sha: z.string(),
        title: z.string(),
        summary: z.string(),
        bug: z.string().nullable(),
        reviewers: z.array(
          z.object({
            tag: z.string(),
            is_group: z.boolean(),
            blocking: z.boolean(),
          })
        ),
        depends_on: z.array(z.number()),
        revision: z
          .object({
            url: z.string(),
            id: z.number(),
          })
          .nullable(),
      }),
    },
    async ({ commit }, _extra) => {
      try {
        const node = session.resolve(commit);
        return jsonResult({ sha: node.sha, ...parseCommitMessage(node.message) });
      } catch (error) {
        return errorResult(error);
      }
    }
  );

  // -------------------------------------------------------------------------
  // Tool: rewrite_history
  // -------------------------------------------------------------------------

  server.registerTool(
    "rewrite_history",
    {
      description:
        "Embed review links into the messages of the published commits, re-parent the commits above them and move the ref with a single compare-and-swap.",
      inputSchema: z.object({
        ...rangeInputSchema,
        links: z
          .record(z.string(), z.string())
          .describe("Revision URL keyed by commit SHA"),
      }),
      outputSchema: z.object({
        head: z.string(),
        updated: z.boolean(),
        rewritten: z.array(
          z.object({
            old_sha: z.string(),
            new_sha: z.string(),
          })
        ),
      }),
    },
    async ({ ref, revspec, links }, _extra) => {
      try {
        const range = resolveRange(session, ref ?? "HEAD", revspec);
        const result = rewriteHistory(session, range, links);
        return jsonResult({ ...result });
      } catch (error) {
        return errorResult(error);
      }
    }
  );

  return server;
}
