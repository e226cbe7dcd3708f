import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import type { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { z } from "zod";
import { GitBackend } from "../../src/backend.js";
import { createServer } from "../../src/server.js";
import { createTempRepo, type TempRepo } from "../helpers/git-repo.js";
import { connectClient, firstText, structured } from "../helpers/mcp.js";

const rangeResult = z.object({
  start: z.string(),
  head: z.string(),
  ref_name: z.string().nullable(),
  push: z.array(z.object({ sha: z.string(), title: z.string() })),
  reparent: z.array(z.object({ sha: z.string() })),
});

const changeSetResult = z.object({
  commit: z.string(),
  changes: z.array(
    z.object({
      current_path: z.string(),
      kind: z.string().optional(),
      hunks: z.array(z.object({ corpus: z.string() })),
    }),
  ),
});

describe("MCP server E2E (in-process)", () => {
  let repo: TempRepo;
  let client: Client;
  let base: string;
  let tip: string;

  beforeAll(async () => {
    repo = createTempRepo("revlift-e2e-");
    repo.write("file.txt", "a\nb\n");
    base = repo.commit("Initial commit");
    repo.write("file.txt", "a\nc\n");
    tip = repo.commit("Bug 42 - Tidy up r?alice");

    client = await connectClient(createServer({ backend: new GitBackend(repo.dir) }));
  });

  afterAll(async () => {
    await client.close();
    repo.cleanup();
  });

  it("lists all tools", async () => {
    const result = await client.listTools();
    const names = result.tools.map((t) => t.name).sort();
    expect(names).toEqual([
      "build_change_set",
      "ensure_secondary_hashes",
      "parse_message",
      "resolve_range",
      "rewrite_history",
      "to_wire",
    ]);
  });

  it("doc-contract: tool names match README.md tool table", async () => {
    const readme = readFileSync(fileURLToPath(new URL("../../README.md", import.meta.url)), "utf8");
    const toolSection = readme.split("## MCP Tool Contracts")[1]?.split("\n##")[0] ?? "";
    // First column only, anchored to line start
    const docToolNames = [...toolSection.matchAll(/^\| `(\w+)` \|/gm)].map((m) => m[1]).sort();
    expect(docToolNames.length).toBeGreaterThan(0);

    const result = await client.listTools();
    expect(docToolNames).toEqual(result.tools.map((t) => t.name).sort());
  });

  it("resolve_range splits the history of HEAD", async () => {
    const result = await client.callTool({
      name: "resolve_range",
      arguments: { revspec: "HEAD~1.." },
    });

    expect(result.isError).toBeFalsy();
    const range = structured(result, rangeResult);
    expect(range.start).toBe(base);
    expect(range.head).toBe(tip);
    expect(range.ref_name).toMatch(/^refs\/heads\//);
    expect(range.push).toEqual([{ sha: tip, title: "Bug 42 - Tidy up r?alice" }]);
    expect(range.reparent).toEqual([]);
  });

  it("build_change_set describes the commit", async () => {
    const result = await client.callTool({
      name: "build_change_set",
      arguments: { commit: "HEAD" },
    });

    expect(result.isError).toBeFalsy();
    const changeSet = structured(result, changeSetResult);
    expect(changeSet.commit).toBe(tip);
    expect(changeSet.changes).toEqual([
      { current_path: "file.txt", kind: "CHANGE", hunks: [{ corpus: " a\n-b\n+c\n" }] },
    ]);
  });

  it("parse_message reads review metadata", async () => {
    const result = await client.callTool({
      name: "parse_message",
      arguments: { commit: tip },
    });

    expect(result.isError).toBeFalsy();
    const info = structured(
      result,
      z.object({
        sha: z.string(),
        title: z.string(),
        bug: z.string().nullable(),
        reviewers: z.array(z.object({ tag: z.string() })),
      }),
    );
    expect(info).toEqual({
      sha: tip,
      title: "Tidy up",
      bug: "42",
      reviewers: [{ tag: "alice" }],
    });
  });

  it("to_wire fails without a secondary hash source", async () => {
    const result = await client.callTool({
      name: "to_wire",
      arguments: { commit: "HEAD" },
    });

    expect(result.isError).toBe(true);
    expect(firstText(result)).toMatch(/cinnabar git2hg|has no secondary hash/);
  });

  it("unknown revisions return an error", async () => {
    const result = await client.callTool({
      name: "build_change_set",
      arguments: { commit: "nope" },
    });

    expect(result.isError).toBe(true);
    expect(firstText(result)).toBe("Unknown revision: nope");
  });

  it("rewrite_history embeds a link and moves HEAD", async () => {
    const url = "https://review.example.test/D5";
    const result = await client.callTool({
      name: "rewrite_history",
      arguments: { revspec: "HEAD~1..", links: { [tip]: url } },
    });

    expect(result.isError).toBeFalsy();
    const rewrite = structured(
      result,
      z.object({
        head: z.string(),
        updated: z.boolean(),
        rewritten: z.array(z.object({ old_sha: z.string(), new_sha: z.string() })),
      }),
    );
    expect(rewrite.updated).toBe(true);
    expect(rewrite.rewritten).toEqual([{ old_sha: tip, new_sha: rewrite.head }]);
    expect(repo.git(["rev-parse", "HEAD"]).trim()).toBe(rewrite.head);
    expect(repo.git(["log", "-1", "--format=%B"]).trim()).toBe(
      `Bug 42 - Tidy up r?alice\n\nDifferential Revision: ${url}`,
    );
  });
});
