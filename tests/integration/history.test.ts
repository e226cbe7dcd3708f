import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { GitBackend } from "../../src/backend.js";
import { resolveRange } from "../../src/range.js";
import { rewriteHistory } from "../../src/rewrite.js";
import { Session } from "../../src/session.js";
import { createTempRepo, type TempRepo } from "../helpers/git-repo.js";

describe("range resolution and rewriting against git", () => {
  let repo: TempRepo;
  let shas: string[];

  beforeEach(() => {
    repo = createTempRepo("revlift-history-");
    shas = [];
    for (const name of ["one", "two", "three", "four"]) {
      repo.write(`${name}.txt`, `${name}\n`);
      shas.push(repo.commit(`Add ${name}\n\nBody of ${name}.`));
    }
  });

  afterEach(() => {
    repo.cleanup();
  });

  it("reads commit metadata byte for byte", () => {
    const session = new Session(new GitBackend(repo.dir));
    const commit = session.resolve("HEAD");

    expect(commit.sha).toBe(shas[3]);
    expect(commit.parents).toEqual([shas[2]]);
    expect(commit.message).toBe("Add four\n\nBody of four.\n");
    expect(commit.author.name).toBe("Test");
    expect(commit.author.email).toBe("test@test.com");
    expect(commit.author.date).toMatch(/^\d+ [+-]\d{4}$/);
  });

  it("resolves a range through the current branch", () => {
    const session = new Session(new GitBackend(repo.dir));
    const range = resolveRange(session, "HEAD", `${shas[0]}..${shas[2]}`);

    expect(range.push.map((c) => c.sha)).toEqual([shas[1], shas[2]]);
    expect(range.reparent.map((c) => c.sha)).toEqual([shas[3]]);
    expect(range.ref_name).toMatch(/^refs\/heads\//);
  });

  it("has no ref name for a bare commit hash", () => {
    const session = new Session(new GitBackend(repo.dir));

    expect(resolveRange(session, shas[3], `${shas[2]}..`).ref_name).toBeNull();
  });

  it("rewrites messages and keeps authorship and trees", () => {
    const backend = new GitBackend(repo.dir);
    const session = new Session(backend);
    const range = resolveRange(session, "HEAD", `${shas[0]}..${shas[2]}`);
    const url = "https://review.example.test/D21";

    const result = rewriteHistory(session, range, { [shas[2]]: url });

    expect(result.updated).toBe(true);
    expect(result.rewritten.map((r) => r.old_sha)).toEqual([shas[2], shas[3]]);
    expect(repo.git(["rev-parse", "HEAD"]).trim()).toBe(result.head);

    const rewritten = new Session(backend).resolve("HEAD~1");
    expect(rewritten.message).toBe(`Add three\n\nBody of three.\n\nDifferential Revision: ${url}\n`);
    expect(rewritten.parents).toEqual([shas[1]]);
    expect(rewritten.tree).toBe(session.commit(shas[2]).tree);
    expect(rewritten.author).toEqual(session.commit(shas[2]).author);

    const top = new Session(backend).resolve("HEAD");
    expect(top.message).toBe("Add four\n\nBody of four.\n");
    expect(top.tree).toBe(session.commit(shas[3]).tree);
  });
});
