/**
 * Commit metadata retrieval.
 *
 * Fields are pulled with one `git log` call whose format string is built from
 * COMMIT_FIELDS, a static table of field name → git format token. Fields are
 * separated by NUL (%x00), which cannot occur inside any of them.
 */

import type { CommitNode } from "./models.js";

export const COMMIT_FIELDS = [
  { name: "sha", token: "%H" },
  { name: "parents", token: "%P" },
  { name: "tree", token: "%T" },
  { name: "authorName", token: "%an" },
  { name: "authorEmail", token: "%ae" },
  { name: "authorDate", token: "%ad" },
  { name: "committerName", token: "%cn" },
  { name: "committerEmail", token: "%ce" },
  { name: "committerDate", token: "%cd" },
  { name: "message", token: "%B" },
] as const;

type CommitField = (typeof COMMIT_FIELDS)[number]["name"];

validateFieldTable();

/** `git log` arguments that print one commit in the COMMIT_FIELDS layout. */
export function commitFormatArgs(): string[] {
  const format = COMMIT_FIELDS.map((field) => field.token).join("%x00");
  return ["--date=raw", `--format=${format}`];
}

/**
 * Parse one commit printed with `commitFormatArgs()`.
 *
 * The trailing newline git appends after the format is dropped, so `message`
 * is byte-for-byte the stored commit message.
 */
export function parseCommitRecord(raw: string): CommitNode {
  const text = raw.endsWith("\n") ? raw.slice(0, -1) : raw;
  const values = text.split("\0");
  if (values.length !== COMMIT_FIELDS.length) {
    throw new Error(
      `Expected ${COMMIT_FIELDS.length} commit fields, got ${values.length}`,
    );
  }

  const fields = new Map<CommitField, string>();
  COMMIT_FIELDS.forEach(({ name }, index) => fields.set(name, values[index]));
  const field = (name: CommitField): string => fields.get(name) ?? "";

  const parents = field("parents").trim();

  return {
    sha: field("sha"),
    parents: parents.length > 0 ? parents.split(" ") : [],
    tree: field("tree"),
    author: {
      name: field("authorName"),
      email: field("authorEmail"),
      date: field("authorDate"),
    },
    committer: {
      name: field("committerName"),
      email: field("committerEmail"),
      date: field("committerDate"),
    },
    message: field("message"),
  };
}

function validateFieldTable(): void {
  const seen = new Set<string>();
  for (const { name, token } of COMMIT_FIELDS) {
    if (!/^%[A-Za-z]{1,2}$/.test(token)) {
      throw new Error(`Commit field ${name} has malformed format token ${token}`);
    }
    if (seen.has(token)) {
      throw new Error(`Commit format token ${token} is mapped twice`);
    }
    seen.add(token);
  }
}
