/**
 * Review metadata carried in commit messages.
 *
 * This is lenient scanning of free-form text, not a strict protocol:
 *
 * - Title: the first line. A leading `Bug 123 -` (also `:` `,` or no
 *   separator, any case) gives the bug number and is stripped.
 * - Reviewers: `r?a,b` or `r=a` clauses anywhere in the title. `#tag` names a
 *   group, a trailing `!` marks a blocking reviewer. Clauses are stripped from
 *   the title together with separators left dangling at its end.
 * - Dependencies: body lines reading `Depends on D123`.
 * - Revision link: a `Differential Revision: <url ending in /D123>` line. It is
 *   left out of the summary.
 * - Summary: everything after the title line, trimmed.
 */

const BUG_PREFIX = /^\s*bug\s*(\d+)\s*[-:,.]?\s*/i;
const REVIEWER_CLAUSE = /\br[?=]([\w.#!-]+(?:\s*,\s*[\w.#!-]+)*)/g;
const DEPENDS_ON = /^[ \t]*Depends on D(\d+)[ \t]*$/gim;
const REVISION_LINE = /^Differential Revision:[ \t]*(\S*?\/D(\d+))[ \t]*$/im;

export interface Reviewer {
  /** Name as written, `#`-prefixed for groups, without the `!` suffix. */
  tag: string;
  is_group: boolean;
  blocking: boolean;
}

export interface RevisionLink {
  url: string;
  id: number;
}

export interface CommitMessageInfo {
  title: string;
  summary: string;
  bug: string | null;
  reviewers: Reviewer[];
  depends_on: number[];
  revision: RevisionLink | null;
}

export function parseCommitMessage(message: string): CommitMessageInfo {
  const newline = message.indexOf("\n");
  const firstLine = newline === -1 ? message : message.slice(0, newline);
  const body = newline === -1 ? "" : message.slice(newline + 1);

  let title = firstLine.trim();
  let bug: string | null = null;

  const bugMatch = title.match(BUG_PREFIX);
  if (bugMatch) {
    bug = bugMatch[1];
    title = title.slice(bugMatch[0].length);
  }

  const reviewers: Reviewer[] = [];
  for (const clause of title.matchAll(REVIEWER_CLAUSE)) {
    for (const raw of clause[1].split(",")) {
      const name = raw.trim();
      if (name.length === 0) continue;
      const blocking = name.endsWith("!");
      const tag = blocking ? name.slice(0, -1) : name;
      if (tag.length === 0) continue;
      reviewers.push({ tag, is_group: tag.startsWith("#"), blocking });
    }
  }
  title = title.replace(REVIEWER_CLAUSE, "").replace(/[\s,;]+$/, "").trim();

  const dependsOn: number[] = [];
  for (const match of body.matchAll(DEPENDS_ON)) {
    const id = parseInt(match[1], 10);
    if (!dependsOn.includes(id)) dependsOn.push(id);
  }

  const revisionMatch = body.match(REVISION_LINE);
  const revision = revisionMatch
    ? { url: revisionMatch[1], id: parseInt(revisionMatch[2], 10) }
    : null;

  const summary = body.replace(REVISION_LINE, "").trim();

  return { title, summary, bug, reviewers, depends_on: dependsOn, revision };
}

/**
 * Put a `Differential Revision` line for `url` into `message`, replacing an
 * existing one or appending it after a blank line.
 */
export function withRevisionLink(message: string, url: string): string {
  const line = `Differential Revision: ${url}`;
  if (REVISION_LINE.test(message)) {
    return message.replace(REVISION_LINE, () => line);
  }
  return `${message.replace(/\s+$/, "")}\n\n${line}\n`;
}
