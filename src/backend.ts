/**
 * Version-control backend.
 *
 * Everything revlift asks of git (and of git-cinnabar for the secondary
 * Mercurial hashes) goes through this interface, so the core can run against
 * an in-memory backend in tests.
 */

import { commitFormatArgs, parseCommitRecord } from "./commits.js";
import { ExternalProcessError, UserError } from "./errors.js";
import { execGit, execGitBuffer } from "./exec-git.js";
import type { CommitNode, Identity } from "./models.js";

export const NULL_HASH = "0".repeat(40);

export interface CommitTreeArgs {
  tree: string;
  parent: string;
  message: string;
  author: Identity;
  committer: Identity;
}

export interface Backend {
  /** Resolve a revision to a full commit hash. */
  revParse(rev: string): string;
  /** Full ref name behind `ref`, or null when it does not name a ref. */
  symbolicRefName(ref: string): string | null;
  readCommit(sha: string): CommitNode;
  /** NUL-delimited raw change listing between a commit and its parent. */
  diffTree(commit: CommitNode): string;
  readBlob(blobId: string): Buffer;
  /** Secondary-VCS hash of a commit, or null when it has none. */
  secondaryHash(sha: string): string | null;
  /** Write an uncompressed v1 bundle covering `base..tip` to `destination`. */
  exportBundle(base: string, tip: string, destination: string): void;
  commitTree(args: CommitTreeArgs): string;
  /** Compare-and-swap `refName` from `oldSha` to `newSha`. */
  updateRef(refName: string, newSha: string, oldSha: string, reason: string): void;
}

/**
 * Backend that shells out to git in a fixed working directory.
 */
export class GitBackend implements Backend {
  private readonly cwd: string;

  constructor(cwd: string) {
    this.cwd = cwd;
  }

  revParse(rev: string): string {
    if (rev.startsWith("-")) {
      throw new UserError(`Unknown revision: ${rev}`);
    }
    try {
      return this.git(["rev-parse", "--verify", "--quiet", `${rev}^{commit}`]).trim();
    } catch (err) {
      if (err instanceof ExternalProcessError) {
        throw new UserError(`Unknown revision: ${rev}`);
      }
      throw err;
    }
  }

  symbolicRefName(ref: string): string | null {
    const name = this.git(["rev-parse", "--symbolic-full-name", ref]).trim();
    return name.length > 0 ? name : null;
  }

  readCommit(sha: string): CommitNode {
    return parseCommitRecord(this.git(["log", "-1", ...commitFormatArgs(), sha, "--"]));
  }

  diffTree(commit: CommitNode): string {
    const base = commit.parents.length === 0 ? ["--root"] : [commit.parents[0]];
    return this.git(["diff-tree", "--no-commit-id", "-r", "-z", "--raw", "-M", "-C", "--no-abbrev", ...base, commit.sha]);
  }

  readBlob(blobId: string): Buffer {
    return execGitBuffer(["cat-file", "blob", blobId], { cwd: this.cwd });
  }

  secondaryHash(sha: string): string | null {
    const hash = this.git(["cinnabar", "git2hg", sha]).trim();
    return hash.length === 0 || hash === NULL_HASH ? null : hash;
  }

  exportBundle(base: string, tip: string, destination: string): void {
    this.git(["cinnabar", "bundle", "--version", "1", destination, `${base}..${tip}`]);
  }

  commitTree(args: CommitTreeArgs): string {
    const output = this.git(["commit-tree", args.tree, "-p", args.parent, "-F", "-"], {
      input: args.message,
      env: {
        GIT_AUTHOR_NAME: args.author.name,
        GIT_AUTHOR_EMAIL: args.author.email,
        GIT_AUTHOR_DATE: args.author.date,
        GIT_COMMITTER_NAME: args.committer.name,
        GIT_COMMITTER_EMAIL: args.committer.email,
        GIT_COMMITTER_DATE: args.committer.date,
      },
    });
    return output.trim();
  }

  updateRef(refName: string, newSha: string, oldSha: string, reason: string): void {
    this.git(["update-ref", "-m", reason, refName, newSha, oldSha]);
  }

  private git(args: string[], options: { input?: string; env?: Record<string, string> } = {}): string {
    return execGit(args, { ...options, cwd: this.cwd });
  }
}
