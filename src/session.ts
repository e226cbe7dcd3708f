/**
 * Per-run registry of fetched identities.
 *
 * A Session is created once per operation and passed to every component.
 * Its identity maps guarantee each commit is read from the backend at most
 * once; single-threaded execution means no locking.
 */

import type { Backend } from "./backend.js";
import type { CommitNode } from "./models.js";

/**
 * Memoizing map: the loader runs at most once per key.
 */
export class IdentityMap<K, V> {
  private readonly entries = new Map<K, V>();
  private readonly load: (key: K) => V;

  constructor(load: (key: K) => V) {
    this.load = load;
  }

  get(key: K): V {
    const existing = this.entries.get(key);
    if (existing !== undefined) return existing;

    const value = this.load(key);
    this.entries.set(key, value);
    return value;
  }

  has(key: K): boolean {
    return this.entries.has(key);
  }

  get size(): number {
    return this.entries.size;
  }
}

export class Session {
  readonly backend: Backend;
  /** Commit nodes by full hash. */
  readonly commits: IdentityMap<string, CommitNode>;

  constructor(backend: Backend) {
    this.backend = backend;
    this.commits = new IdentityMap((sha) => backend.readCommit(sha));
  }

  commit(sha: string): CommitNode {
    return this.commits.get(sha);
  }

  /**
   * Resolve a revision expression and return its commit node. Refs move, so
   * only the resulting hash is cached.
   */
  resolve(rev: string): CommitNode {
    return this.commit(this.backend.revParse(rev));
  }

  /**
   * Secondary-VCS hash of `commit`, looked up on first use and stored on the
   * node so that the crosswalk can fill it in later.
   */
  secondaryHash(commit: CommitNode): string | null {
    if (commit.secondary_hash === undefined) {
      commit.secondary_hash = this.backend.secondaryHash(commit.sha);
    }
    return commit.secondary_hash;
  }
}

/** True when a commit's secondary hash is known and not just its git hash. */
export function hasRealSecondaryHash(commit: CommitNode): boolean {
  return (
    commit.secondary_hash !== undefined &&
    commit.secondary_hash !== null &&
    commit.secondary_hash !== commit.sha
  );
}
