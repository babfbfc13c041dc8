/**
 * MemoryGitModule - In-memory Git implementation for tests
 *
 * Test Helpers:
 * - setCommits(commits[]): Set commit history, newest first
 * - setTags(tags[]): Set tag names
 * - setRemote(name, url) / removeRemote(name): Configure remotes
 * - clear(): Reset all state
 *
 * @module git/memory
 */

import type { IGitModule, CommitInfo } from '../types';
import { InvalidRefError } from '../errors';

/**
 * Commit description accepted by the test helpers
 */
export type MemoryCommitInput = {
  hash: string;
  summary: string;
  authorName?: string;
  /** Defaults to the next commit in the list (linear history) */
  parents?: string[];
  /** Paths changed relative to the first parent */
  files?: string[];
};

type MemoryCommit = CommitInfo & { files: string[] };

interface MemoryGitState {
  repoRoot: string;
  commits: MemoryCommit[];
  tags: string[];
  remotes: Map<string, string>;
}

function isUnderPath(file: string, path: string): boolean {
  const prefix = path.replace(/\/+$/, '');
  if (prefix === '' || prefix === '.') return true;
  return file === prefix || file.startsWith(`${prefix}/`);
}

/**
 * MemoryGitModule - In-memory Git mock for unit tests
 */
export class MemoryGitModule implements IGitModule {
  private state: MemoryGitState;

  constructor(repoRoot: string = '/test/repo') {
    this.state = {
      repoRoot,
      commits: [],
      tags: [],
      remotes: new Map(),
    };
  }

  // ═══════════════════════════════════════════════════════════════════════
  // TEST HELPERS
  // ═══════════════════════════════════════════════════════════════════════

  setCommits(commits: MemoryCommitInput[]): void {
    this.state.commits = commits.map((commit, index) => {
      const next = commits[index + 1];
      return {
        hash: commit.hash,
        shortHash: commit.hash.slice(0, 7),
        summary: commit.summary,
        authorName: commit.authorName ?? 'Test User',
        parents: commit.parents ?? (next ? [next.hash] : []),
        files: commit.files ?? [],
      };
    });
  }

  setTags(tags: string[]): void {
    this.state.tags = [...tags];
  }

  setRemote(name: string, url: string): void {
    this.state.remotes.set(name, url);
  }

  removeRemote(name: string): void {
    this.state.remotes.delete(name);
  }

  clear(): void {
    this.state = {
      repoRoot: this.state.repoRoot,
      commits: [],
      tags: [],
      remotes: new Map(),
    };
  }

  // ═══════════════════════════════════════════════════════════════════════
  // IGitModule IMPLEMENTATION
  // ═══════════════════════════════════════════════════════════════════════

  async getRepoRoot(): Promise<string> {
    return this.state.repoRoot;
  }

  async getCommitHistory(ref: string = 'HEAD'): Promise<CommitInfo[]> {
    if (this.state.commits.length === 0) {
      throw new InvalidRefError(ref);
    }
    return this.state.commits.map(({ files: _files, ...commit }) => ({
      ...commit,
      parents: [...commit.parents],
    }));
  }

  async commitTouchesPath(commit: CommitInfo, path: string): Promise<boolean> {
    const stored = this.state.commits.find((c) => c.hash === commit.hash);
    if (!stored) {
      return false;
    }
    return stored.files.some((file) => isUnderPath(file, path));
  }

  async listTags(): Promise<string[]> {
    return [...this.state.tags];
  }

  async getRemoteUrl(remoteName: string): Promise<string | null> {
    return this.state.remotes.get(remoteName) ?? null;
  }
}
