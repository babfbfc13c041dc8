/**
 * Type Definitions for GitModule
 *
 * Contracts for reading commit history, tags and remotes from a repository.
 */

/**
 * Options for executing shell commands
 */
export type ExecOptions = {
  /** Working directory for the command */
  cwd?: string;
  /** Additional environment variables */
  env?: Record<string, string>;
};

/**
 * Result of executing a shell command
 */
export type ExecResult = {
  /** Exit code (0 = success) */
  exitCode: number;
  /** Standard output */
  stdout: string;
  /** Standard error output */
  stderr: string;
};

export type ExecCommand = (
  command: string,
  args: string[],
  options?: ExecOptions
) => Promise<ExecResult>;

/**
 * Dependencies required by LocalGitModule
 */
export type GitModuleDependencies = {
  /** Path to the repository (any directory inside the work tree) */
  repoRoot: string;
  /** Function to execute shell commands */
  execCommand: ExecCommand;
};

/**
 * A commit reachable from HEAD
 */
export type CommitInfo = {
  /** Full commit hash */
  hash: string;
  /** First 7 characters of the hash */
  shortHash: string;
  /** First line of the commit message */
  summary: string;
  /** Author display name */
  authorName: string;
  /** Parent hashes, first parent first. Empty for root commits */
  parents: string[];
};

/**
 * Read-only view of a repository's history
 */
export interface IGitModule {
  /**
   * Absolute path of the work tree root
   */
  getRepoRoot(): Promise<string>;

  /**
   * Commits reachable from `ref` (default HEAD), newest first
   */
  getCommitHistory(ref?: string): Promise<CommitInfo[]>;

  /**
   * Whether `commit` changed anything under `path` relative to its first
   * parent. A root commit is compared against the empty tree.
   */
  commitTouchesPath(commit: CommitInfo, path: string): Promise<boolean>;

  /**
   * All tag names
   */
  listTags(): Promise<string[]>;

  /**
   * URL of a named remote, or null when the remote is not configured
   */
  getRemoteUrl(remoteName: string): Promise<string | null>;
}
