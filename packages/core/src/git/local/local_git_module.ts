/**
 * LocalGitModule - Git history read through the git CLI
 *
 * Every operation runs one git command through the injected execCommand and
 * turns failures into typed errors. No process or handle outlives a call.
 *
 * @module git/local
 */

import type {
  IGitModule,
  GitModuleDependencies,
  ExecCommand,
  ExecOptions,
  ExecResult,
  CommitInfo,
} from '../types';
import {
  GitCommandError,
  InvalidRefError,
  RepositoryNotFoundError,
} from '../errors';
import { createLogger } from '../../logger/logger';

const logger = createLogger('[GitModule] ');

// Unit separator: cannot appear in names or hashes, rarely in summaries
const FIELD_SEPARATOR = '\x1f';
const LOG_FORMAT = '--format=%H%x1f%an%x1f%P%x1f%s';
const SHORT_HASH_LENGTH = 7;

const BAD_REF_MARKERS = [
  'unknown revision',
  'bad revision',
  'ambiguous argument',
  'does not have any commits yet',
  'bad default revision',
];

/**
 * Splits command output into non-empty lines.
 */
function outputLines(stdout: string): string[] {
  return stdout
    .split('\n')
    .map((line) => line.replace(/\r$/, ''))
    .filter((line) => line.trim() !== '');
}

export class LocalGitModule implements IGitModule {
  private readonly repoPath: string;
  private repoRoot: string | null = null;
  private readonly execCommand: ExecCommand;

  /**
   * Creates a new LocalGitModule instance
   *
   * @param dependencies - execCommand and the repository path
   * @throws Error if execCommand is not provided
   */
  constructor(dependencies: GitModuleDependencies) {
    if (!dependencies.execCommand) {
      throw new Error('execCommand is required for LocalGitModule');
    }

    this.execCommand = dependencies.execCommand;
    this.repoPath = dependencies.repoRoot;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // PRIVATE HELPERS
  // ═══════════════════════════════════════════════════════════════════════

  /**
   * Resolves the work tree root once and caches it
   *
   * @throws RepositoryNotFoundError if repoPath is not inside a work tree
   */
  private async ensureRepoRoot(): Promise<string> {
    if (this.repoRoot === null) {
      const result = await this.execCommand('git', ['rev-parse', '--show-toplevel'], {
        cwd: this.repoPath,
      });
      if (result.exitCode !== 0) {
        logger.debug(`rev-parse failed in ${this.repoPath}: ${result.stderr.trim()}`);
        throw new RepositoryNotFoundError(this.repoPath, result.exitCode);
      }
      this.repoRoot = result.stdout.trim();
    }
    return this.repoRoot;
  }

  private async execGit(args: string[], options?: ExecOptions): Promise<ExecResult> {
    const cwd = options?.cwd ?? (await this.ensureRepoRoot());
    logger.debug(`git ${args.join(' ')}`);
    return this.execCommand('git', args, { ...options, cwd });
  }

  private parseCommitLine(line: string): CommitInfo {
    const [hash, authorName, parents, ...summaryParts] = line.split(FIELD_SEPARATOR);
    if (hash === undefined || authorName === undefined || parents === undefined || summaryParts.length === 0) {
      throw new GitCommandError('Invalid git log output format', line);
    }
    return {
      hash,
      shortHash: hash.slice(0, SHORT_HASH_LENGTH),
      summary: summaryParts.join(FIELD_SEPARATOR),
      authorName,
      parents: parents.split(' ').filter((parent) => parent !== ''),
    };
  }

  // ═══════════════════════════════════════════════════════════════════════
  // READ OPERATIONS
  // ═══════════════════════════════════════════════════════════════════════

  /**
   * Returns the absolute path to the repository root
   *
   * @throws RepositoryNotFoundError if the configured path is not a repository
   *
   * @example
   * const root = await git.getRepoRoot();
   * // => "/home/user/my-project"
   */
  async getRepoRoot(): Promise<string> {
    return await this.ensureRepoRoot();
  }

  /**
   * Retrieves the commits reachable from a ref
   *
   * @param ref - Start of the walk (default: "HEAD")
   * @returns Commits ordered from newest to oldest
   * @throws InvalidRefError if the ref does not resolve (including empty repositories)
   * @throws GitCommandError for any other git failure
   *
   * @example
   * const history = await git.getCommitHistory();
   * // => [{ hash: "def456...", shortHash: "def4567", summary: "fix: b", authorName: "Ada", parents: ["abc123..."] }, ...]
   */
  async getCommitHistory(ref: string = 'HEAD'): Promise<CommitInfo[]> {
    const result = await this.execGit(['log', ref, LOG_FORMAT, '--no-color']);

    if (result.exitCode !== 0) {
      if (BAD_REF_MARKERS.some((marker) => result.stderr.includes(marker))) {
        throw new InvalidRefError(ref, result.exitCode);
      }
      throw new GitCommandError(`Failed to get commit history for ${ref}`, result.stderr, 'git log', result.exitCode);
    }

    return outputLines(result.stdout).map((line) => this.parseCommitLine(line));
  }

  /**
   * Checks whether a commit changed anything under a path
   *
   * Compares against the first parent; a root commit is compared against the
   * empty tree, so it touches every path it contains.
   *
   * @example
   * await git.commitTouchesPath(commit, "packages/core");
   * // => true
   */
  async commitTouchesPath(commit: CommitInfo, path: string): Promise<boolean> {
    const firstParent = commit.parents[0];
    const args = firstParent !== undefined
      ? ['diff', '--name-only', '--no-color', firstParent, commit.hash, '--', path]
      : ['diff-tree', '--root', '-r', '--name-only', '--no-commit-id', commit.hash, '--', path];

    const result = await this.execGit(args);

    if (result.exitCode !== 0) {
      throw new GitCommandError(
        `Failed to diff commit ${commit.shortHash} for path ${path}`,
        result.stderr,
        `git ${args[0]}`,
        result.exitCode
      );
    }

    return outputLines(result.stdout).length > 0;
  }

  /**
   * Lists all tag names
   *
   * @example
   * await git.listTags();
   * // => ["v0.1.0", "v0.2.0"]
   */
  async listTags(): Promise<string[]> {
    const result = await this.execGit(['tag', '--list']);

    if (result.exitCode !== 0) {
      throw new GitCommandError('Failed to list tags', result.stderr, 'git tag', result.exitCode);
    }

    return outputLines(result.stdout).map((tag) => tag.trim());
  }

  /**
   * Returns the URL of a remote, or null if it does not exist
   *
   * @example
   * await git.getRemoteUrl("origin");
   * // => "git@github.com:acme/app.git"
   */
  async getRemoteUrl(remoteName: string): Promise<string | null> {
    const result = await this.execGit(['remote', 'get-url', remoteName]);

    if (result.exitCode !== 0) {
      logger.debug(`No URL for remote ${remoteName}: ${result.stderr.trim()}`);
      return null;
    }

    const url = result.stdout.trim();
    return url === '' ? null : url;
  }
}
