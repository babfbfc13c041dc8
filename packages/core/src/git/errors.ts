/**
 * Custom Error Classes for GitModule
 */

import { ConfigError } from '../errors';

/**
 * Base error class for all Git-related errors
 */
export class GitError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GitError';
    Object.setPrototypeOf(this, GitError.prototype);
  }
}

/**
 * Error thrown when a Git command fails
 */
export class GitCommandError extends GitError {
  public readonly stderr: string;
  public readonly command: string | undefined;
  public readonly exitCode: number | undefined;

  constructor(message: string, stderr: string = '', command?: string, exitCode?: number) {
    super(message);
    this.name = 'GitCommandError';
    this.stderr = stderr;
    this.command = command;
    this.exitCode = exitCode;
    Object.setPrototypeOf(this, GitCommandError.prototype);
  }
}

/**
 * Error thrown when the given path is not inside a Git work tree
 */
export class RepositoryNotFoundError extends ConfigError {
  public readonly repoPath: string;

  constructor(repoPath: string, exitCode: number = 1) {
    super(`Repository ${repoPath} not found.`, exitCode);
    this.name = 'RepositoryNotFoundError';
    this.repoPath = repoPath;
    Object.setPrototypeOf(this, RepositoryNotFoundError.prototype);
  }
}

/**
 * Error thrown when a ref cannot be resolved (unknown revision, empty repository)
 */
export class InvalidRefError extends ConfigError {
  public readonly ref: string;

  constructor(ref: string, exitCode: number = 1) {
    super(`Ref "${ref}" is not valid or does not exist.`, exitCode);
    this.name = 'InvalidRefError';
    this.ref = ref;
    Object.setPrototypeOf(this, InvalidRefError.prototype);
  }
}

/**
 * Error thrown when no remote URL is given and the remote is not configured
 */
export class RemoteNotFoundError extends ConfigError {
  public readonly remoteName: string;

  constructor(remoteName: string) {
    super(`Remote "${remoteName}" not found. Pass a repository URL explicitly.`);
    this.name = 'RemoteNotFoundError';
    this.remoteName = remoteName;
    Object.setPrototypeOf(this, RemoteNotFoundError.prototype);
  }
}
