/**
 * GitModule - read access to commit history
 *
 * @module git
 */

export type {
  IGitModule,
  GitModuleDependencies,
  ExecCommand,
  ExecOptions,
  ExecResult,
  CommitInfo,
} from './types';

export {
  GitError,
  GitCommandError,
  RepositoryNotFoundError,
  InvalidRefError,
  RemoteNotFoundError,
} from './errors';
