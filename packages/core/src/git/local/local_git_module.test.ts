/**
 * LocalGitModule Tests
 *
 * git is never spawned: every command goes through a scripted execCommand.
 */

import { LocalGitModule } from './local_git_module';
import {
  GitCommandError,
  InvalidRefError,
  RepositoryNotFoundError,
} from '../errors';
import type { CommitInfo, ExecOptions, ExecResult } from '../types';

const REPO = '/work/app';
const SEP = '\x1f';

function ok(stdout: string = ''): ExecResult {
  return { exitCode: 0, stdout, stderr: '' };
}

function fail(stderr: string, exitCode: number = 128): ExecResult {
  return { exitCode, stdout: '', stderr };
}

type Script = (args: string[]) => ExecResult;

/**
 * Test Helper: execCommand that answers rev-parse and delegates the rest
 */
function createExecCommand(script: Script) {
  return jest.fn(async (_command: string, args: string[], _options?: ExecOptions): Promise<ExecResult> => {
    if (args[0] === 'rev-parse') {
      return ok(`${REPO}\n`);
    }
    return script(args);
  });
}

const rootCommit: CommitInfo = {
  hash: 'a'.repeat(40),
  shortHash: 'aaaaaaa',
  summary: 'feat: a',
  authorName: 'Ada',
  parents: [],
};

const childCommit: CommitInfo = {
  hash: 'b'.repeat(40),
  shortHash: 'bbbbbbb',
  summary: 'fix: b',
  authorName: 'Bo',
  parents: ['a'.repeat(40)],
};

describe('LocalGitModule', () => {
  describe('getRepoRoot', () => {
    it('should resolve the work tree root from the configured path', async () => {
      const execCommand = createExecCommand(() => ok());
      const git = new LocalGitModule({ repoRoot: `${REPO}/packages`, execCommand });

      expect(await git.getRepoRoot()).toBe(REPO);
      expect(execCommand).toHaveBeenCalledWith('git', ['rev-parse', '--show-toplevel'], { cwd: `${REPO}/packages` });
    });

    it('should cache the root between calls', async () => {
      const execCommand = createExecCommand(() => ok());
      const git = new LocalGitModule({ repoRoot: REPO, execCommand });

      await git.getRepoRoot();
      await git.getRepoRoot();

      expect(execCommand).toHaveBeenCalledTimes(1);
    });

    it('should throw RepositoryNotFoundError outside a repository', async () => {
      const execCommand = jest.fn(async () => fail('fatal: not a git repository', 128));
      const git = new LocalGitModule({ repoRoot: '/nowhere', execCommand });

      await expect(git.getRepoRoot()).rejects.toBeInstanceOf(RepositoryNotFoundError);
      await expect(git.getRepoRoot()).rejects.toMatchObject({ exitCode: 128, repoPath: '/nowhere' });
    });
  });

  describe('getCommitHistory', () => {
    it('should parse log output newest first', async () => {
      const stdout = [
        [childCommit.hash, 'Bo', rootCommit.hash, 'fix: b'].join(SEP),
        [rootCommit.hash, 'Ada', '', 'feat: a'].join(SEP),
        '',
      ].join('\n');
      const execCommand = createExecCommand(() => ok(stdout));
      const git = new LocalGitModule({ repoRoot: REPO, execCommand });

      const history = await git.getCommitHistory();

      expect(history).toEqual([childCommit, rootCommit]);
      expect(execCommand).toHaveBeenLastCalledWith(
        'git',
        ['log', 'HEAD', '--format=%H%x1f%an%x1f%P%x1f%s', '--no-color'],
        { cwd: REPO }
      );
    });

    it('should keep separators that appear inside a summary', async () => {
      const stdout = [rootCommit.hash, 'Ada', '', `feat: a${SEP}b`].join(SEP);
      const git = new LocalGitModule({ repoRoot: REPO, execCommand: createExecCommand(() => ok(stdout)) });

      const [commit] = await git.getCommitHistory();

      expect(commit?.summary).toBe(`feat: a${SEP}b`);
    });

    it('should split merge commit parents', async () => {
      const stdout = ['c'.repeat(40), 'Cy', `${'a'.repeat(40)} ${'b'.repeat(40)}`, 'Merge branch x'].join(SEP);
      const git = new LocalGitModule({ repoRoot: REPO, execCommand: createExecCommand(() => ok(stdout)) });

      const [commit] = await git.getCommitHistory();

      expect(commit?.parents).toEqual(['a'.repeat(40), 'b'.repeat(40)]);
    });

    it('should throw InvalidRefError for an empty repository', async () => {
      const git = new LocalGitModule({
        repoRoot: REPO,
        execCommand: createExecCommand(() => fail("fatal: your current branch 'main' does not have any commits yet")),
      });

      await expect(git.getCommitHistory()).rejects.toBeInstanceOf(InvalidRefError);
    });

    it('should throw GitCommandError for other failures', async () => {
      const git = new LocalGitModule({
        repoRoot: REPO,
        execCommand: createExecCommand(() => fail('fatal: index file corrupt', 1)),
      });

      await expect(git.getCommitHistory()).rejects.toMatchObject({
        name: 'GitCommandError',
        exitCode: 1,
        stderr: 'fatal: index file corrupt',
      });
    });

    it('should reject malformed log lines', async () => {
      const git = new LocalGitModule({ repoRoot: REPO, execCommand: createExecCommand(() => ok('garbage')) });

      await expect(git.getCommitHistory()).rejects.toBeInstanceOf(GitCommandError);
    });
  });

  describe('commitTouchesPath', () => {
    it('should diff against the first parent', async () => {
      const execCommand = createExecCommand(() => ok('packages/core/src/index.ts\n'));
      const git = new LocalGitModule({ repoRoot: REPO, execCommand });

      expect(await git.commitTouchesPath(childCommit, 'packages/core')).toBe(true);
      expect(execCommand).toHaveBeenLastCalledWith(
        'git',
        ['diff', '--name-only', '--no-color', rootCommit.hash, childCommit.hash, '--', 'packages/core'],
        { cwd: REPO }
      );
    });

    it('should compare a root commit against the empty tree', async () => {
      const execCommand = createExecCommand(() => ok('README.md\n'));
      const git = new LocalGitModule({ repoRoot: REPO, execCommand });

      expect(await git.commitTouchesPath(rootCommit, 'README.md')).toBe(true);
      expect(execCommand).toHaveBeenLastCalledWith(
        'git',
        ['diff-tree', '--root', '-r', '--name-only', '--no-commit-id', rootCommit.hash, '--', 'README.md'],
        { cwd: REPO }
      );
    });

    it('should be false when nothing under the path changed', async () => {
      const git = new LocalGitModule({ repoRoot: REPO, execCommand: createExecCommand(() => ok('\n')) });

      expect(await git.commitTouchesPath(childCommit, 'docs')).toBe(false);
    });
  });

  describe('listTags', () => {
    it('should return every tag name', async () => {
      const git = new LocalGitModule({ repoRoot: REPO, execCommand: createExecCommand(() => ok('v0.1.0\nv0.2.0\n')) });

      expect(await git.listTags()).toEqual(['v0.1.0', 'v0.2.0']);
    });

    it('should return an empty list for untagged repositories', async () => {
      const git = new LocalGitModule({ repoRoot: REPO, execCommand: createExecCommand(() => ok('')) });

      expect(await git.listTags()).toEqual([]);
    });
  });

  describe('getRemoteUrl', () => {
    it('should return the configured URL', async () => {
      const execCommand = createExecCommand(() => ok('git@github.com:acme/app.git\n'));
      const git = new LocalGitModule({ repoRoot: REPO, execCommand });

      expect(await git.getRemoteUrl('origin')).toBe('git@github.com:acme/app.git');
      expect(execCommand).toHaveBeenLastCalledWith('git', ['remote', 'get-url', 'origin'], { cwd: REPO });
    });

    it('should return null for a missing remote', async () => {
      const git = new LocalGitModule({
        repoRoot: REPO,
        execCommand: createExecCommand(() => fail("error: No such remote 'origin'", 2)),
      });

      expect(await git.getRemoteUrl('origin')).toBeNull();
    });
  });
});
