import { normalizeRemoteUrl, resolveRemoteUrl } from './remote_resolver';
import { MemoryGitModule } from '../git/memory';
import { RemoteNotFoundError } from '../git';

describe('RemoteResolver', () => {
  describe('normalizeRemoteUrl', () => {
    it('should rewrite scp-style SSH remotes to HTTPS', () => {
      expect(normalizeRemoteUrl('git@github.com:acme/app.git')).toBe('https://github.com/acme/app');
      expect(normalizeRemoteUrl('git@gitlab.example.test:group/sub/app.git')).toBe('https://gitlab.example.test/group/sub/app');
    });

    it('should rewrite ssh:// remotes and drop the port', () => {
      expect(normalizeRemoteUrl('ssh://git@github.com:22/acme/app.git')).toBe('https://github.com/acme/app');
      expect(normalizeRemoteUrl('git://github.com/acme/app')).toBe('https://github.com/acme/app');
    });

    it('should strip trailing slashes and the .git suffix from HTTPS remotes', () => {
      expect(normalizeRemoteUrl('https://github.com/acme/app.git')).toBe('https://github.com/acme/app');
      expect(normalizeRemoteUrl('https://github.com/acme/app/')).toBe('https://github.com/acme/app');
    });

    it('should leave canonical URLs untouched', () => {
      expect(normalizeRemoteUrl('https://github.com/acme/app')).toBe('https://github.com/acme/app');
    });
  });

  describe('resolveRemoteUrl', () => {
    let git: MemoryGitModule;

    beforeEach(() => {
      git = new MemoryGitModule();
      git.setRemote('origin', 'git@github.com:acme/app.git');
    });

    it('should prefer an explicit URL over the origin remote', async () => {
      expect(await resolveRemoteUrl(git, 'https://example.test/fork/app/')).toBe('https://example.test/fork/app');
    });

    it('should fall back to the origin remote', async () => {
      expect(await resolveRemoteUrl(git)).toBe('https://github.com/acme/app');
      expect(await resolveRemoteUrl(git, '  ')).toBe('https://github.com/acme/app');
    });

    it('should use another remote when named', async () => {
      git.setRemote('upstream', 'https://example.test/upstream/app.git');

      expect(await resolveRemoteUrl(git, undefined, 'upstream')).toBe('https://example.test/upstream/app');
    });

    it('should throw RemoteNotFoundError without URL or remote', async () => {
      git.removeRemote('origin');

      await expect(resolveRemoteUrl(git)).rejects.toBeInstanceOf(RemoteNotFoundError);
    });
  });
});
