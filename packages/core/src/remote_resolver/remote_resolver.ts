/**
 * RemoteResolver - canonical web URL of a repository for commit links
 *
 * @module remote_resolver
 */

import type { IGitModule } from '../git';
import { RemoteNotFoundError } from '../git';
import { createLogger } from '../logger/logger';

const logger = createLogger('[RemoteResolver] ');

export const DEFAULT_REMOTE_NAME = 'origin';

// git@github.com:acme/app.git
const SCP_LIKE_PATTERN = /^[\w.-]+@([^:/]+):(.+)$/;
// ssh://git@github.com:22/acme/app.git, git://github.com/acme/app.git
const SSH_URL_PATTERN = /^(?:ssh|git(?:\+ssh)?):\/\/(?:[^@/]+@)?([^:/]+)(?::\d+)?\/(.+)$/;

/**
 * Rewrites SSH-style remotes to their HTTPS web URL and drops a trailing
 * slash and `.git` suffix.
 *
 * @example
 * normalizeRemoteUrl("git@github.com:acme/app.git");
 * // => "https://github.com/acme/app"
 */
export function normalizeRemoteUrl(url: string): string {
  let normalized = url.trim();

  const scpLike = SCP_LIKE_PATTERN.exec(normalized);
  const sshUrl = scpLike ? null : SSH_URL_PATTERN.exec(normalized);
  const match = scpLike ?? sshUrl;
  if (match) {
    normalized = `https://${match[1] ?? ''}/${match[2] ?? ''}`;
  }

  normalized = normalized.replace(/\/+$/, '');
  if (normalized.endsWith('.git')) {
    normalized = normalized.slice(0, -'.git'.length);
  }
  return normalized.replace(/\/+$/, '');
}

/**
 * Resolves the URL used in commit links. An explicit URL wins over the
 * repository's remote.
 *
 * @throws RemoteNotFoundError when no URL is given and the remote is missing
 */
export async function resolveRemoteUrl(
  git: IGitModule,
  explicitUrl?: string,
  remoteName: string = DEFAULT_REMOTE_NAME
): Promise<string> {
  if (explicitUrl && explicitUrl.trim() !== '') {
    return normalizeRemoteUrl(explicitUrl);
  }

  const remoteUrl = await git.getRemoteUrl(remoteName);
  if (remoteUrl === null) {
    throw new RemoteNotFoundError(remoteName);
  }

  const normalized = normalizeRemoteUrl(remoteUrl);
  logger.debug(`Resolved ${remoteName} to ${normalized}`);
  return normalized;
}
