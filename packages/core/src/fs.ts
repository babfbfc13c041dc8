/**
 * Filesystem-dependent implementations
 *
 * This module exports all implementations that require filesystem access or
 * a git executable. Use @changelog-gen/core/memory for in-memory alternatives.
 */

// LocalGitModule (CLI-based, uses execCommand for git operations)
export { LocalGitModule } from './git/local';
export type { IGitModule, GitModuleDependencies } from './git';

// ChangelogStore
export { FsChangelogStore } from './changelog_store/fs';

// ConfigStore
export { FsConfigStore, CONFIG_FILE_NAME } from './config_store/fs';
