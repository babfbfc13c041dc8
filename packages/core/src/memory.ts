/**
 * In-memory implementations (no filesystem or git required)
 *
 * Suitable for tests.
 */

// GitModule
export { MemoryGitModule } from './git/memory';
export type { MemoryCommitInput } from './git/memory';

// ChangelogStore
export { MemoryChangelogStore } from './changelog_store/memory';

// ConfigStore
export { MemoryConfigStore } from './config_store/memory';
