export type { ChangelogStore } from './changelog_store';
export { ChangelogWriteError } from './errors';
