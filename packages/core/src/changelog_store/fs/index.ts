export { FsChangelogStore } from './fs_changelog_store';
