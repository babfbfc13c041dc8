export { MemoryChangelogStore } from './memory_changelog_store';
