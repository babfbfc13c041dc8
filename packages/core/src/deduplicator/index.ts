export { flattenEntries, filterNewEntries, extractCommitHash } from './deduplicator';
