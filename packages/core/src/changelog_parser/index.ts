export { parseChangelog, stripChangelogHeader, needsBackfill } from './changelog_parser';
