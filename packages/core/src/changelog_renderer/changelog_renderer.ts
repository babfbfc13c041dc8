/**
 * ChangelogRenderer - serializes sections into changelog markdown
 *
 * Output shape:
 *
 * ```markdown
 * # Changelog
 *
 * ## All Changes@v0.2.0 — 2026-10-18
 *
 * ### Feat
 *
 * - feat: parser by Ada in [#1a2b3c4](https://github.com/acme/app/commit/1a2b3c4...)
 *
 * ```
 *
 * @module changelog_renderer
 */

import { COMMIT_TYPES, commitTypeDisplayName } from '../commit_classifier';
import { formatVersion } from '../version_calculator';
import type { SemanticVersion } from '../version_calculator';
import type { CommitEntry, RenderableSection } from '../section';

export const CHANGELOG_HEADER = '# Changelog';

/** Separator between a section heading and its date */
export const SECTION_DATE_SEPARATOR = '—';

/**
 * Display string of a commit. This string is what later runs deduplicate on.
 *
 * @example
 * formatEntry({ summary: 'feat: a', shortHash: 'abc1234', hash: 'abc1234...', authorName: 'Ada' }, 'https://github.com/acme/app');
 * // => "feat: a by Ada in [#abc1234](https://github.com/acme/app/commit/abc1234...)"
 */
export function formatEntry(entry: CommitEntry, remoteUrl: string): string {
  return `${entry.summary} by ${entry.authorName} in [#${entry.shortHash}](${remoteUrl}/commit/${entry.hash})`;
}

export function formatSectionHeading(name: string, version: SemanticVersion | null, date: string): string {
  const title = version ? `${name}@${formatVersion(version)}` : name;
  return `## ${title} ${SECTION_DATE_SEPARATOR} ${date}`;
}

export function renderSection(section: RenderableSection, date: string): string {
  const lines: string[] = [formatSectionHeading(section.name, section.version, section.date ?? date), ''];

  for (const type of COMMIT_TYPES) {
    const logs = section.entries.get(type);
    if (!logs || logs.size === 0) continue;

    lines.push(`### ${commitTypeDisplayName(type)}`, '');
    for (const log of [...logs].sort()) {
      lines.push(`- ${log}`);
    }
    lines.push('');
  }

  return lines.join('\n') + '\n';
}

/**
 * Renders sections in the order given.
 */
export function renderSections(sections: readonly RenderableSection[], date: string): string {
  return sections.map((section) => renderSection(section, date)).join('');
}

/**
 * Assembles the file: header, newly rendered sections, then the content that
 * was already in the file.
 */
export function renderChangelog(newMarkdown: string, preservedContent: string): string {
  return `${CHANGELOG_HEADER}\n\n${newMarkdown}${preservedContent}`;
}
