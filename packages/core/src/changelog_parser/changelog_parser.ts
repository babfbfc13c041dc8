/**
 * ChangelogParser - reads previously rendered changelog text back into sections
 *
 * Each line is tried against three patterns in order: section header,
 * category header, entry. Lines that match none are skipped; parsing never
 * fails.
 *
 * @module changelog_parser
 */

import { commitTypeFromDisplayName, isBreakingEntry } from '../commit_classifier';
import type { CommitType } from '../commit_classifier';
import { tryParseVersion } from '../version_calculator';
import { addSectionEntry } from '../section';
import type { ParsedSection } from '../section';
import { CHANGELOG_HEADER } from '../changelog_renderer';

// ## <name>[@<semver>] <-|--|—> <YYYY-MM-DD>
const SECTION_PATTERN = /^## (.+?)(?:@(v?\d+\.\d+\.\d+))?\s+(?:--|—|-)\s+(\d{4}-\d{2}-\d{2})\s*$/;
const CATEGORY_PATTERN = /^###\s+(.+?)\s*$/;
const ENTRY_PATTERN = /^- (.+)$/;

type ParsedLine =
  | { kind: 'section'; name: string; version: string | undefined; date: string }
  | { kind: 'category'; name: string }
  | { kind: 'entry'; text: string }
  | { kind: 'other' };

function classifyLine(line: string): ParsedLine {
  const section = SECTION_PATTERN.exec(line);
  if (section) {
    return { kind: 'section', name: section[1] ?? '', version: section[2], date: section[3] ?? '' };
  }

  const category = CATEGORY_PATTERN.exec(line);
  if (category) {
    return { kind: 'category', name: category[1] ?? '' };
  }

  const entry = ENTRY_PATTERN.exec(line);
  if (entry) {
    return { kind: 'entry', text: entry[1] ?? '' };
  }

  return { kind: 'other' };
}

/**
 * Parses changelog text into sections, in file order (newest first for files
 * this tool wrote).
 *
 * @example
 * parseChangelog("## core@v1.0.0 — 2026-01-02\n\n### Fix\n\n- fix: x\n");
 * // => [{ name: "core", version: { major: 1, minor: 0, patch: 0 }, date: "2026-01-02", entries: Map { "fix" => Set { "fix: x" } }, hasBreakingChange: false }]
 */
export function parseChangelog(content: string): ParsedSection[] {
  const sections: ParsedSection[] = [];
  let current: ParsedSection | null = null;
  let currentType: CommitType | null = null;

  for (const line of content.split(/\r?\n/)) {
    const parsed = classifyLine(line);

    switch (parsed.kind) {
      case 'section':
        current = {
          name: parsed.name,
          version: parsed.version ? tryParseVersion(parsed.version) : null,
          date: parsed.date,
          entries: new Map(),
          hasBreakingChange: false,
        };
        sections.push(current);
        currentType = null;
        break;

      case 'category':
        currentType = commitTypeFromDisplayName(parsed.name);
        break;

      case 'entry':
        if (current && currentType) {
          addSectionEntry(current, currentType, parsed.text);
          if (isBreakingEntry(parsed.text)) {
            current.hasBreakingChange = true;
          }
        }
        break;

      case 'other':
        break;
    }
  }

  return sections;
}

/**
 * Drops a leading `# Changelog` line and the blank lines that follow it.
 * What remains is carried through unchanged below newly rendered sections.
 */
export function stripChangelogHeader(content: string): string {
  const lines = content.split('\n');
  const first = lines[0];
  if (first !== undefined && first.replace(/\r$/, '').startsWith(CHANGELOG_HEADER)) {
    lines.shift();
  }
  while (lines.length > 0 && (lines[0] ?? '').trim() === '') {
    lines.shift();
  }
  return lines.join('\n');
}

/**
 * True when the most recent section was written without a version suffix.
 */
export function needsBackfill(sections: readonly ParsedSection[]): boolean {
  const latest = sections[0];
  return latest !== undefined && latest.version === null;
}
