/**
 * Deduplicator - suppresses entries that an earlier run already recorded
 *
 * Deduplication is global: an entry recorded under any historical section is
 * suppressed in every section of the new run.
 *
 * @module deduplicator
 */

import { isBreaking } from '../commit_classifier';
import { addSectionEntry, createSectionData } from '../section';
import type { ParsedSection, SectionData } from '../section';

// Trailing "(<url>/commit/<hash>)" link written by formatEntry
const COMMIT_LINK_PATTERN = /\/commit\/([0-9a-f]{7,64})\)[)\s]*$/i;

/**
 * Full commit hash linked from an entry, or null for entries without a link.
 */
export function extractCommitHash(entry: string): string | null {
  const match = COMMIT_LINK_PATTERN.exec(entry);
  return match?.[1]?.toLowerCase() ?? null;
}

/**
 * Union of every entry string across all sections and categories.
 */
export function flattenEntries(sections: readonly ParsedSection[]): Set<string> {
  const flat = new Set<string>();
  for (const section of sections) {
    for (const logs of section.entries.values()) {
      for (const log of logs) {
        flat.add(log);
      }
    }
  }
  return flat;
}

/**
 * Keeps the entries of `current` that are not already recorded.
 *
 * An entry counts as recorded when the exact string is in `existing`, or when
 * the commit it links to is linked from an existing entry. The second check
 * keeps old commits out when the entry format has changed between runs.
 *
 * The breaking flag of the result is derived from the surviving entries only.
 */
export function filterNewEntries(current: SectionData, existing: ReadonlySet<string>): SectionData {
  const existingHashes = new Set<string>();
  for (const entry of existing) {
    const hash = extractCommitHash(entry);
    if (hash) existingHashes.add(hash);
  }

  const result = createSectionData();

  for (const [type, logs] of current.entries) {
    for (const log of logs) {
      if (existing.has(log)) continue;

      const hash = extractCommitHash(log);
      if (hash && existingHashes.has(hash)) continue;

      addSectionEntry(result, type, log);
      // entries start with the raw summary, so its first colon is the prefix colon
      if (isBreaking(log)) {
        result.hasBreakingChange = true;
      }
    }
  }

  return result;
}
