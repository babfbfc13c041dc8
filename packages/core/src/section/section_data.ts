import { COMMIT_TYPES } from '../commit_classifier';
import type { CommitType } from '../commit_classifier';
import type { SectionData } from './section.types';

export function createSectionData(): SectionData {
  return { entries: new Map(), hasBreakingChange: false };
}

/**
 * Adds a formatted entry under `type`, creating the category when needed.
 */
export function addSectionEntry(section: SectionData, type: CommitType, entry: string): void {
  let logs = section.entries.get(type);
  if (!logs) {
    logs = new Set();
    section.entries.set(type, logs);
  }
  logs.add(entry);
}

/**
 * Commit types with at least one entry, in declaration order.
 */
export function sectionCategories(section: SectionData): CommitType[] {
  return COMMIT_TYPES.filter((type) => (section.entries.get(type)?.size ?? 0) > 0);
}

export function sectionEntryCount(section: SectionData): number {
  let count = 0;
  for (const logs of section.entries.values()) {
    count += logs.size;
  }
  return count;
}

export function isSectionEmpty(section: SectionData): boolean {
  return sectionEntryCount(section) === 0;
}
