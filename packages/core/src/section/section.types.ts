import type { CommitType } from '../commit_classifier';
import type { SemanticVersion } from '../version_calculator';

/**
 * A single commit as it enters a changelog
 */
export type CommitEntry = {
  /** First line of the commit message */
  summary: string;
  /** Abbreviated hash (7 characters) */
  shortHash: string;
  /** Full 40-character hash */
  hash: string;
  /** Author display name */
  authorName: string;
};

/**
 * Formatted entries grouped by commit type.
 *
 * Entry strings are the identity of a change once rendered; a Set collapses
 * duplicates within a category.
 */
export type SectionEntries = Map<CommitType, Set<string>>;

export type SectionData = {
  entries: SectionEntries;
  /** True when at least one entry in `entries` is a breaking change */
  hasBreakingChange: boolean;
};

/**
 * A section recovered from existing changelog text
 */
export type ParsedSection = SectionData & {
  name: string;
  /** Absent for sections written before versions were added to headers */
  version: SemanticVersion | null;
  /** YYYY-MM-DD */
  date: string;
};

/**
 * A section ready to be rendered
 */
export type RenderableSection = SectionData & {
  name: string;
  version: SemanticVersion | null;
  /** Overrides the render date, used when historical sections are re-rendered */
  date?: string;
};
