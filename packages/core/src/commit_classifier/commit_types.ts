/**
 * Commit categories recognised in conventional commit prefixes.
 *
 * The tuple order is the declaration order used both for lookups and for the
 * order categories are rendered in a changelog section.
 */
export const COMMIT_TYPES = [
  'add',
  'feat',
  'refactor',
  'deprecated',
  'fix',
  'docs',
  'test',
  'perf',
] as const;

export type CommitType = (typeof COMMIT_TYPES)[number];

export const COMMIT_TYPE_NAMES: Readonly<Record<CommitType, string>> = Object.freeze({
  add: 'Add',
  feat: 'Feat',
  refactor: 'Refactor',
  deprecated: 'Deprecated',
  fix: 'Fix',
  docs: 'Docs',
  test: 'Test',
  perf: 'Perf',
});

const PREFIX_TO_COMMIT_TYPE: ReadonlyMap<string, CommitType> = new Map(
  COMMIT_TYPES.map((type) => [type, type] as const)
);

const DISPLAY_NAME_TO_COMMIT_TYPE: ReadonlyMap<string, CommitType> = new Map(
  COMMIT_TYPES.map((type) => [COMMIT_TYPE_NAMES[type].toLowerCase(), type] as const)
);

/**
 * Looks up a lowercase prefix token (`feat`, `fix`, ...).
 */
export function commitTypeFromPrefix(prefix: string): CommitType | null {
  return PREFIX_TO_COMMIT_TYPE.get(prefix) ?? null;
}

/**
 * Looks up a display name case-insensitively (`Feat`, `FIX`, ...).
 */
export function commitTypeFromDisplayName(name: string): CommitType | null {
  return DISPLAY_NAME_TO_COMMIT_TYPE.get(name.toLowerCase()) ?? null;
}

export function commitTypeDisplayName(type: CommitType): string {
  return COMMIT_TYPE_NAMES[type];
}
