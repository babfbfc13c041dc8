/**
 * CommitClassifier - maps a commit summary line to a change category.
 *
 * Only the first `:` of a summary is ever examined. Summaries whose prefix is
 * not a known commit type are uncategorised and never reach a changelog.
 *
 * @module commit_classifier
 */

import { commitTypeFromPrefix } from './commit_types';
import type { CommitType } from './commit_types';

const BREAKING_MARKER = '!:';

/**
 * Returns the commit type named by the summary's prefix, or null.
 *
 * @example
 * categorize("fix(core)!: handle empty tree");
 * // => "fix"
 * categorize("Merge branch 'main'");
 * // => null
 */
export function categorize(summary: string): CommitType | null {
  const colonPos = summary.indexOf(':');
  if (colonPos === -1) {
    return null;
  }

  let prefix = summary.slice(0, colonPos).toLowerCase();

  // "fix(core)" -> "fix"
  const parenPos = prefix.indexOf('(');
  if (parenPos !== -1) {
    prefix = prefix.slice(0, parenPos);
  }

  if (prefix.endsWith('!')) {
    prefix = prefix.slice(0, -1);
  }

  return commitTypeFromPrefix(prefix);
}

/**
 * True when a `!` sits immediately before the first colon.
 */
export function isBreaking(summary: string): boolean {
  const colonPos = summary.indexOf(':');
  if (colonPos <= 0) {
    return false;
  }
  return summary.charAt(colonPos - 1) === '!';
}

/**
 * Breaking-change heuristic for text that has already been rendered, where
 * the raw summary is no longer available on its own.
 */
export function isBreakingEntry(text: string): boolean {
  return text.includes(BREAKING_MARKER);
}
