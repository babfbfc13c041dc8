/**
 * VersionCalculator - semantic version bumps derived from commit categories
 *
 * @module version_calculator
 */

import type { CommitType } from '../commit_classifier';
import { createLogger } from '../logger/logger';
import { DEFAULT_SEED_VERSION, incrementVersion, maxVersion, parseVersion } from './semantic_version';
import type { SemanticVersion } from './semantic_version';
import { VersionParseError } from './errors';

const logger = createLogger('[VersionCalculator] ');

const MINOR_TYPES: ReadonlySet<CommitType> = new Set<CommitType>(['feat', 'add']);
const PATCH_TYPES: ReadonlySet<CommitType> = new Set<CommitType>(['fix', 'perf', 'refactor']);

/**
 * Computes the version that follows `base`.
 *
 * First matching rule wins:
 * 1. breaking change: next major
 * 2. feat or add present: next minor
 * 3. fix, perf or refactor present: next patch
 * 4. anything else (docs, test, deprecated): unchanged
 *
 * @example
 * computeNext({ major: 1, minor: 2, patch: 3 }, new Set(['feat']), false);
 * // => { major: 1, minor: 3, patch: 0 }
 */
export function computeNext(
  base: SemanticVersion,
  categories: Iterable<CommitType>,
  hasBreakingChange: boolean
): SemanticVersion {
  if (hasBreakingChange) {
    return incrementVersion(base, 'major');
  }

  const present = new Set(categories);

  if ([...MINOR_TYPES].some((type) => present.has(type))) {
    return incrementVersion(base, 'minor');
  }

  if ([...PATCH_TYPES].some((type) => present.has(type))) {
    return incrementVersion(base, 'patch');
  }

  return { ...base };
}

/**
 * Highest version among `v?MAJOR.MINOR.PATCH` tags. Tags that do not parse are
 * skipped. Falls back to 0.1.0 when nothing parses.
 */
export function detectSeed(tags: Iterable<string>): SemanticVersion {
  const versions: SemanticVersion[] = [];

  for (const tag of tags) {
    try {
      versions.push(parseVersion(tag));
    } catch (error) {
      if (!(error instanceof VersionParseError)) {
        throw error;
      }
      logger.debug(`Skipping tag "${tag}": not a semantic version`);
    }
  }

  return maxVersion(versions) ?? { ...DEFAULT_SEED_VERSION };
}
