/**
 * Semantic versions and bump rules
 *
 * @module version_calculator
 */

export { computeNext, detectSeed } from './version_calculator';

export {
  DEFAULT_SEED_VERSION,
  parseVersion,
  tryParseVersion,
  formatVersion,
  incrementVersion,
  compareVersions,
  versionsEqual,
  maxVersion,
} from './semantic_version';

export type { SemanticVersion } from './semantic_version';

export { VersionParseError } from './errors';
