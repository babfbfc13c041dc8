/**
 * Commit classification
 *
 * @module commit_classifier
 */

export { categorize, isBreaking, isBreakingEntry } from './commit_classifier';

export {
  COMMIT_TYPES,
  COMMIT_TYPE_NAMES,
  commitTypeFromPrefix,
  commitTypeFromDisplayName,
  commitTypeDisplayName,
} from './commit_types';

export type { CommitType } from './commit_types';
