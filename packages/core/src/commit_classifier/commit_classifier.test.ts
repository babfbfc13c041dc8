import { categorize, isBreaking, isBreakingEntry } from './commit_classifier';
import {
  COMMIT_TYPES,
  commitTypeDisplayName,
  commitTypeFromDisplayName,
  commitTypeFromPrefix,
} from './commit_types';

describe('CommitClassifier', () => {
  describe('categorize', () => {
    it('should return null for summaries without a colon', () => {
      expect(categorize('Initial commit')).toBeNull();
      expect(categorize('feat add parser')).toBeNull();
      expect(categorize('')).toBeNull();
    });

    it('should map every known prefix to its commit type', () => {
      expect(categorize('add: new option')).toBe('add');
      expect(categorize('feat: parser')).toBe('feat');
      expect(categorize('refactor: split module')).toBe('refactor');
      expect(categorize('deprecated: old flag')).toBe('deprecated');
      expect(categorize('fix: off by one')).toBe('fix');
      expect(categorize('docs: readme')).toBe('docs');
      expect(categorize('test: cover parser')).toBe('test');
      expect(categorize('perf: cache lookups')).toBe('perf');
    });

    it('should match prefixes case-insensitively', () => {
      expect(categorize('FEAT: shout')).toBe('feat');
      expect(categorize('Fix: capitalised')).toBe('fix');
    });

    it('should strip a parenthesized scope', () => {
      expect(categorize('fix(core): x')).toBe('fix');
      expect(categorize('docs(api/v2): x')).toBe('docs');
    });

    it('should strip a breaking marker with and without scope', () => {
      expect(categorize('fix(core)!: x')).toBe('fix');
      expect(categorize('feat!: drop node 18')).toBe('feat');
    });

    it('should return null for unknown prefixes', () => {
      expect(categorize('chore: bump deps')).toBeNull();
      expect(categorize('style: format')).toBeNull();
      expect(categorize(': empty prefix')).toBeNull();
    });

    it('should only look at the first colon', () => {
      expect(categorize('release notes: fix: typo')).toBeNull();
      expect(categorize('fix: handle a:b pairs')).toBe('fix');
    });
  });

  describe('isBreaking', () => {
    it('should detect a bang right before the first colon', () => {
      expect(isBreaking('fix(core)!: x')).toBe(true);
      expect(isBreaking('feat!: x')).toBe(true);
    });

    it('should be false without a bang before the first colon', () => {
      expect(isBreaking('feat: x')).toBe(false);
      expect(isBreaking('feat: x!: later colon')).toBe(false);
      expect(isBreaking('no colon here!')).toBe(false);
    });

    it('should be false when the colon is the first character', () => {
      expect(isBreaking(':!')).toBe(false);
      expect(isBreaking('!:')).toBe(true);
    });
  });

  describe('isBreakingEntry', () => {
    it('should look for the bang-colon marker anywhere in the text', () => {
      expect(isBreakingEntry('feat!: x by Ada in [#abc1234](https://h/o/r/commit/abc)')).toBe(true);
      expect(isBreakingEntry('feat: x by Ada')).toBe(false);
    });
  });

  describe('commit type tables', () => {
    it('should keep the fixed declaration order', () => {
      expect(COMMIT_TYPES).toEqual(['add', 'feat', 'refactor', 'deprecated', 'fix', 'docs', 'test', 'perf']);
    });

    it('should map prefixes and display names in both directions', () => {
      for (const type of COMMIT_TYPES) {
        expect(commitTypeFromPrefix(type)).toBe(type);
        expect(commitTypeFromDisplayName(commitTypeDisplayName(type))).toBe(type);
      }
      expect(commitTypeDisplayName('deprecated')).toBe('Deprecated');
      expect(commitTypeFromDisplayName('PERF')).toBe('perf');
      expect(commitTypeFromDisplayName('Chore')).toBeNull();
      expect(commitTypeFromPrefix('Feat')).toBeNull();
    });
  });
});
