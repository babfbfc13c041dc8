/**
 * MemoryChangelogStore - In-memory implementation of ChangelogStore
 */

import type { ChangelogStore } from '../changelog_store';
import { ChangelogWriteError } from '../errors';

/**
 * @example
 * ```typescript
 * const store = new MemoryChangelogStore('# Changelog\n\n## a@v0.1.0 — 2026-01-01\n');
 * await generator.generate();
 * store.getContent();
 * ```
 */
export class MemoryChangelogStore implements ChangelogStore {
  readonly location: string;
  private content: string | null;
  private writes: string[] = [];
  private failWrites = false;

  constructor(initialContent: string | null = null, location: string = 'memory://CHANGELOG.md') {
    this.content = initialContent;
    this.location = location;
  }

  async read(): Promise<string | null> {
    return this.content;
  }

  async write(content: string): Promise<void> {
    if (this.failWrites) {
      throw new ChangelogWriteError(this.location);
    }
    this.content = content;
    this.writes.push(content);
  }

  // Test helpers

  getContent(): string | null {
    return this.content;
  }

  setContent(content: string | null): void {
    this.content = content;
  }

  getWriteCount(): number {
    return this.writes.length;
  }

  /** Makes every following write fail with ChangelogWriteError */
  setFailWrites(fail: boolean): void {
    this.failWrites = fail;
  }
}
