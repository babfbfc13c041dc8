/**
 * FsChangelogStore - Filesystem implementation of ChangelogStore
 *
 * The file is opened in truncate mode on write; there is no atomic rename, so
 * an interrupted write can leave a partial file.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import type { ChangelogStore } from '../changelog_store';
import { ChangelogWriteError } from '../errors';

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * @example
 * ```typescript
 * const store = new FsChangelogStore('/path/to/repo/CHANGELOG.md');
 * const existing = await store.read(); // null on first run
 * await store.write('# Changelog\n\n');
 * ```
 */
export class FsChangelogStore implements ChangelogStore {
  readonly location: string;

  constructor(filePath: string) {
    this.location = path.resolve(filePath);
  }

  /**
   * Returns null for a missing file. Any other read failure propagates.
   */
  async read(): Promise<string | null> {
    try {
      return await fs.readFile(this.location, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }
  }

  async write(content: string): Promise<void> {
    try {
      await fs.writeFile(this.location, content, { encoding: 'utf-8', flag: 'w' });
    } catch (error) {
      throw new ChangelogWriteError(this.location, error);
    }
  }
}
