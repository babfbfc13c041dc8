/**
 * FsConfigStore - Filesystem implementation of ConfigStore
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import type { ConfigStore } from '../config_store';
import { ConfigValidationError } from '../../config_manager/errors';

export const CONFIG_FILE_NAME = 'changelog.config.json';

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Filesystem-based ConfigStore implementation.
 *
 * A missing file is not an error: generation runs on defaults.
 *
 * @example
 * ```typescript
 * const store = FsConfigStore.forRepository('/path/to/repo');
 * const raw = await store.loadConfig();
 * ```
 */
export class FsConfigStore implements ConfigStore {
  readonly location: string;

  constructor(configPath: string) {
    this.location = path.resolve(configPath);
  }

  static forRepository(repoRoot: string): FsConfigStore {
    return new FsConfigStore(path.join(repoRoot, CONFIG_FILE_NAME));
  }

  async loadConfig(): Promise<unknown> {
    let content: string;
    try {
      content = await fs.readFile(this.location, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }

    try {
      const parsed: unknown = JSON.parse(content);
      return parsed;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigValidationError(this.location, [`not valid JSON (${reason})`]);
    }
  }
}
