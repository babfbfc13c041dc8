/**
 * MemoryConfigStore - In-memory implementation of ConfigStore
 *
 * @example
 * ```typescript
 * const configStore = new MemoryConfigStore({ follow: ['packages/core'] });
 * const manager = new ConfigManager(configStore, '/test/repo');
 * ```
 */

import type { ConfigStore } from '../config_store';

export class MemoryConfigStore implements ConfigStore {
  readonly location = 'memory://changelog.config.json';
  private config: unknown;

  constructor(config: unknown = null) {
    this.config = config;
  }

  async loadConfig(): Promise<unknown> {
    return this.config;
  }

  setConfig(config: unknown): void {
    this.config = config;
  }
}
