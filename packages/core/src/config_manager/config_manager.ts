/**
 * ConfigManager - Changelog generation settings
 *
 * Reads changelog.config.json through a ConfigStore, validates it against the
 * JSON schema and merges it with command-line overrides.
 *
 * Precedence: override > config file > default.
 */

import * as path from 'path';
import Ajv from 'ajv';
import type { ValidateFunction } from 'ajv';
import configSchema from './changelog_config.schema.json';
import type { ConfigStore } from '../config_store/config_store';
import { ConfigValidationError } from './errors';
import type {
  IConfigManager,
  ChangelogConfig,
  ConfigOverrides,
  ResolvedConfig,
} from './config_manager.types';

export const DEFAULT_OUTPUT = 'CHANGELOG.md';
export const DEFAULT_SECTION_NAME = 'All Changes';
export const DEFAULT_REMOTE = 'origin';

let validator: ValidateFunction<ChangelogConfig> | null = null;

function getValidator(): ValidateFunction<ChangelogConfig> {
  if (!validator) {
    const ajv = new Ajv({ allErrors: true });
    validator = ajv.compile<ChangelogConfig>(configSchema);
  }
  return validator;
}

/**
 * Validates raw config data.
 *
 * @throws ConfigValidationError listing every schema violation
 */
export function validateConfig(data: unknown, source: string): ChangelogConfig {
  const validate = getValidator();
  if (validate(data)) {
    return data;
  }
  const details = (validate.errors ?? []).map(
    (error) => `${error.instancePath || '/'} ${error.message ?? 'is invalid'}`
  );
  throw new ConfigValidationError(source, details);
}

/**
 * @example
 * ```typescript
 * // Production usage
 * import { FsConfigStore } from '@changelog-gen/core/fs';
 * const manager = new ConfigManager(new FsConfigStore('/repo/changelog.config.json'), '/repo');
 *
 * // Test usage
 * import { MemoryConfigStore } from '@changelog-gen/core/memory';
 * const manager = new ConfigManager(new MemoryConfigStore({ follow: ['src'] }), '/repo');
 * ```
 */
export class ConfigManager implements IConfigManager {
  private readonly configStore: ConfigStore;
  private readonly repoRoot: string;

  constructor(configStore: ConfigStore, repoRoot: string) {
    this.configStore = configStore;
    this.repoRoot = repoRoot;
  }

  async loadConfig(): Promise<ChangelogConfig | null> {
    const raw = await this.configStore.loadConfig();
    if (raw === null) {
      return null;
    }
    return validateConfig(raw, this.configStore.location);
  }

  async resolve(overrides: ConfigOverrides = {}): Promise<ResolvedConfig> {
    const config = (await this.loadConfig()) ?? {};

    let output: string;
    if (overrides.output) {
      output = path.resolve(overrides.output);
    } else {
      output = path.resolve(this.repoRoot, config.output ?? DEFAULT_OUTPUT);
    }

    const follow = overrides.follow && overrides.follow.length > 0
      ? overrides.follow
      : config.follow ?? [];

    return {
      output,
      url: overrides.url || config.url,
      remote: overrides.remote || config.remote || DEFAULT_REMOTE,
      follow: [...follow],
      sectionName: overrides.sectionName || config.sectionName || DEFAULT_SECTION_NAME,
    };
  }
}
