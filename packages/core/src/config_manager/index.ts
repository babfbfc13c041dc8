export {
  ConfigManager,
  validateConfig,
  DEFAULT_OUTPUT,
  DEFAULT_SECTION_NAME,
  DEFAULT_REMOTE,
} from './config_manager';

export { ConfigValidationError } from './errors';

export type {
  IConfigManager,
  ChangelogConfig,
  ConfigOverrides,
  ResolvedConfig,
} from './config_manager.types';
