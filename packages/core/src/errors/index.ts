export { ConfigError } from './config_error';
