export { createLogger, setLogLevel, getLogLevel, logger } from './logger';
export type { Logger, LogLevel } from './logger';
