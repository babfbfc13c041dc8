import { createLogger, getLogLevel, setLogLevel } from './logger';

describe('Logger', () => {
  const mockConsoleLog = jest.spyOn(console, 'log').mockImplementation();
  const mockConsoleWarn = jest.spyOn(console, 'warn').mockImplementation();
  const mockConsoleError = jest.spyOn(console, 'error').mockImplementation();

  beforeEach(() => {
    jest.clearAllMocks();
  });

  afterEach(() => {
    setLogLevel('silent');
  });

  it('should be silent under tests by default', () => {
    expect(getLogLevel()).toBe('silent');

    createLogger('[Test] ').error('nothing');

    expect(mockConsoleError).not.toHaveBeenCalled();
  });

  it('should prefix messages and pass extra arguments', () => {
    const logger = createLogger('[Test] ', 'debug');

    logger.debug('value', 42);
    logger.warn('careful');

    expect(mockConsoleLog).toHaveBeenCalledWith('[Test] value', 42);
    expect(mockConsoleWarn).toHaveBeenCalledWith('[Test] careful');
  });

  it('should apply the global level to existing loggers', () => {
    const logger = createLogger('[Test] ');

    setLogLevel('info');
    logger.debug('hidden');
    logger.info('shown');

    expect(mockConsoleLog).toHaveBeenCalledTimes(1);
    expect(mockConsoleLog).toHaveBeenCalledWith('[Test] shown');
  });

  it('should let an explicit level win over the global one', () => {
    const logger = createLogger('[Test] ', 'error');

    setLogLevel('debug');
    logger.info('hidden');
    logger.error('shown');

    expect(mockConsoleLog).not.toHaveBeenCalled();
    expect(mockConsoleError).toHaveBeenCalledWith('[Test] shown');
  });
});
