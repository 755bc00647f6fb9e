import { createLogger, isLogLevel } from './logger';

describe('createLogger', () => {
  const originalLevel = process.env['LOG_LEVEL'];
  let log: jest.SpyInstance;
  let warn: jest.SpyInstance;

  beforeEach(() => {
    delete process.env['LOG_LEVEL'];
    log = jest.spyOn(console, 'log').mockImplementation();
    warn = jest.spyOn(console, 'warn').mockImplementation();
  });

  afterEach(() => {
    log.mockRestore();
    warn.mockRestore();
    if (originalLevel === undefined) {
      delete process.env['LOG_LEVEL'];
    } else {
      process.env['LOG_LEVEL'] = originalLevel;
    }
  });

  it('should prefix messages and drop those below the level', () => {
    const logger = createLogger('[Test] ', 'warn');

    logger.info('hidden');
    logger.warn('shown', 42);

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('[Test] shown', 42);
  });

  it('should stay silent by default under NODE_ENV=test', () => {
    createLogger('[Test] ').warn('hidden');

    expect(warn).not.toHaveBeenCalled();
  });

  it('should read LOG_LEVEL when no level is given', () => {
    process.env['LOG_LEVEL'] = 'debug';

    createLogger('[Test] ').debug('trace');

    expect(log).toHaveBeenCalledWith('[Test] trace');
  });

  it('should ignore an unknown LOG_LEVEL', () => {
    process.env['LOG_LEVEL'] = 'loud';

    createLogger('[Test] ').warn('hidden');

    expect(warn).not.toHaveBeenCalled();
  });
});

describe('isLogLevel', () => {
  it('should accept the five levels only', () => {
    expect(['debug', 'info', 'warn', 'error', 'silent'].every(isLogLevel)).toBe(true);
    expect(isLogLevel('trace')).toBe(false);
    expect(isLogLevel(3)).toBe(false);
  });
});
