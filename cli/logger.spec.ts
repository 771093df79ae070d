import { createLogger } from './logger';

describe('Logger', () => {
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    errorSpy.mockRestore();
  });

  test('formats level, context and data without colors', () => {
    const logger = createLogger('decicalc', { colors: false });

    expect(logger.format('info', 'ready', { prompt: '> ' })).toBe(
      '[info] (decicalc) ready {"prompt":"> "}'
    );
  });

  test('drops messages below the configured level', () => {
    const logger = createLogger('decicalc', { level: 'warn', colors: false });

    logger.info('hidden');
    logger.warn('shown');

    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledWith('[warn] (decicalc) shown');
  });

  test('child loggers extend the context', () => {
    const logger = createLogger('decicalc', { level: 'debug', colors: false });

    logger.child('repl').debug('evaluated');

    expect(errorSpy).toHaveBeenCalledWith('[debug] (decicalc:repl) evaluated');
  });

  test('a silent logger writes nothing', () => {
    const logger = createLogger('decicalc', { silent: true });

    logger.error('nothing');

    expect(errorSpy).not.toHaveBeenCalled();
  });
});
