import { errorMessage, logDebug, logError, logInfo } from './logger';

describe('logger', () => {
  const original = process.env.LOG_LEVEL;
  let out: jest.SpyInstance;
  let err: jest.SpyInstance;

  beforeEach(() => {
    out = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    err = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
    if (original === undefined) {
      delete process.env.LOG_LEVEL;
    } else {
      process.env.LOG_LEVEL = original;
    }
  });

  it('should write one JSON line with the metadata merged in', () => {
    process.env.LOG_LEVEL = 'info';

    logInfo('Run started', { runId: 'r1' });

    expect(out).toHaveBeenCalledTimes(1);
    const entry = JSON.parse(out.mock.calls[0][0]);
    expect(entry).toMatchObject({ level: 'info', message: 'Run started', runId: 'r1' });
    expect(typeof entry.ts).toBe('string');
  });

  it('should send errors to stderr', () => {
    process.env.LOG_LEVEL = 'info';

    logError('boom');

    expect(out).not.toHaveBeenCalled();
    expect(err).toHaveBeenCalledTimes(1);
  });

  it('should drop entries below the configured level', () => {
    process.env.LOG_LEVEL = 'warn';

    logDebug('noise');
    logInfo('noise');

    expect(out).not.toHaveBeenCalled();
  });

  it('should stay quiet when silenced', () => {
    process.env.LOG_LEVEL = 'silent';

    logError('boom');

    expect(err).not.toHaveBeenCalled();
  });

  it('should describe unknown thrown values', () => {
    expect(errorMessage(new Error('bad'))).toBe('bad');
    expect(errorMessage('plain')).toBe('plain');
  });
});
