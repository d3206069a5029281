import { loadConfig } from './config';

describe('loadConfig', () => {
  it('should apply defaults', () => {
    const config = loadConfig({});

    expect(config.port).toBe(8000);
    expect(config.timezone).toBe('UTC');
    expect(config.scheduler).toEqual({
      fetchConcurrency: 10,
      extractionConcurrency: 4,
      batchSize: 5,
      callTimeoutMs: 30000,
      maxFetchAttempts: 3,
      backoffBaseMs: 500,
      extractionRetries: 1,
      markRead: true,
    });
    expect(config.dedup).toEqual({ maxEntriesPerIdentity: 5000, maxAgeMs: 14 * 24 * 60 * 60 * 1000 });
    expect(config.defaultSlotCapacity).toBe(40);
    expect(config.minConfidence).toBe(0.5);
    expect(config.openai).toEqual({ apiKey: undefined, model: 'gpt-4o-mini' });
  });

  it('should coerce values from the environment', () => {
    const config = loadConfig({
      PORT: '9100',
      BATCH_SIZE: '3',
      MARK_READ: 'false',
      DEDUP_MAX_AGE_DAYS: '0',
      OPENAI_API_KEY: 'test-secret',
    });

    expect(config.port).toBe(9100);
    expect(config.scheduler.batchSize).toBe(3);
    expect(config.scheduler.markRead).toBe(false);
    expect(config.dedup.maxAgeMs).toBe(0);
    expect(config.openai.apiKey).toBe('test-secret');
  });

  it('should reject invalid values', () => {
    expect(() => loadConfig({ FETCH_CONCURRENCY: '0' })).toThrow('Invalid configuration: FETCH_CONCURRENCY');
    expect(() => loadConfig({ MARK_READ: 'maybe' })).toThrow('Invalid configuration: MARK_READ');
  });
});
