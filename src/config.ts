import path from 'path';
import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8000),
  DB_PATH: z.string().min(1).default(path.join(__dirname, '../data/schedule.db')),
  TIMEZONE: z.string().min(1).default('UTC'),
  FETCH_CONCURRENCY: z.coerce.number().int().min(1).default(10),
  EXTRACTION_CONCURRENCY: z.coerce.number().int().min(1).default(4),
  BATCH_SIZE: z.coerce.number().int().min(1).default(5),
  CALL_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  MAX_FETCH_ATTEMPTS: z.coerce.number().int().min(1).default(3),
  BACKOFF_BASE_MS: z.coerce.number().int().min(0).default(500),
  EXTRACTION_RETRIES: z.coerce.number().int().min(0).default(1),
  DEDUP_MAX_ENTRIES: z.coerce.number().int().min(1).default(5000),
  DEDUP_MAX_AGE_DAYS: z.coerce.number().min(0).default(14),
  DEFAULT_SLOT_CAPACITY: z.coerce.number().int().min(1).default(40),
  MIN_CONFIDENCE: z.coerce.number().min(0).max(1).default(0.5),
  MARK_READ: booleanFlag.default('true'),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_MODEL: z.string().min(1).default('gpt-4o-mini'),
  GOOGLE_CREDENTIALS_PATH: z.string().min(1).default(path.join(__dirname, '../credentials.json')),
  GOOGLE_TOKENS_PATH: z.string().min(1).default(path.join(__dirname, '../data/tokens.json')),
});

export interface DedupRetention {
  maxEntriesPerIdentity: number;
  /** 0 disables age-based eviction. */
  maxAgeMs: number;
}

export interface SchedulerConfig {
  fetchConcurrency: number;
  extractionConcurrency: number;
  batchSize: number;
  callTimeoutMs: number;
  maxFetchAttempts: number;
  backoffBaseMs: number;
  extractionRetries: number;
  markRead: boolean;
}

export interface AppConfig {
  port: number;
  dbPath: string;
  timezone: string;
  scheduler: SchedulerConfig;
  dedup: DedupRetention;
  defaultSlotCapacity: number;
  minConfidence: number;
  openai: { apiKey?: string; model: string };
  google: { credentialsPath: string; tokensPath: string };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${issues.join('; ')}`);
  }
  const e = parsed.data;

  return {
    port: e.PORT,
    dbPath: e.DB_PATH,
    timezone: e.TIMEZONE,
    scheduler: {
      fetchConcurrency: e.FETCH_CONCURRENCY,
      extractionConcurrency: e.EXTRACTION_CONCURRENCY,
      batchSize: e.BATCH_SIZE,
      callTimeoutMs: e.CALL_TIMEOUT_MS,
      maxFetchAttempts: e.MAX_FETCH_ATTEMPTS,
      backoffBaseMs: e.BACKOFF_BASE_MS,
      extractionRetries: e.EXTRACTION_RETRIES,
      markRead: e.MARK_READ,
    },
    dedup: {
      maxEntriesPerIdentity: e.DEDUP_MAX_ENTRIES,
      maxAgeMs: e.DEDUP_MAX_AGE_DAYS * 24 * 60 * 60 * 1000,
    },
    defaultSlotCapacity: e.DEFAULT_SLOT_CAPACITY,
    minConfidence: e.MIN_CONFIDENCE,
    openai: { apiKey: e.OPENAI_API_KEY, model: e.OPENAI_MODEL },
    google: { credentialsPath: e.GOOGLE_CREDENTIALS_PATH, tokensPath: e.GOOGLE_TOKENS_PATH },
  };
}
