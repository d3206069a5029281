import path from 'path';
import OpenAI from 'openai';
import { AppConfig } from './config';
import { loadClientSecrets, TokenFileCredentialStore } from './credentials';
import { DatabaseManager, readWeeklySlotTemplate } from './database';
import { DeduplicationCache } from './dedup-cache';
import { createOpenAICompletionClient, LlmEventExtractor } from './extractor';
import { GmailMessageSource } from './gmail-client';
import { logInfo } from './logger';
import { ReconciliationPipeline } from './pipeline';
import { ReconciliationEngine } from './reconciliation';
import { BoundedFetchScheduler } from './scheduler';
import { SlotAllocator } from './slot-allocator';
import { EventExtractor, MessageSource } from './types';

export const WEEKLY_SLOTS_PATH = path.join(__dirname, '../data/weekly-slots.json');

export interface PipelineOverrides {
  source?: MessageSource;
  extractor?: EventExtractor;
  cache?: DeduplicationCache;
}

/** Builds the production pipeline, taking stand-ins for any external capability. */
export function createPipeline(
  config: AppConfig,
  db: DatabaseManager,
  overrides: PipelineOverrides = {}
): ReconciliationPipeline {
  const seeded = db.seedWeeklySlots(readWeeklySlotTemplate(WEEKLY_SLOTS_PATH));
  if (seeded > 0) {
    logInfo('Seeded weekly slots', { count: seeded });
  }

  const source =
    overrides.source ??
    new GmailMessageSource(
      loadClientSecrets(config.google.credentialsPath),
      new TokenFileCredentialStore(config.google.tokensPath)
    );

  const extractor = overrides.extractor ?? createLlmExtractor(config);

  const allocator = new SlotAllocator({
    timezone: config.timezone,
    defaultCapacity: config.defaultSlotCapacity,
  });
  const engine = new ReconciliationEngine(db, allocator, { timezone: config.timezone });

  const cache = overrides.cache ?? new DeduplicationCache(config.dedup);
  const scheduler = new BoundedFetchScheduler({
    source,
    cache,
    extractor,
    reconcile: (message, event) => engine.reconcile(message, event),
    config: config.scheduler,
  });

  return new ReconciliationPipeline({ gateway: db, source, cache, scheduler, config: config.scheduler });
}

function createLlmExtractor(config: AppConfig): LlmEventExtractor {
  if (!config.openai.apiKey) {
    throw new Error('OPENAI_API_KEY is required for event extraction');
  }
  const client = createOpenAICompletionClient(new OpenAI({ apiKey: config.openai.apiKey }), config.openai.model);
  return new LlmEventExtractor(client, {
    timezone: config.timezone,
    minConfidence: config.minConfidence,
  });
}
