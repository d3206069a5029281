#!/usr/bin/env node
import 'dotenv/config';
import { createPipeline } from './bootstrap';
import { loadConfig } from './config';
import { DatabaseManager } from './database';
import { errorMessage, logError } from './logger';

// Runs a single reconciliation pass and prints its report.
async function main(): Promise<number> {
  const config = loadConfig();
  const db = new DatabaseManager(config.dbPath);
  try {
    const pipeline = createPipeline(config, db);
    process.once('SIGINT', () => pipeline.cancel());
    const report = await pipeline.run();
    process.stdout.write(`${JSON.stringify(report, null, 2)}\n`);
    return report.status === 'completed' ? 0 : 1;
  } finally {
    db.close();
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    logError('Reconciliation pass failed', { error: errorMessage(error) });
    process.exitCode = 1;
  }
);
