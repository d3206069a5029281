import { createPipeline } from './bootstrap';
import { AppConfig, loadConfig } from './config';
import { DatabaseManager } from './database';
import { DeduplicationCache } from './dedup-cache';
import { PipelineBusyError, ReconciliationPipeline } from './pipeline';
import { FakeMessageSource, makeMessage, ScriptedExtractor, seedCampus } from './testing';
import { RawMessage, ScheduleEvent } from './types';

function interviewFor(message: RawMessage): ScheduleEvent {
  return message.subject === 'Interview at Acme'
    ? { kind: 'interview', company: 'Acme Corp', datetime: '2024-05-06T10:00:00Z', stage: 'OA', confidence: 0.9 }
    : { kind: 'none' };
}

function at(minute: number): string {
  return new Date(Date.UTC(2024, 4, 1, 8, minute)).toISOString();
}

describe('ReconciliationPipeline', () => {
  let config: AppConfig;
  let db: DatabaseManager;
  let source: FakeMessageSource;
  let pipeline: ReconciliationPipeline;

  beforeEach(() => {
    config = loadConfig({ TIMEZONE: 'UTC', FETCH_CONCURRENCY: '2', BACKOFF_BASE_MS: '5' });
    db = new DatabaseManager(':memory:');
    seedCampus(db);
    source = new FakeMessageSource();
    pipeline = createPipeline(config, db, { source, extractor: new ScriptedExtractor(interviewFor) });
  });

  afterEach(() => {
    db.close();
  });

  it('should run every identity with unread mail and skip the rest', async () => {
    source.deliver(makeMessage('s1', { subject: 'Interview at Acme' }));
    source.deliver(makeMessage('s2'));

    const report = await pipeline.run();

    expect(report.status).toBe('completed');
    expect(report.completedAt).not.toBeNull();
    expect(report.totals).toEqual({
      interview_recorded: 1,
      class_rescheduled: 0,
      no_slot: 0,
      duplicate: 0,
      unknown_subject: 0,
      no_event: 1,
    });
    expect(report.identities.map((r) => [r.studentId, r.status])).toEqual([
      ['s1', 'succeeded'],
      ['s2', 'succeeded'],
      ['s3', 'skipped'],
    ]);
    expect(pipeline.getLastReport()).toBe(report);
    expect(pipeline.isRunning()).toBe(false);
  });

  it('should still queue an identity whose mailbox cannot be counted', async () => {
    source.deliver(makeMessage('s1'));
    // only the counting connect fails; the worker's fetch gets through
    source.failures.set('s2', 1);

    const report = await pipeline.run();

    expect(report.identities.map((r) => [r.studentId, r.status])).toEqual([
      ['s1', 'succeeded'],
      ['s2', 'succeeded'],
      ['s3', 'skipped'],
    ]);
    expect(report.identities[1]).toMatchObject({ fetched: 0, attempts: 1 });
  });

  it('should rank identities by unseen mail rather than by known backlog', async () => {
    const cache = new DeduplicationCache({ maxEntriesPerIdentity: 100, maxAgeMs: 0 });
    for (const n of [1, 2, 3]) {
      const known = makeMessage('s1', { sourceId: `old-${n}`, receivedAt: at(n) });
      source.deliver(known);
      cache.mark('s1', known.fingerprint);
    }
    source.deliver(makeMessage('s1', { sourceId: 'new-1', receivedAt: at(4) }));
    source.deliver(makeMessage('s2', { sourceId: 'new-2', receivedAt: at(5) }));
    source.deliver(makeMessage('s2', { sourceId: 'new-3', receivedAt: at(6) }));
    const extractor = new ScriptedExtractor(interviewFor);
    const serial = createPipeline(loadConfig({ TIMEZONE: 'UTC', FETCH_CONCURRENCY: '1' }), db, { source, extractor, cache });

    const report = await serial.run();

    expect(extractor.batches).toEqual([['new-2', 'new-3'], ['new-1']]);
    expect(report.identities.map((r) => [r.studentId, r.status])).toEqual([
      ['s2', 'succeeded'],
      ['s1', 'succeeded'],
      ['s3', 'skipped'],
    ]);
    expect(source.downloaded).toEqual(['new-2', 'new-3', 'new-1']);
  });

  it('should refuse to start a second run while one is in progress', async () => {
    let release: (value: void) => void = () => undefined;
    source.gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    source.deliver(makeMessage('s1'));

    const first = pipeline.start();
    expect(first.status).toBe('running');
    expect(() => pipeline.start()).toThrow(PipelineBusyError);
    expect(pipeline.getStatus()?.runId).toBe(first.runId);

    release();
    const finished = await pipeline.waitForCurrent();
    expect(finished.runId).toBe(first.runId);
    expect(finished.status).toBe('completed');
  });

  it('should report a cancelled run', async () => {
    let release: (value: void) => void = () => undefined;
    source.gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    source.deliver(makeMessage('s1'));
    source.deliver(makeMessage('s2'));

    pipeline.start();
    const done = pipeline.waitForCurrent();
    expect(pipeline.cancel()).toBe(true);
    release();

    expect((await done).status).toBe('cancelled');
    expect(pipeline.cancel()).toBe(false);
  });

  it('should end in error when identities cannot be loaded', async () => {
    const broken = new DatabaseManager(':memory:');
    const failing = createPipeline(config, broken, { source, extractor: new ScriptedExtractor(interviewFor) });
    broken.close();

    const report = await failing.run();

    expect(report.status).toBe('error');
    expect(report.message).toBe('Database connection is closed');
  });
});
