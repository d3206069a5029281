import { SchedulerConfig } from './config';
import { Notifier, Semaphore, withPermitAndDeadline } from './concurrency';
import { DeduplicationCache } from './dedup-cache';
import { ExtractionFailure, PersistenceUnavailableError, TransientFetchError } from './errors';
import { errorMessage, logError, logInfo, logWarn } from './logger';
import { IdentityPriorityQueue } from './priority-queue';
import {
  EventExtractor,
  Identity,
  IdentityReport,
  MessageRef,
  MessageReport,
  MessageSource,
  OutcomeKind,
  RawMessage,
  ReconciliationOutcome,
  ScheduleEvent,
} from './types';

export type ReconcileFn = (message: RawMessage, event: ScheduleEvent) => Promise<ReconciliationOutcome>;

export interface SchedulerDeps {
  source: MessageSource;
  cache: DeduplicationCache;
  extractor: EventExtractor;
  reconcile: ReconcileFn;
  config: SchedulerConfig;
}

export type SchedulerStatus = 'completed' | 'cancelled' | 'halted';

export interface SchedulerResult {
  status: SchedulerStatus;
  identities: IdentityReport[];
  totals: Record<OutcomeKind, number>;
  haltReason?: string;
}

export function emptyTotals(): Record<OutcomeKind, number> {
  return {
    interview_recorded: 0,
    class_rescheduled: 0,
    no_slot: 0,
    duplicate: 0,
    unknown_subject: 0,
    no_event: 0,
  };
}

function byReceivedAt(a: MessageRef, b: MessageRef): number {
  return a.receivedAt.localeCompare(b.receivedAt);
}

interface FetchResult {
  listed: number;
  duplicates: number;
  fresh: RawMessage[];
}

/** Mutable bookkeeping for one `run` call. */
class RunContext {
  inFlight = 0;
  haltReason: string | undefined;
  readonly wake = new Notifier();
  readonly reports = new Map<string, IdentityReport>();
  /** Score each identity had when dequeued; a failed fetch re-queues with it. */
  readonly scores = new Map<string, number>();
  readonly retryTimers = new Map<string, NodeJS.Timeout>();
  readonly totals = emptyTotals();

  constructor(
    readonly queue: IdentityPriorityQueue,
    readonly signal: AbortSignal | undefined
  ) {}

  get cancelled(): boolean {
    return this.signal?.aborted ?? false;
  }

  get stopped(): boolean {
    return this.cancelled || this.haltReason !== undefined;
  }

  get idle(): boolean {
    return this.inFlight === 0 && this.retryTimers.size === 0;
  }

  reportFor(identity: Identity): IdentityReport {
    let report = this.reports.get(identity.studentId);
    if (!report) {
      report = {
        studentId: identity.studentId,
        status: 'skipped',
        attempts: 0,
        fetched: 0,
        duplicates: 0,
        extracted: 0,
        messages: [],
      };
      this.reports.set(identity.studentId, report);
    }
    return report;
  }

  halt(reason: string): void {
    if (this.haltReason === undefined) {
      this.haltReason = reason;
      logError('Persistence unavailable, halting run', { reason });
    }
    this.stopRetries();
    this.wake.notifyAll();
  }

  stopRetries(): void {
    for (const [studentId, timer] of this.retryTimers) {
      clearTimeout(timer);
      const report = this.reports.get(studentId);
      if (report) {
        report.status = 'failed';
        report.error = report.error ?? 'run stopped before retry';
      }
    }
    this.retryTimers.clear();
  }
}

/**
 * Drives `fetchConcurrency` workers over a priority queue of identities.
 * Mailbox sessions and extraction calls each run under their own semaphore.
 * A call that misses its deadline keeps its permit until it settles, so
 * neither cap is exceeded by abandoned calls.
 */
export class BoundedFetchScheduler {
  private readonly sessionSlots: Semaphore;
  private readonly extractionSlots: Semaphore;

  constructor(private readonly deps: SchedulerDeps) {
    this.sessionSlots = new Semaphore(deps.config.fetchConcurrency);
    this.extractionSlots = new Semaphore(deps.config.extractionConcurrency);
  }

  async run(queue: IdentityPriorityQueue, signal?: AbortSignal): Promise<SchedulerResult> {
    const run = new RunContext(queue, signal);
    const onAbort = (): void => {
      logWarn('Run cancelled, finishing in-flight batches');
      run.stopRetries();
      run.wake.notifyAll();
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const workers = Array.from({ length: this.deps.config.fetchConcurrency }, () => this.worker(run));
      await Promise.all(workers);
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }

    // identities never reached because the run stopped early
    for (let identity = queue.popHighest(); identity; identity = queue.popHighest()) {
      run.reportFor(identity);
    }

    const status: SchedulerStatus =
      run.haltReason !== undefined ? 'halted' : run.cancelled ? 'cancelled' : 'completed';
    return {
      status,
      identities: Array.from(run.reports.values()),
      totals: run.totals,
      ...(run.haltReason !== undefined ? { haltReason: run.haltReason } : {}),
    };
  }

  private async worker(run: RunContext): Promise<void> {
    for (;;) {
      if (run.stopped) return;

      const entry = run.queue.popHighestEntry();
      if (!entry) {
        if (run.idle) {
          run.wake.notifyAll();
          return;
        }
        await run.wake.wait();
        continue;
      }

      const { identity } = entry;
      run.scores.set(identity.studentId, entry.score);
      run.inFlight += 1;
      try {
        await this.processIdentity(run, identity);
      } catch (error) {
        // anything escaping processIdentity is a bug in this module, not a mailbox problem
        const report = run.reportFor(identity);
        report.status = 'failed';
        report.error = errorMessage(error);
        logError('Identity processing crashed', { studentId: identity.studentId, error: report.error });
      } finally {
        run.inFlight -= 1;
        run.wake.notifyAll();
      }
    }
  }

  private async processIdentity(run: RunContext, identity: Identity): Promise<void> {
    const { cache, config } = this.deps;
    const report = run.reportFor(identity);
    report.attempts += 1;

    let fetched: FetchResult;
    try {
      fetched = await this.fetchUnread(identity);
    } catch (error) {
      this.handleFetchFailure(run, identity, report, error);
      return;
    }

    report.fetched = fetched.listed;
    report.duplicates = fetched.duplicates;
    report.error = undefined;
    const fresh = fetched.fresh;

    const withEvents: RawMessage[] = [];
    for (let offset = 0; offset < fresh.length; offset += config.batchSize) {
      if (run.stopped) {
        logInfo('Stopping identity at batch boundary', {
          studentId: identity.studentId,
          remaining: fresh.length - offset,
        });
        break;
      }

      const batch = fresh.slice(offset, offset + config.batchSize);
      const events = await this.extractBatch(batch);
      report.extracted += batch.length;

      for (let i = 0; i < batch.length; i += 1) {
        const message = batch[i];
        const event = events[i];
        const entry: MessageReport = {
          fingerprint: message.fingerprint,
          receivedAt: message.receivedAt,
          event: event.kind,
        };
        report.messages.push(entry);

        if (run.haltReason !== undefined) {
          entry.error = 'run halted before reconciliation';
          continue;
        }

        // remembered only once its writes settle; a halt leaves it unknown
        try {
          const outcome = await this.deps.reconcile(message, event);
          entry.outcome = outcome.kind;
          run.totals[outcome.kind] += 1;
          cache.mark(identity.studentId, message.fingerprint);
          if (event.kind !== 'none') withEvents.push(message);
        } catch (error) {
          entry.error = errorMessage(error);
          if (error instanceof PersistenceUnavailableError) {
            run.halt(entry.error);
          } else {
            cache.mark(identity.studentId, message.fingerprint);
            logError('Reconciliation failed for message', {
              studentId: identity.studentId,
              fingerprint: message.fingerprint,
              error: entry.error,
            });
          }
        }
      }
    }

    if (run.haltReason !== undefined) {
      report.status = 'failed';
      report.error = `run halted: ${run.haltReason}`;
      return;
    }

    report.status = 'succeeded';
    if (config.markRead && withEvents.length > 0) {
      await this.acknowledge(identity, withEvents);
    }
  }

  private handleFetchFailure(run: RunContext, identity: Identity, report: IdentityReport, error: unknown): void {
    const failure =
      error instanceof TransientFetchError
        ? error
        : new TransientFetchError(`Fetch failed for ${identity.studentId}: ${errorMessage(error)}`, { cause: error });
    report.error = failure.message;

    const { maxFetchAttempts, backoffBaseMs } = this.deps.config;
    if (report.attempts >= maxFetchAttempts || run.stopped) {
      report.status = 'failed';
      logWarn('Giving up on identity', { studentId: identity.studentId, attempts: report.attempts, error: failure.message });
      return;
    }

    const delay = backoffBaseMs * 2 ** (report.attempts - 1);
    logWarn('Fetch failed, re-queueing with backoff', {
      studentId: identity.studentId,
      attempt: report.attempts,
      delayMs: delay,
      error: failure.message,
    });

    const timer = setTimeout(() => {
      run.retryTimers.delete(identity.studentId);
      if (!run.stopped) {
        run.queue.updateScore(identity, run.scores.get(identity.studentId) ?? 1);
      }
      run.wake.notifyAll();
    }, delay);
    run.retryTimers.set(identity.studentId, timer);
  }

  /**
   * Lists unread references, drops the ones already seen (in the cache or
   * earlier in this listing) and downloads only the rest, oldest first.
   */
  private async fetchUnread(identity: Identity): Promise<FetchResult> {
    const { source, cache, config } = this.deps;
    return withPermitAndDeadline(this.sessionSlots, `fetch ${identity.studentId}`, config.callTimeoutMs, async (signal) => {
      const session = await source.connect(identity, signal);
      try {
        const refs = await session.listUnread(signal);
        const wanted: MessageRef[] = [];
        const inThisFetch = new Set<string>();
        for (const ref of [...refs].sort(byReceivedAt)) {
          if (inThisFetch.has(ref.fingerprint) || cache.seen(identity.studentId, ref.fingerprint)) continue;
          inThisFetch.add(ref.fingerprint);
          wanted.push(ref);
        }

        const fresh = wanted.length > 0 ? await session.fetchMessages(wanted, signal) : [];
        return { listed: refs.length, duplicates: refs.length - wanted.length, fresh: fresh.sort(byReceivedAt) };
      } finally {
        await session.close();
      }
    });
  }

  private async acknowledge(identity: Identity, messages: RawMessage[]): Promise<void> {
    const { source, config } = this.deps;
    try {
      await withPermitAndDeadline(this.sessionSlots, `mark read ${identity.studentId}`, config.callTimeoutMs, async (signal) => {
        const session = await source.connect(identity, signal);
        try {
          for (const message of messages) {
            await session.markRead(message, signal);
          }
        } finally {
          await session.close();
        }
      });
    } catch (error) {
      logWarn('Could not mark messages read', { studentId: identity.studentId, error: errorMessage(error) });
    }
  }

  private async extractBatch(batch: RawMessage[]): Promise<ScheduleEvent[]> {
    const { extractionRetries } = this.deps.config;
    for (let attempt = 0; attempt <= extractionRetries; attempt += 1) {
      try {
        return await this.extractOnce(batch);
      } catch (error) {
        logWarn('Extraction batch failed', { size: batch.length, attempt: attempt + 1, error: errorMessage(error) });
      }
    }

    if (batch.length === 1) {
      return [{ kind: 'none', reason: 'extraction failed' }];
    }

    // one bad message must not cost the rest of its batch
    const events: ScheduleEvent[] = [];
    for (const message of batch) {
      try {
        const [event] = await this.extractOnce([message]);
        events.push(event);
      } catch (error) {
        logWarn('Extraction failed for message', { fingerprint: message.fingerprint, error: errorMessage(error) });
        events.push({ kind: 'none', reason: 'extraction failed' });
      }
    }
    return events;
  }

  private async extractOnce(batch: RawMessage[]): Promise<ScheduleEvent[]> {
    const { extractor, config } = this.deps;
    const events = await withPermitAndDeadline(this.extractionSlots, 'extraction', config.callTimeoutMs, (signal) =>
      extractor.extract(batch, signal)
    );
    if (events.length !== batch.length) {
      throw new ExtractionFailure(`Extractor returned ${events.length} results for ${batch.length} messages`);
    }
    return events;
  }
}
