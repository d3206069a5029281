import crypto from 'crypto';
import { SchedulerConfig } from './config';
import { Semaphore, withPermitAndDeadline } from './concurrency';
import { DeduplicationCache } from './dedup-cache';
import { errorMessage, logError, logInfo, logWarn } from './logger';
import { IdentityPriorityQueue } from './priority-queue';
import { BoundedFetchScheduler, emptyTotals } from './scheduler';
import { Identity, IdentityReport, MessageSource, PersistenceGateway, RunReport } from './types';

export interface PipelineDeps {
  gateway: PersistenceGateway;
  source: MessageSource;
  cache: DeduplicationCache;
  scheduler: BoundedFetchScheduler;
  config: SchedulerConfig;
}

export class PipelineBusyError extends Error {
  constructor(readonly runId: string) {
    super(`Run ${runId} is still in progress`);
    this.name = 'PipelineBusyError';
  }
}

function skippedReport(studentId: string): IdentityReport {
  return { studentId, status: 'skipped', attempts: 0, fetched: 0, duplicates: 0, extracted: 0, messages: [] };
}

/**
 * One reconciliation pass at a time: load identities, seed the priority
 * queue with counts of unseen unread mail, let the scheduler drain it. Keeps the running
 * report and the last finished one for the control API.
 */
export class ReconciliationPipeline {
  private current: { report: RunReport; controller: AbortController; done: Promise<RunReport> } | null = null;
  private lastReport: RunReport | null = null;

  constructor(private readonly deps: PipelineDeps) {}

  isRunning(): boolean {
    return this.current !== null;
  }

  getStatus(): RunReport | null {
    return this.current ? { ...this.current.report } : this.lastReport;
  }

  getLastReport(): RunReport | null {
    return this.lastReport;
  }

  /** Starts a run in the background and returns its initial report. */
  start(): RunReport {
    if (this.current) {
      throw new PipelineBusyError(this.current.report.runId);
    }

    const controller = new AbortController();
    const report: RunReport = {
      runId: crypto.randomUUID(),
      status: 'running',
      startedAt: new Date().toISOString(),
      completedAt: null,
      identities: [],
      totals: emptyTotals(),
    };

    const done = this.execute(report, controller.signal).finally(() => {
      this.lastReport = report;
      this.current = null;
    });
    this.current = { report, controller, done };
    return { ...report };
  }

  /** Runs a pass to completion. */
  async run(): Promise<RunReport> {
    this.start();
    return this.waitForCurrent();
  }

  async waitForCurrent(): Promise<RunReport> {
    if (!this.current) {
      throw new Error('No run in progress');
    }
    return this.current.done;
  }

  cancel(): boolean {
    if (!this.current) return false;
    this.current.controller.abort();
    return true;
  }

  private async execute(report: RunReport, signal: AbortSignal): Promise<RunReport> {
    logInfo('Reconciliation run started', { runId: report.runId });

    try {
      const identities = await this.deps.gateway.listIdentities();
      const queue = new IdentityPriorityQueue();
      const scores = await this.countPending(identities);

      const idle: IdentityReport[] = [];
      identities.forEach((identity, index) => {
        if (scores[index] > 0) {
          queue.updateScore(identity, scores[index]);
        } else {
          idle.push(skippedReport(identity.studentId));
        }
      });

      logInfo('Queue seeded', { runId: report.runId, identities: identities.length, pending: queue.size });

      const result = await this.deps.scheduler.run(queue, signal);

      report.status = result.status;
      report.identities = [...result.identities, ...idle];
      report.totals = result.totals;
      if (result.haltReason) {
        report.message = result.haltReason;
      }
    } catch (error) {
      report.status = 'error';
      report.message = errorMessage(error);
      logError('Reconciliation run failed', { runId: report.runId, error: report.message });
    }

    report.completedAt = new Date().toISOString();
    logInfo('Reconciliation run finished', {
      runId: report.runId,
      status: report.status,
      succeeded: report.identities.filter((r) => r.status === 'succeeded').length,
      failed: report.identities.filter((r) => r.status === 'failed').length,
      totals: report.totals,
    });
    return report;
  }

  /**
   * Unread messages not yet in the dedup cache, used as initial priorities.
   * Listed from metadata only, under the same connection cap as the workers.
   * An identity whose mailbox cannot be listed still gets queued so the
   * fetch path retries and reports it.
   */
  private async countPending(identities: Identity[]): Promise<number[]> {
    const { source, cache, config } = this.deps;
    const connections = new Semaphore(config.fetchConcurrency);

    return Promise.all(
      identities.map(async (identity) => {
        try {
          return await withPermitAndDeadline(connections, `count ${identity.studentId}`, config.callTimeoutMs, async (signal) => {
            const session = await source.connect(identity, signal);
            try {
              const refs = await session.listUnread(signal);
              const unseen = new Set(refs.map((ref) => ref.fingerprint).filter((f) => !cache.seen(identity.studentId, f)));
              return unseen.size;
            } finally {
              await session.close();
            }
          });
        } catch (error) {
          logWarn('Pending count failed', { studentId: identity.studentId, error: errorMessage(error) });
          return 1;
        }
      })
    );
  }
}
