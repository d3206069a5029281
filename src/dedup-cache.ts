import { DedupRetention } from './config';

/**
 * Remembers which message fingerprints each identity has already had
 * reconciled. One instance lives for the whole process and is shared by every
 * run; nothing is persisted, so a restart falls back on the store's
 * idempotence keys.
 *
 * Each identity owns its own insertion-ordered map, so eviction and lookups
 * for one student never touch another student's entries.
 */
export class DeduplicationCache {
  private readonly entries = new Map<string, Map<string, number>>();

  constructor(
    private readonly retention: DedupRetention,
    private readonly now: () => number = Date.now
  ) {}

  seen(studentId: string, fingerprint: string): boolean {
    const fingerprints = this.entries.get(studentId);
    if (!fingerprints) return false;
    this.evictExpired(fingerprints);
    return fingerprints.has(fingerprint);
  }

  mark(studentId: string, fingerprint: string): void {
    let fingerprints = this.entries.get(studentId);
    if (!fingerprints) {
      fingerprints = new Map();
      this.entries.set(studentId, fingerprints);
    }

    // re-marking moves the entry to the back of the eviction order
    fingerprints.delete(fingerprint);
    fingerprints.set(fingerprint, this.now());

    this.evictExpired(fingerprints);
    while (fingerprints.size > this.retention.maxEntriesPerIdentity) {
      const oldest = fingerprints.keys().next();
      if (oldest.done) break;
      fingerprints.delete(oldest.value);
    }
  }

  size(studentId: string): number {
    const fingerprints = this.entries.get(studentId);
    if (!fingerprints) return 0;
    this.evictExpired(fingerprints);
    return fingerprints.size;
  }

  clear(): void {
    this.entries.clear();
  }

  private evictExpired(fingerprints: Map<string, number>): void {
    if (this.retention.maxAgeMs <= 0) return;
    const cutoff = this.now() - this.retention.maxAgeMs;
    for (const [fingerprint, markedAt] of fingerprints) {
      if (markedAt >= cutoff) break;
      fingerprints.delete(fingerprint);
    }
  }
}
