import { Identity } from './types';

interface HeapEntry {
  studentId: string;
  score: number;
  order: number;
  version: number;
}

interface QueueState {
  identity: Identity;
  score: number;
  order: number;
  version: number;
}

/**
 * Max-priority queue of identities keyed by student id. The score is the
 * number of new messages observed for the identity and not yet dequeued.
 * Equal scores pop in insertion order. Score updates push a fresh heap entry
 * tagged with a queue-wide version; entries whose version no longer matches
 * are skipped on pop.
 */
export class IdentityPriorityQueue {
  private readonly heap: HeapEntry[] = [];
  private readonly states = new Map<string, QueueState>();
  private nextOrder = 0;
  private nextVersion = 0;

  get size(): number {
    return this.states.size;
  }

  has(studentId: string): boolean {
    return this.states.has(studentId);
  }

  scoreOf(studentId: string): number {
    return this.states.get(studentId)?.score ?? 0;
  }

  /**
   * Adds `delta` to the identity's score. An identity not in the queue is
   * inserted with a fresh insertion order; one whose score drops to zero or
   * below is removed.
   */
  updateScore(identity: Identity, delta: number): void {
    const existing = this.states.get(identity.studentId);

    if (!existing) {
      if (delta <= 0) return;
      const state: QueueState = { identity, score: delta, order: this.nextOrder++, version: this.nextVersion++ };
      this.states.set(identity.studentId, state);
      this.push(state);
      return;
    }

    existing.score += delta;
    existing.version = this.nextVersion++;
    if (existing.score <= 0) {
      this.states.delete(identity.studentId);
      return;
    }
    this.push(existing);
  }

  popHighest(): Identity | undefined {
    return this.popHighestEntry()?.identity;
  }

  /** Like `popHighest`, also returning the score the identity had. */
  popHighestEntry(): { identity: Identity; score: number } | undefined {
    while (this.heap.length > 0) {
      const top = this.removeTop();
      const state = this.states.get(top.studentId);
      if (!state || state.version !== top.version) continue;
      this.states.delete(top.studentId);
      return { identity: state.identity, score: state.score };
    }
    return undefined;
  }

  private push(state: QueueState): void {
    this.heap.push({
      studentId: state.identity.studentId,
      score: state.score,
      order: state.order,
      version: state.version,
    });
    this.siftUp(this.heap.length - 1);
  }

  private removeTop(): HeapEntry {
    const top = this.heap[0];
    const last = this.heap.pop();
    if (last && this.heap.length > 0) {
      this.heap[0] = last;
      this.siftDown(0);
    }
    return top;
  }

  private outranks(a: HeapEntry, b: HeapEntry): boolean {
    if (a.score !== b.score) return a.score > b.score;
    return a.order < b.order;
  }

  private siftUp(index: number): void {
    let child = index;
    while (child > 0) {
      const parent = (child - 1) >> 1;
      if (!this.outranks(this.heap[child], this.heap[parent])) break;
      [this.heap[child], this.heap[parent]] = [this.heap[parent], this.heap[child]];
      child = parent;
    }
  }

  private siftDown(index: number): void {
    let parent = index;
    for (;;) {
      const left = parent * 2 + 1;
      const right = left + 1;
      let best = parent;
      if (left < this.heap.length && this.outranks(this.heap[left], this.heap[best])) best = left;
      if (right < this.heap.length && this.outranks(this.heap[right], this.heap[best])) best = right;
      if (best === parent) return;
      [this.heap[parent], this.heap[best]] = [this.heap[best], this.heap[parent]];
      parent = best;
    }
  }
}
