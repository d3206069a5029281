import { DeadlineExceededError } from './errors';

/**
 * Counting semaphore for async tasks. Waiters are served first-in, first-out.
 */
export class Semaphore {
  private available: number;
  private readonly waiters: Array<() => void> = [];

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Semaphore capacity must be a positive integer, got ${capacity}`);
    }
    this.available = capacity;
  }

  async acquire(): Promise<() => void> {
    if (this.available > 0) {
      this.available -= 1;
    } else {
      await new Promise<void>((resolve) => this.waiters.push(resolve));
    }

    let released = false;
    return () => {
      if (released) return;
      released = true;
      const next = this.waiters.shift();
      if (next) {
        // hand the permit straight to the next waiter
        next();
      } else {
        this.available += 1;
      }
    };
  }

  async use<T>(task: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await task();
    } finally {
      release();
    }
  }
}

/**
 * Resolves with the task's result, or rejects with DeadlineExceededError once
 * `timeoutMs` passes. The task itself keeps running; callers that can abort it
 * receive the signal.
 */
export async function withDeadline<T>(
  label: string,
  timeoutMs: number,
  task: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new DeadlineExceededError(label, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([task(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * `withDeadline` under a permit of `slots`. The caller gets the deadline
 * error on time, but the permit is held until the task itself settles, so a
 * call that ignores its abort signal still counts against the cap.
 */
export async function withPermitAndDeadline<T>(
  slots: Semaphore,
  label: string,
  timeoutMs: number,
  task: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const release = await slots.acquire();
  return withDeadline(label, timeoutMs, (signal) => {
    const call = (async () => task(signal))();
    void call.then(release, release);
    return call;
  });
}

/**
 * Wakes every waiting task when notified. Used by idle workers to wait for
 * new queue entries or the end of in-flight work.
 */
export class Notifier {
  private waiters: Array<() => void> = [];

  wait(): Promise<void> {
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  notifyAll(): void {
    const waiting = this.waiters;
    this.waiters = [];
    for (const wake of waiting) {
      wake();
    }
  }
}
