import { Notifier, Semaphore, withDeadline, withPermitAndDeadline } from './concurrency';
import { DeadlineExceededError } from './errors';

function deferred<T = void>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('Semaphore', () => {
  it('should never run more tasks than its capacity', async () => {
    const semaphore = new Semaphore(2);
    let active = 0;
    let peak = 0;

    const task = async () => {
      active += 1;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setTimeout(resolve, 5));
      active -= 1;
    };

    await Promise.all(Array.from({ length: 6 }, () => semaphore.use(task)));

    expect(peak).toBe(2);
    expect(active).toBe(0);
  });

  it('should serve waiters in arrival order', async () => {
    const semaphore = new Semaphore(1);
    const order: number[] = [];
    const gate = deferred();

    const first = semaphore.use(async () => {
      await gate.promise;
      order.push(0);
    });
    const rest = [1, 2, 3].map((n) => semaphore.use(async () => void order.push(n)));

    gate.resolve();
    await Promise.all([first, ...rest]);

    expect(order).toEqual([0, 1, 2, 3]);
  });

  it('should release the permit when the task throws', async () => {
    const semaphore = new Semaphore(1);

    await expect(semaphore.use(async () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    await expect(semaphore.use(async () => 'next')).resolves.toBe('next');
  });

  it('should ignore a second release of the same permit', async () => {
    const semaphore = new Semaphore(1);
    const release = await semaphore.acquire();
    release();
    release();

    const a = await semaphore.acquire();
    let secondAcquired = false;
    const b = semaphore.acquire().then((r) => {
      secondAcquired = true;
      return r;
    });
    await new Promise((resolve) => setImmediate(resolve));

    expect(secondAcquired).toBe(false);
    a();
    (await b)();
    expect(secondAcquired).toBe(true);
  });

  it('should reject a capacity below one', () => {
    expect(() => new Semaphore(0)).toThrow(RangeError);
  });
});

describe('withDeadline', () => {
  it('should resolve with the task result when it finishes in time', async () => {
    await expect(withDeadline('quick', 100, async () => 42)).resolves.toBe(42);
  });

  it('should reject with DeadlineExceededError and abort the signal on timeout', async () => {
    let signal: AbortSignal | undefined;
    const pending = withDeadline('slow call', 10, (s) => {
      signal = s;
      return new Promise<never>(() => undefined);
    });

    await expect(pending).rejects.toThrow(DeadlineExceededError);
    await expect(pending).rejects.toThrow('slow call exceeded 10ms');
    expect(signal?.aborted).toBe(true);
  });
});

describe('withPermitAndDeadline', () => {
  it('should keep the permit until a timed-out task actually settles', async () => {
    const slots = new Semaphore(1);
    const stuck = deferred();
    const started: string[] = [];

    const first = withPermitAndDeadline(slots, 'first', 10, async () => {
      started.push('first');
      await stuck.promise;
    });
    await expect(first).rejects.toThrow('first exceeded 10ms');

    const second = withPermitAndDeadline(slots, 'second', 1000, async () => {
      started.push('second');
      return 'done';
    });
    await new Promise((resolve) => setTimeout(resolve, 20));
    expect(started).toEqual(['first']);

    stuck.resolve();
    await expect(second).resolves.toBe('done');
    expect(started).toEqual(['first', 'second']);
  });

  it('should release the permit when the task rejects', async () => {
    const slots = new Semaphore(1);

    await expect(
      withPermitAndDeadline(slots, 'failing', 100, async () => Promise.reject(new Error('boom')))
    ).rejects.toThrow('boom');
    await expect(withPermitAndDeadline(slots, 'next', 100, async () => 'next')).resolves.toBe('next');
  });
});

describe('Notifier', () => {
  it('should wake every waiter', async () => {
    const notifier = new Notifier();
    let woken = 0;
    const waits = [notifier.wait(), notifier.wait()].map((p) => p.then(() => void (woken += 1)));

    notifier.notifyAll();
    await Promise.all(waits);

    expect(woken).toBe(2);
  });
});
