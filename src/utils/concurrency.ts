/**
 * Counting semaphore used to cap concurrent browser contexts and
 * image-generation calls.
 */
export class Semaphore {
  private current = 0;
  private readonly queue: Array<() => void> = [];

  constructor(private readonly max: number) {
    if (!Number.isInteger(max) || max < 1) {
      throw new RangeError(`Semaphore size must be a positive integer, got ${max}`);
    }
  }

  get active(): number {
    return this.current;
  }

  get waiting(): number {
    return this.queue.length;
  }

  /**
   * Waits for a permit. Rejects with the signal's reason if it is aborted
   * while still queued.
   */
  async acquire(signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
    if (this.current < this.max) {
      this.current++;
      return;
    }

    await new Promise<void>((resolve, reject) => {
      const grant = (): void => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      };
      const onAbort = (): void => {
        const index = this.queue.indexOf(grant);
        if (index !== -1) {
          this.queue.splice(index, 1);
        }
        reject(signal?.reason);
      };
      this.queue.push(grant);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  release(): void {
    const next = this.queue.shift();
    if (next) {
      // Permit passes straight to the next waiter.
      next();
      return;
    }
    this.current = Math.max(0, this.current - 1);
  }

  /**
   * Runs a task while holding a permit.
   */
  async run<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    await this.acquire(signal);
    try {
      return await task();
    } finally {
      this.release();
    }
  }
}

/**
 * Settles with the task's result, or rejects with `onTimeout()` once
 * `timeoutMs` elapses. `onExpired` runs only after the timeout error has
 * settled the race, so cancelling the task there cannot replace that error.
 * The timer never outlives the race.
 */
export async function withTimeout<T>(
  task: Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error,
  onExpired?: () => void
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      reject(onTimeout());
      onExpired?.();
    }, timeoutMs);
  });
  try {
    return await Promise.race([task, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
