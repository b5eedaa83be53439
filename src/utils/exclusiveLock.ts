/**
 * In-process exclusive lock. Callers queue in arrival order; the holder
 * keeps the lock across awaits until it calls the returned release.
 */
export class ExclusiveLock {
  private tail: Promise<void> = Promise.resolve();
  private acquired = false;
  private waiters = 0;

  constructor(private readonly lockName: string) {}

  async acquire(): Promise<() => void> {
    const previous = this.tail;
    let releaseNext: () => void = () => undefined;
    const next = new Promise<void>((resolve) => {
      releaseNext = resolve;
    });
    this.tail = previous.then(() => next);

    if (this.acquired) {
      console.log(`⏳ Lock busy: ${this.lockName} (${this.waiters + 1} waiting)`);
    }
    this.waiters++;
    await previous;
    this.waiters--;
    this.acquired = true;

    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.acquired = false;
      releaseNext();
    };
  }

  isAcquired(): boolean {
    return this.acquired;
  }
}

/**
 * Helper function to execute code while holding the lock
 */
export async function withLock<T>(
  lock: ExclusiveLock,
  fn: () => Promise<T>
): Promise<T> {
  const release = await lock.acquire();
  try {
    return await fn();
  } finally {
    release();
  }
}
