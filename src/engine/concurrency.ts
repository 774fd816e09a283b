/**
 * Concurrency primitives: a counting semaphore (job workers, provider
 * ceilings) and a keyed mutex built on it (per-device capture, per-record
 * update, per-idempotency-key create).
 */

/** Raised when a permit is not granted within the requested wait. */
export class LockTimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms waiting for a permit`);
    this.name = 'LockTimeoutError';
  }
}

/** Release function returned by acquire(); calling it more than once is a no-op. */
export type Release = () => void;

/**
 * A counting semaphore with FIFO waiters.
 */
export class Semaphore {
  private limit: number;
  private inUse = 0;
  private waiting: Array<() => void> = [];

  constructor(permits: number) {
    this.limit = Semaphore.checkLimit(permits);
  }

  private static checkLimit(value: number): number {
    const next = Math.floor(value);
    if (!Number.isFinite(next) || next <= 0) {
      throw new Error('Semaphore limit must be positive');
    }
    return next;
  }

  getLimit(): number {
    return this.limit;
  }

  /** Permits currently held. */
  get active(): number {
    return this.inUse;
  }

  /** Callers waiting for a permit. */
  get pending(): number {
    return this.waiting.length;
  }

  /**
   * Change the limit. Raising it admits waiters immediately; lowering it
   * takes effect as holders release.
   */
  setLimit(nextLimit: number): void {
    this.limit = Semaphore.checkLimit(nextLimit);
    this.drain();
  }

  /**
   * Acquire a permit, waiting if necessary. With `timeoutMs`, rejects with
   * LockTimeoutError if no permit is granted in time.
   */
  acquire(timeoutMs?: number): Promise<Release> {
    if (this.inUse < this.limit && this.waiting.length === 0) {
      this.inUse++;
      return Promise.resolve(this.releaser());
    }

    return new Promise<Release>((resolve, reject) => {
      let timer: NodeJS.Timeout | undefined;
      const grant = (): void => {
        if (timer) clearTimeout(timer);
        this.inUse++;
        resolve(this.releaser());
      };
      this.waiting.push(grant);

      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          const idx = this.waiting.indexOf(grant);
          if (idx !== -1) {
            this.waiting.splice(idx, 1);
            reject(new LockTimeoutError(timeoutMs));
          }
        }, timeoutMs);
      }
    });
  }

  /** Run `fn` while holding a permit. */
  async run<T>(fn: () => Promise<T>, timeoutMs?: number): Promise<T> {
    const release = await this.acquire(timeoutMs);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private releaser(): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.inUse--;
      this.drain();
    };
  }

  private drain(): void {
    while (this.inUse < this.limit && this.waiting.length > 0) {
      const next = this.waiting.shift();
      if (!next) break;
      next();
    }
  }
}

/**
 * Mutual exclusion per key. Distinct keys never contend; idle keys are
 * forgotten.
 */
export class KeyedLock {
  private locks = new Map<string, Semaphore>();

  async acquire(key: string, timeoutMs?: number): Promise<Release> {
    let lock = this.locks.get(key);
    if (!lock) {
      lock = new Semaphore(1);
      this.locks.set(key, lock);
    }
    const held = lock;

    let release: Release;
    try {
      release = await held.acquire(timeoutMs);
    } catch (err) {
      this.forgetIfIdle(key, held);
      throw err;
    }

    return () => {
      release();
      this.forgetIfIdle(key, held);
    };
  }

  async run<T>(key: string, fn: () => Promise<T>, timeoutMs?: number): Promise<T> {
    const release = await this.acquire(key, timeoutMs);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  isLocked(key: string): boolean {
    const lock = this.locks.get(key);
    return lock !== undefined && lock.active > 0;
  }

  private forgetIfIdle(key: string, lock: Semaphore): void {
    if (lock.active === 0 && lock.pending === 0 && this.locks.get(key) === lock) {
      this.locks.delete(key);
    }
  }
}
