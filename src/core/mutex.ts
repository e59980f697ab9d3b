/**
 * Async Mutex & Concurrent Safety Primitives
 *
 * - AsyncMutex: single-resource exclusive lock
 * - KeyedMutex: one lazily created AsyncMutex per key (per session, per node)
 * - AsyncSemaphore: counting semaphore for bounded concurrency
 */

/**
 * AsyncMutex: Exclusive lock for async operations.
 * Only one holder at a time; others queue in FIFO order.
 */
export class AsyncMutex {
  private locked = false;
  private queue: Array<() => void> = [];

  /**
   * Acquire the lock. Returns a release function.
   */
  async acquire(): Promise<() => void> {
    if (!this.locked) {
      this.locked = true;
      return this.createRelease();
    }

    return new Promise<() => void>((resolve) => {
      this.queue.push(() => {
        resolve(this.createRelease());
      });
    });
  }

  /**
   * Run a function while holding the lock.
   */
  async withLock<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  get isLocked(): boolean {
    return this.locked;
  }

  get queueLength(): number {
    return this.queue.length;
  }

  private createRelease(): () => void {
    let released = false;
    return () => {
      if (released) return; // Idempotent
      released = true;

      const next = this.queue.shift();
      if (next) {
        // Hand over in a microtask to avoid deep synchronous chains
        queueMicrotask(next);
      } else {
        this.locked = false;
      }
    };
  }
}

/**
 * KeyedMutex: serializes work per key while unrelated keys run freely.
 * Idle mutexes are dropped so the map only holds contended keys.
 */
export class KeyedMutex {
  private mutexes = new Map<string, AsyncMutex>();

  async withLock<T>(key: string, fn: () => T | Promise<T>): Promise<T> {
    let mutex = this.mutexes.get(key);
    if (!mutex) {
      mutex = new AsyncMutex();
      this.mutexes.set(key, mutex);
    }

    const release = await mutex.acquire();
    try {
      return await fn();
    } finally {
      release();
      if (!mutex.isLocked && mutex.queueLength === 0) {
        this.mutexes.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return this.mutexes.get(key)?.isLocked ?? false;
  }

  get size(): number {
    return this.mutexes.size;
  }
}

/**
 * AsyncSemaphore: Counting semaphore for bounded concurrency.
 */
export class AsyncSemaphore {
  private permits: number;
  private readonly maxPermits: number;
  private queue: Array<() => void> = [];

  constructor(maxPermits: number) {
    if (maxPermits < 1) throw new Error('Semaphore must have at least 1 permit');
    this.maxPermits = maxPermits;
    this.permits = maxPermits;
  }

  /**
   * Acquire a permit. Waits if none available.
   */
  async acquire(): Promise<() => void> {
    if (this.permits > 0) {
      this.permits--;
      return this.createRelease();
    }

    return new Promise<() => void>((resolve) => {
      this.queue.push(() => {
        resolve(this.createRelease());
      });
    });
  }

  /**
   * Run a function while holding a permit.
   */
  async withPermit<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  get available(): number {
    return this.permits;
  }

  get max(): number {
    return this.maxPermits;
  }

  private createRelease(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;

      const next = this.queue.shift();
      if (next) {
        queueMicrotask(next);
      } else {
        this.permits++;
      }
    };
  }
}
