/**
 * Error thrown when queue wait times out.
 */
export class CapacityExceededError extends Error {
  readonly retryAfterMs: number;

  constructor(message: string, retryAfterMs: number) {
    super(message);
    this.name = "CapacityExceededError";
    this.retryAfterMs = retryAfterMs;
  }
}

export type ConcurrencyLimiterOptions = {
  maxConcurrent: number;
  /** Timeout for waiting in queue (ms). 0 = no timeout */
  queueTimeoutMs?: number;
};

type Waiter = {
  resolve: () => void;
  reject: (err: Error) => void;
  timeoutId?: ReturnType<typeof setTimeout>;
};

/**
 * Queues tasks and runs at most `maxConcurrent` at once.
 * Supports queue timeout to prevent indefinite waits.
 */
export class ConcurrencyLimiter {
  private readonly maxConcurrent: number;
  private readonly queueTimeoutMs: number;
  private currentCount = 0;
  private readonly queue: Waiter[] = [];

  constructor(options: number | ConcurrencyLimiterOptions) {
    if (typeof options === "number") {
      this.maxConcurrent = options;
      this.queueTimeoutMs = 0;
    } else {
      this.maxConcurrent = options.maxConcurrent;
      this.queueTimeoutMs = options.queueTimeoutMs ?? 0;
    }
    if (this.maxConcurrent < 1) {
      throw new Error("maxConcurrent must be at least 1");
    }
  }

  get running(): number {
    return this.currentCount;
  }

  get queued(): number {
    return this.queue.length;
  }

  get atCapacity(): boolean {
    return this.currentCount >= this.maxConcurrent;
  }

  /**
   * True when nothing is running and nothing is waiting.
   */
  get idle(): boolean {
    return this.currentCount === 0 && this.queue.length === 0;
  }

  /**
   * Run a task with concurrency limiting.
   * @throws CapacityExceededError if queue wait times out
   */
  async run<T>(task: () => Promise<T>): Promise<T> {
    if (this.currentCount >= this.maxConcurrent) {
      await this.waitForSlot();
    } else {
      this.currentCount++;
    }

    try {
      return await task();
    } finally {
      this.release();
    }
  }

  /**
   * Hand the slot to the next waiter, or free it.
   */
  private release(): void {
    const next = this.queue.shift();
    if (next) {
      if (next.timeoutId) {
        clearTimeout(next.timeoutId);
      }
      next.resolve();
    } else {
      this.currentCount--;
    }
  }

  private waitForSlot(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const entry: Waiter = { resolve, reject };

      if (this.queueTimeoutMs > 0) {
        entry.timeoutId = setTimeout(() => {
          const idx = this.queue.indexOf(entry);
          if (idx !== -1) {
            this.queue.splice(idx, 1);
          }
          reject(
            new CapacityExceededError(
              `Queue wait exceeded ${this.queueTimeoutMs}ms timeout`,
              this.queueTimeoutMs
            )
          );
        }, this.queueTimeoutMs);
      }

      this.queue.push(entry);
    });
  }
}

/**
 * Serializes work per key: two calls with the same key never overlap, calls
 * with different keys run independently. One lock per key, created on demand
 * and dropped once idle.
 */
export class KeyedSerializer {
  private readonly locks = new Map<string, ConcurrencyLimiter>();

  async run<T>(key: string, task: () => Promise<T>): Promise<T> {
    let lock = this.locks.get(key);
    if (!lock) {
      lock = new ConcurrencyLimiter(1);
      this.locks.set(key, lock);
    }
    try {
      return await lock.run(task);
    } finally {
      if (lock.idle && this.locks.get(key) === lock) {
        this.locks.delete(key);
      }
    }
  }

  /**
   * Number of keys with running or queued work.
   */
  get activeKeys(): number {
    return this.locks.size;
  }
}
