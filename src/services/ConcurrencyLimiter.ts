type Task = () => Promise<void>;

/**
 * Runs at most `concurrency` jobs at once, starting them in FIFO order and
 * at least `minDelayMs` apart.
 */
export class ConcurrencyLimiter {
  private active = 0;
  private lastStart = 0;
  private waiting = false;
  private queue: Task[] = [];

  constructor(
    readonly concurrency: number,
    readonly minDelayMs = 0
  ) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`);
    }
  }

  get activeCount(): number {
    return this.active;
  }

  get pendingCount(): number {
    return this.queue.length;
  }

  schedule<T>(fn: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.queue.push(async () => {
        try {
          resolve(await fn());
        } catch (err) {
          reject(err);
        }
      });
      this.drain();
    });
  }

  private drain(): void {
    if (this.waiting || this.active >= this.concurrency || this.queue.length === 0) return;

    const waitMs = Math.max(0, this.minDelayMs - (Date.now() - this.lastStart));
    if (waitMs > 0) {
      this.waiting = true;
      setTimeout(() => {
        this.waiting = false;
        this.drain();
      }, waitMs);
      return;
    }

    const task = this.queue.shift();
    if (!task) return;

    this.active++;
    this.lastStart = Date.now();
    void task().finally(() => {
      this.active--;
      this.drain();
    });
    this.drain();
  }
}
