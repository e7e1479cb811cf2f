/**
 * An unbounded multi-producer, single-consumer queue. `send` never waits;
 * `receive` waits until a value is available.
 */
export class ResultChannel<T> {
  private readonly buffer: T[] = [];
  private readonly waiters: Array<(value: T) => void> = [];

  send(value: T): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(value);
    } else {
      this.buffer.push(value);
    }
  }

  receive(): Promise<T> {
    if (this.buffer.length > 0) {
      const [value] = this.buffer.splice(0, 1);
      return Promise.resolve(value);
    }
    return new Promise<T>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  get pending(): number {
    return this.buffer.length;
  }
}

/**
 * Runs submitted tasks with at most `size` in flight and sends each task's
 * result to a channel.
 *
 * `submit` resolves once the task has started, so a caller that awaits it is
 * held back while every worker is busy. `join` waits for everything submitted
 * so far and rejects if a task rejected.
 */
export class WorkerPool<T> {
  private readonly running = new Set<Promise<void>>();
  private readonly slotWaiters: Array<() => void> = [];
  private readonly failures: unknown[] = [];
  private available: number;
  private submitted = 0;

  constructor(size: number, private readonly channel: ResultChannel<T>) {
    if (!Number.isInteger(size) || size < 1) {
      throw new RangeError(`Worker pool size must be a positive integer, got ${size}`);
    }
    this.available = size;
  }

  /** Number of tasks accepted so far; the consumer drains exactly this many results. */
  get submittedCount(): number {
    return this.submitted;
  }

  get activeCount(): number {
    return this.running.size;
  }

  async submit(task: () => Promise<T>): Promise<void> {
    await this.acquire();
    this.submitted += 1;

    const run = Promise.resolve()
      .then(task)
      .then((result) => this.channel.send(result))
      .catch((error: unknown) => {
        this.failures.push(error);
      })
      .finally(() => {
        this.running.delete(run);
        this.release();
      });
    this.running.add(run);
  }

  async join(): Promise<void> {
    while (this.running.size > 0) {
      await Promise.all(this.running);
    }
    if (this.failures.length > 0) {
      const [first] = this.failures;
      throw first instanceof Error ? first : new Error(String(first));
    }
  }

  private async acquire(): Promise<void> {
    if (this.available > 0) {
      this.available -= 1;
      return;
    }
    await new Promise<void>((resolve) => {
      this.slotWaiters.push(resolve);
    });
  }

  private release(): void {
    const next = this.slotWaiters.shift();
    if (next) {
      // the slot passes straight to the waiter
      next();
    } else {
      this.available += 1;
    }
  }
}
