/**
 * Admission limiter: at most `capacity` tasks inside `run` at once, the rest
 * wait in FIFO order.
 */
export class Limiter {
  private available: number;
  private active = 0;
  private readonly waiters: Array<() => void> = [];

  constructor(readonly capacity: number) {
    if (!Number.isSafeInteger(capacity) || capacity <= 0) {
      throw new Error(`invalid limiter capacity=${capacity}`);
    }
    this.available = capacity;
  }

  get running(): number {
    return this.active;
  }

  get pending(): number {
    return this.waiters.length;
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    this.active += 1;
    try {
      return await task();
    } finally {
      this.active -= 1;
      this.release();
    }
  }

  private async acquire(): Promise<void> {
    if (this.available > 0) {
      this.available -= 1;
      return;
    }
    await new Promise<void>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  private release(): void {
    const next = this.waiters.shift();
    if (next) {
      next();
      return;
    }
    this.available += 1;
  }
}

/** Whole-table lock. */
export class Mutex {
  private readonly limiter = new Limiter(1);

  get locked(): boolean {
    return this.limiter.running > 0;
  }

  runExclusive<T>(task: () => Promise<T>): Promise<T> {
    return this.limiter.run(task);
  }
}
