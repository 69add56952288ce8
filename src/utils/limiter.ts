export class Semaphore {
  private readonly max: number;
  private count: number;
  private readonly queue: Array<() => void>;

  constructor(max: number) {
    this.max = Math.max(1, max);
    this.count = 0;
    this.queue = [];
  }

  async acquire(): Promise<() => void> {
    if (this.count < this.max) {
      this.count += 1;
      return this.releaser();
    }
    return new Promise((resolve) => {
      this.queue.push(() => {
        this.count += 1;
        resolve(this.releaser());
      });
    });
  }

  private releaser(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.release();
    };
  }

  private release(): void {
    this.count -= 1;
    const next = this.queue.shift();
    if (next) next();
  }

  async with<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }
}

/**
 * One single-slot semaphore per key. Keys with nothing queued are dropped.
 */
export class KeyedMutex {
  private readonly locks = new Map<string, { sem: Semaphore; waiters: number }>();

  async with<T>(key: string, fn: () => Promise<T>): Promise<T> {
    let lock = this.locks.get(key);
    if (!lock) {
      lock = { sem: new Semaphore(1), waiters: 0 };
      this.locks.set(key, lock);
    }
    lock.waiters += 1;
    try {
      return await lock.sem.with(fn);
    } finally {
      lock.waiters -= 1;
      if (lock.waiters === 0) this.locks.delete(key);
    }
  }
}
