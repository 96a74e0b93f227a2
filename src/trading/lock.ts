/**
 * Promise-chain mutex. Callers queue in arrival order; a rejected task
 * releases the lock like a resolved one.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private holders = 0;

  get isLocked(): boolean {
    return this.holders > 0;
  }

  runExclusive<T>(task: () => Promise<T> | T): Promise<T> {
    this.holders++;
    const run = this.tail.then(task);
    this.tail = run.then(
      () => this.release(),
      () => this.release(),
    );
    return run;
  }

  private release(): void {
    this.holders--;
  }
}

/** One Mutex per key, dropped once nobody holds or waits for it. */
export class KeyedMutex {
  private locks = new Map<string, Mutex>();

  isLocked(key: string): boolean {
    return this.locks.get(key)?.isLocked ?? false;
  }

  async runExclusive<T>(key: string, task: () => Promise<T> | T): Promise<T> {
    let lock = this.locks.get(key);
    if (!lock) {
      lock = new Mutex();
      this.locks.set(key, lock);
    }
    try {
      return await lock.runExclusive(task);
    } finally {
      if (!lock.isLocked) this.locks.delete(key);
    }
  }
}
