// Per-key mutual exclusion
// Work queued under the same key runs one at a time, in arrival order; different keys never wait on each other

class Mutex {
  private locked = false;
  private readonly queue: Array<() => void> = [];

  get idle(): boolean {
    return !this.locked && this.queue.length === 0;
  }

  async acquire(): Promise<() => void> {
    return new Promise((resolve) => {
      const release = () => {
        const next = this.queue.shift();
        if (next) {
          next();
          return;
        }
        this.locked = false;
      };

      if (!this.locked) {
        this.locked = true;
        resolve(release);
        return;
      }

      this.queue.push(() => {
        this.locked = true;
        resolve(release);
      });
    });
  }
}

export class KeyedMutex {
  private readonly locks = new Map<string, Mutex>();

  async runExclusive<T>(key: string, work: () => Promise<T>): Promise<T> {
    let mutex = this.locks.get(key);
    if (!mutex) {
      mutex = new Mutex();
      this.locks.set(key, mutex);
    }

    const release = await mutex.acquire();
    try {
      return await work();
    } finally {
      release();
      if (mutex.idle && this.locks.get(key) === mutex) {
        this.locks.delete(key);
      }
    }
  }

  /** Number of keys with work running or queued. */
  get activeKeys(): number {
    return this.locks.size;
  }
}
