interface Waiter {
  exclusive: boolean;
  grant: () => void;
}

/**
 * In-process reader/writer lock. Any number of readers may hold it at once;
 * a writer holds it alone. Waiters are served in arrival order, so a queued
 * writer is not starved by readers that arrive after it.
 */
export class RwLock {
  private readers = 0;
  private writing = false;
  private readonly waiters: Waiter[] = [];

  async read<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire(false);
    try {
      return await fn();
    } finally {
      this.readers -= 1;
      this.drain();
    }
  }

  async write<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire(true);
    try {
      return await fn();
    } finally {
      this.writing = false;
      this.drain();
    }
  }

  private acquire(exclusive: boolean): Promise<void> {
    if (this.waiters.length === 0 && this.canGrant(exclusive)) {
      this.take(exclusive);
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.waiters.push({ exclusive, grant: resolve });
    });
  }

  private canGrant(exclusive: boolean): boolean {
    if (this.writing) return false;
    return exclusive ? this.readers === 0 : true;
  }

  private take(exclusive: boolean): void {
    if (exclusive) this.writing = true;
    else this.readers += 1;
  }

  private drain(): void {
    while (this.waiters.length > 0) {
      const next = this.waiters[0];
      if (!this.canGrant(next.exclusive)) return;
      this.waiters.shift();
      this.take(next.exclusive);
      next.grant();
      if (next.exclusive) return;
    }
  }
}
