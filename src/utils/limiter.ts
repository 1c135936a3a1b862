export type ReleaseFn = () => void;

interface Waiter {
  grant: (release: ReleaseFn) => void;
}

export interface LimiterStats {
  capacity: number;
  inUse: number;
  waiting: number;
}

/**
 * Counting semaphore shared by every site task. Waiters are served in
 * arrival order, and a waiter whose signal aborts leaves the queue without
 * taking a slot.
 */
export class ConcurrencyLimiter {
  private readonly capacity: number;
  private readonly waiters: Waiter[] = [];
  private inUse = 0;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Limiter capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  acquire(signal?: AbortSignal): Promise<ReleaseFn> {
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }

    if (this.inUse < this.capacity && this.waiters.length === 0) {
      this.inUse++;
      return Promise.resolve(this.createRelease());
    }

    return new Promise<ReleaseFn>((resolve, reject) => {
      const onAbort = (): void => {
        const index = this.waiters.indexOf(waiter);
        if (index !== -1) {
          this.waiters.splice(index, 1);
        }
        reject(signal?.reason);
      };

      const waiter: Waiter = {
        grant: (release) => {
          signal?.removeEventListener('abort', onAbort);
          resolve(release);
        },
      };

      this.waiters.push(waiter);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  getStats(): LimiterStats {
    return {
      capacity: this.capacity,
      inUse: this.inUse,
      waiting: this.waiters.length,
    };
  }

  private createRelease(): ReleaseFn {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.handOff();
    };
  }

  // The freed slot passes straight to the next waiter, so inUse only drops when nobody waits.
  private handOff(): void {
    const next = this.waiters.shift();
    if (next) {
      next.grant(this.createRelease());
    } else {
      this.inUse--;
    }
  }
}
