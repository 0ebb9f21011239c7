/**
 * Counting semaphore shared by every translation call of a run
 */

import { TranslationCancelledError } from "./errors.js";

export interface Permit {
  release(): void;
}

interface Waiter {
  grant: (permit: Permit) => void;
  cancel: () => void;
  signal?: AbortSignal;
}

export class Semaphore {
  private available: number;
  private readonly waiters: Waiter[] = [];
  /** Signals this semaphore already listens to, one listener each */
  private readonly watched = new WeakSet<AbortSignal>();

  constructor(permits: number) {
    if (!Number.isInteger(permits) || permits < 1) {
      throw new RangeError(
        `Semaphore needs a positive integer permit count, got ${permits}`,
      );
    }
    this.available = permits;
  }

  /**
   * Wait for a free permit. Waiters are admitted in arrival order.
   * Aborting `signal` drops a queued waiter and rejects its promise.
   */
  acquire(signal?: AbortSignal): Promise<Permit> {
    if (signal?.aborted) {
      return Promise.reject(new TranslationCancelledError());
    }

    if (this.available > 0) {
      this.available--;
      return Promise.resolve(this.createPermit());
    }

    return new Promise<Permit>((resolve, reject) => {
      this.waiters.push({
        grant: resolve,
        cancel: () => reject(new TranslationCancelledError()),
        signal,
      });
      if (signal) {
        this.watch(signal);
      }
    });
  }

  /**
   * Run `fn` while holding a permit; the permit is released on every exit path.
   */
  async use<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const permit = await this.acquire(signal);
    try {
      return await fn();
    } finally {
      permit.release();
    }
  }

  /**
   * A whole batch shares one signal, so every waiter on it is dropped by a
   * single abort listener.
   */
  private watch(signal: AbortSignal): void {
    if (this.watched.has(signal)) return;
    this.watched.add(signal);
    signal.addEventListener("abort", () => this.dropWaiters(signal), {
      once: true,
    });
  }

  private dropWaiters(signal: AbortSignal): void {
    const dropped: Waiter[] = [];
    for (let i = 0; i < this.waiters.length; ) {
      if (this.waiters[i].signal === signal) {
        dropped.push(...this.waiters.splice(i, 1));
      } else {
        i++;
      }
    }
    for (const waiter of dropped) {
      waiter.cancel();
    }
  }

  private createPermit(): Permit {
    let released = false;
    return {
      release: () => {
        if (released) return;
        released = true;
        this.handOff();
      },
    };
  }

  private handOff(): void {
    const next = this.waiters.shift();
    if (next) {
      // The permit passes straight to the next waiter; `available` stays as is.
      next.grant(this.createPermit());
    } else {
      this.available++;
    }
  }
}
