// src/libs/hash-pool.ts
// ============================================================================
// Begrenzter Pool fuer argon2-Jobs
// ----------------------------------------------------------------------------
// - argon2 rechnet nativ auf dem libuv-Threadpool, nie auf dem Event-Loop
// - Der Pool begrenzt, wie viele Jobs gleichzeitig an die native Bindung gehen.
//   Ein Login-Burst belegt damit hoechstens `size` libuv-Threads; fs/dns/crypto
//   anderer Requests bleiben bedienbar.
// - Jeder run() liefert ein einmaliges Promise (Ergebnis-Kanal); Warteschlange FIFO
// - Abbruch: laufende Jobs werden nicht unterbrochen, das Ergebnis verfaellt
// ============================================================================

import { HashingError } from "./errors.js";

export const DEFAULT_HASH_POOL_SIZE = 4;

export interface HashPoolOptions {
  /** Maximale Anzahl gleichzeitig laufender Jobs (>= 1). */
  size: number;
}

export interface HashPoolStats {
  size: number;
  active: number;
  queued: number;
}

type QueuedJob = {
  start: () => void;
  reject: (err: Error) => void;
};

export class HashPool {
  private readonly size: number;
  private readonly queue: QueuedJob[] = [];
  private active = 0;
  private closed = false;
  private idleWaiters: Array<() => void> = [];

  constructor(opts: HashPoolOptions) {
    if (!Number.isInteger(opts.size) || opts.size < 1) {
      throw new RangeError(`hash pool size must be a positive integer, got ${opts.size}`);
    }
    this.size = opts.size;
  }

  run<T>(task: () => Promise<T>): Promise<T> {
    if (this.closed) {
      return Promise.reject(new HashingError("hash_pool_closed"));
    }

    return new Promise<T>((resolve, reject) => {
      const start = () => {
        this.active += 1;
        // then(task) faengt auch synchrone Throws des Jobs ab
        Promise.resolve()
          .then(task)
          .then(resolve, reject)
          .finally(() => this.release());
      };

      if (this.active < this.size) {
        start();
      } else {
        this.queue.push({ start, reject });
      }
    });
  }

  stats(): HashPoolStats {
    return { size: this.size, active: this.active, queued: this.queue.length };
  }

  /**
   * Nimmt keine Jobs mehr an, verwirft die Warteschlange und wartet,
   * bis laufende Jobs fertig sind.
   */
  async close(): Promise<void> {
    this.closed = true;

    const pending = this.queue.splice(0, this.queue.length);
    for (const job of pending) {
      job.reject(new HashingError("hash_pool_closed"));
    }

    if (this.active === 0) return;
    await new Promise<void>((resolve) => this.idleWaiters.push(resolve));
  }

  private release() {
    this.active -= 1;

    const next = this.queue.shift();
    if (next) {
      next.start();
      return;
    }

    if (this.active === 0 && this.idleWaiters.length > 0) {
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      for (const resolve of waiters) resolve();
    }
  }
}
