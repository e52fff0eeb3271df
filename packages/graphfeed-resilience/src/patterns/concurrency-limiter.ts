/**
 * Concurrency Limiter
 * Counting admission gate: at most `maxConcurrent` executions in flight,
 * further callers wait in FIFO order. Slots are released in `finally`,
 * so errors and aborts never leak a slot.
 */

import { ConcurrencyLimiterOptions, ConcurrencyLimiterStats } from '../types';

interface Waiter {
  grant: () => void;
  reject: (reason: unknown) => void;
  signal?: AbortSignal;
  onAbort?: () => void;
}

export class ConcurrencyLimiter {
  private inFlight = 0;
  private peakInFlight = 0;
  private queue: Waiter[] = [];

  private readonly maxConcurrent: number;
  private readonly onCapacity?: (queued: number) => void;

  constructor(options: ConcurrencyLimiterOptions = {}) {
    this.maxConcurrent = options.maxConcurrent ?? 1;
    this.onCapacity = options.onCapacity;

    if (!Number.isInteger(this.maxConcurrent) || this.maxConcurrent < 1) {
      throw new RangeError(`maxConcurrent must be a positive integer, got ${this.maxConcurrent}`);
    }
  }

  /**
   * Execute function once a slot is free
   */
  async run<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    await this.acquire(signal);

    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  private acquire(signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();

    if (this.inFlight < this.maxConcurrent) {
      this.occupy();
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const waiter: Waiter = {
        grant: () => {
          this.occupy();
          resolve();
        },
        reject,
        signal,
      };

      if (signal) {
        waiter.onAbort = () => {
          const index = this.queue.indexOf(waiter);
          if (index !== -1) {
            this.queue.splice(index, 1);
          }
          reject(signal.reason);
        };
        signal.addEventListener('abort', waiter.onAbort, { once: true });
      }

      this.queue.push(waiter);
      this.onCapacity?.(this.queue.length);
    });
  }

  private occupy(): void {
    this.inFlight++;
    this.peakInFlight = Math.max(this.peakInFlight, this.inFlight);
  }

  private release(): void {
    this.inFlight--;

    const next = this.queue.shift();
    if (!next) return;

    if (next.signal && next.onAbort) {
      next.signal.removeEventListener('abort', next.onAbort);
    }
    next.grant();
  }

  /**
   * Get current statistics
   */
  getStats(): ConcurrencyLimiterStats {
    return {
      inFlight: this.inFlight,
      queued: this.queue.length,
      maxConcurrent: this.maxConcurrent,
      peakInFlight: this.peakInFlight,
    };
  }

  /**
   * Reject every queued caller, in-flight work is left alone
   */
  clearQueue(reason: unknown = new Error('Concurrency limiter queue cleared')): void {
    const waiters = this.queue;
    this.queue = [];
    for (const waiter of waiters) {
      if (waiter.signal && waiter.onAbort) {
        waiter.signal.removeEventListener('abort', waiter.onAbort);
      }
      waiter.reject(reason);
    }
  }
}

export function createConcurrencyLimiter(options?: ConcurrencyLimiterOptions): ConcurrencyLimiter {
  return new ConcurrencyLimiter(options);
}
