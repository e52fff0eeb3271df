/**
 * Consecutive Failure Breaker
 * Counts failures in a row and pauses the caller for a cooldown once the
 * threshold is reached. Unlike a fail-fast breaker it never rejects work:
 * the caller waits, the counter resets, and processing resumes.
 */

import { FailureBreakerOptions, FailureBreakerStats, SleepFn } from '../types';
import { sleep as defaultSleep } from './sleep';

export class ConsecutiveFailureBreaker {
  private consecutiveFailures = 0;
  private pauses = 0;
  private cooldown: Promise<void> | null = null;

  private readonly maxConsecutiveFailures: number;
  private readonly cooldownMs: number;
  private readonly sleep: SleepFn;
  private readonly onTrip?: (consecutiveFailures: number, cooldownMs: number) => void;
  private readonly onReset?: () => void;

  constructor(options: FailureBreakerOptions = {}) {
    this.maxConsecutiveFailures = options.maxConsecutiveFailures ?? 3;
    this.cooldownMs = options.cooldownMs ?? 60000;
    this.sleep = options.sleep ?? defaultSleep;
    this.onTrip = options.onTrip;
    this.onReset = options.onReset;

    if (!Number.isInteger(this.maxConsecutiveFailures) || this.maxConsecutiveFailures < 1) {
      throw new RangeError(
        `maxConsecutiveFailures must be a positive integer, got ${this.maxConsecutiveFailures}`
      );
    }
    if (this.cooldownMs < 0) {
      throw new RangeError(`cooldownMs must not be negative, got ${this.cooldownMs}`);
    }
  }

  recordSuccess(): void {
    this.consecutiveFailures = 0;
  }

  /**
   * Register a failure. Resolves once the caller may continue: immediately
   * below the threshold, after the cooldown otherwise. Failures reported while
   * a cooldown runs join that cooldown instead of starting another one.
   *
   * @returns true when this call tripped the breaker
   */
  async recordFailure(signal?: AbortSignal): Promise<boolean> {
    if (this.cooldown) {
      await this.cooldown;
      return false;
    }

    this.consecutiveFailures++;

    if (this.consecutiveFailures < this.maxConsecutiveFailures) {
      return false;
    }

    this.pauses++;
    this.onTrip?.(this.consecutiveFailures, this.cooldownMs);

    this.cooldown = this.sleep(this.cooldownMs, signal).finally(() => {
      this.consecutiveFailures = 0;
      this.cooldown = null;
      this.onReset?.();
    });

    await this.cooldown;
    return true;
  }

  /**
   * Wait for a running cooldown, resolves immediately when there is none
   */
  async waitForCooldown(): Promise<void> {
    if (this.cooldown) {
      await this.cooldown;
    }
  }

  getStats(): FailureBreakerStats {
    return {
      consecutiveFailures: this.consecutiveFailures,
      pauses: this.pauses,
      coolingDown: this.cooldown !== null,
    };
  }
}

export function createFailureBreaker(options?: FailureBreakerOptions): ConsecutiveFailureBreaker {
  return new ConsecutiveFailureBreaker(options);
}
