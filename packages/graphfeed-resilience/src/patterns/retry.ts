/**
 * Retry Pattern
 * Retry rate-limited operations with exponential backoff and symmetric jitter.
 * Errors the classifier marks as fatal are rethrown without any sleep.
 */

import { ErrorClassifier, RetryOptions, RetryResult, SleepFn } from '../types';
import { defaultErrorClassifier } from './error-classifier';
import { sleep as defaultSleep } from './sleep';

export interface BackoffParameters {
  initialDelay: number;
  maxDelay: number;
  backoffFactor: number;
  jitterFraction: number;
}

/**
 * Delay before retry number `attempt` (1-indexed), clamped to [0, maxDelay]
 */
export function computeBackoffDelay(
  attempt: number,
  params: BackoffParameters,
  random: () => number = Math.random
): number {
  const base = Math.min(params.maxDelay, params.initialDelay * Math.pow(params.backoffFactor, attempt - 1));
  const jitterAmount = base * params.jitterFraction;
  // uniform in [-jitterAmount, +jitterAmount]
  const jittered = base + (random() * 2 - 1) * jitterAmount;
  return Math.min(Math.max(0, jittered), params.maxDelay);
}

export class RetryPolicy {
  private readonly maxAttempts: number;
  private readonly backoff: BackoffParameters;
  private readonly classifier: ErrorClassifier;
  private readonly sleep: SleepFn;
  private readonly random: () => number;
  private readonly onRetry?: (error: unknown, attempt: number, delay: number) => void;
  private readonly signal?: AbortSignal;

  constructor(options: RetryOptions = {}) {
    this.maxAttempts = options.maxAttempts ?? 6;
    this.backoff = {
      initialDelay: options.initialDelay ?? 500,
      maxDelay: options.maxDelay ?? 30000,
      backoffFactor: options.backoffFactor ?? 2,
      jitterFraction: options.jitterFraction ?? 0.3,
    };
    this.classifier = options.classifier ?? defaultErrorClassifier;
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
    this.onRetry = options.onRetry;
    this.signal = options.signal;

    if (!Number.isInteger(this.maxAttempts) || this.maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be a positive integer, got ${this.maxAttempts}`);
    }
    if (this.backoff.jitterFraction < 0 || this.backoff.jitterFraction > 1) {
      throw new RangeError(`jitterFraction must be within [0, 1], got ${this.backoff.jitterFraction}`);
    }
  }

  /**
   * Execute function with retry logic. All state is local to the call,
   * so one policy can serve concurrent operations.
   */
  async execute<T>(fn: () => Promise<T>): Promise<RetryResult<T>> {
    let attempt = 0;
    let totalDelay = 0;

    for (;;) {
      this.signal?.throwIfAborted();

      try {
        const result = await fn();
        return { result, attempts: attempt + 1, totalDelay };
      } catch (error) {
        attempt++;

        if (attempt >= this.maxAttempts || this.classifier(error) === 'fatal') {
          throw error;
        }

        const delay = computeBackoffDelay(attempt, this.backoff, this.random);
        totalDelay += delay;

        this.onRetry?.(error, attempt, delay);

        await this.sleep(delay, this.signal);
      }
    }
  }

  /**
   * Wrap an operation so every invocation goes through this policy
   */
  wrap<A extends unknown[], R>(operation: (...args: A) => Promise<R>): (...args: A) => Promise<R> {
    return async (...args: A) => {
      const { result } = await this.execute(() => operation(...args));
      return result;
    };
  }
}

export function createRetryPolicy(options?: RetryOptions): RetryPolicy {
  return new RetryPolicy(options);
}

/**
 * Higher-order form: returns `operation` with retry applied, same signature
 */
export function withRetry<A extends unknown[], R>(
  operation: (...args: A) => Promise<R>,
  options?: RetryOptions
): (...args: A) => Promise<R> {
  return new RetryPolicy(options).wrap(operation);
}

/**
 * Retry function with default options
 */
export async function retry<T>(fn: () => Promise<T>, options?: RetryOptions): Promise<RetryResult<T>> {
  return new RetryPolicy(options).execute(fn);
}
