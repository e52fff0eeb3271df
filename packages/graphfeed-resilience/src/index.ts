/**
 * @graphfeed/resilience
 * Resilience patterns for rate-limited graph ingestion
 */

import { RetryPolicy } from './patterns/retry';
import { ConcurrencyLimiter } from './patterns/concurrency-limiter';
import { ConcurrencyLimiterOptions, RetryOptions } from './types';

export { RetryPolicy, createRetryPolicy, withRetry, retry, computeBackoffDelay } from './patterns/retry';
export type { BackoffParameters } from './patterns/retry';
export {
  createErrorClassifier,
  defaultErrorClassifier,
  DEFAULT_RETRYABLE_STATUS_CODES,
  DEFAULT_RETRYABLE_CODES,
  DEFAULT_RETRYABLE_PATTERNS,
} from './patterns/error-classifier';
export { ConcurrencyLimiter, createConcurrencyLimiter } from './patterns/concurrency-limiter';
export { ConsecutiveFailureBreaker, createFailureBreaker } from './patterns/circuit-breaker';
export { sleep } from './patterns/sleep';

export type {
  SleepFn,
  ErrorClassification,
  ErrorClassifier,
  ErrorClassifierOptions,
  RetryOptions,
  RetryResult,
  ConcurrencyLimiterOptions,
  ConcurrencyLimiterStats,
  FailureBreakerOptions,
  FailureBreakerStats,
} from './types';

export interface ResilientExecutor {
  execute<T>(fn: () => Promise<T>): Promise<T>;
  limiter: ConcurrencyLimiter;
  retryPolicy: RetryPolicy;
}

/**
 * Create a resilient executor: retry wraps the limiter, so a caller backing
 * off between attempts does not hold a slot.
 */
export function createResilientExecutor(options: {
  limiter?: ConcurrencyLimiterOptions;
  retry?: RetryOptions;
} = {}): ResilientExecutor {
  const limiter = new ConcurrencyLimiter(options.limiter);
  const retryPolicy = new RetryPolicy(options.retry);
  const signal = options.retry?.signal;

  return {
    limiter,
    retryPolicy,
    async execute<T>(fn: () => Promise<T>): Promise<T> {
      const { result } = await retryPolicy.execute(() => limiter.run(fn, signal));
      return result;
    },
  };
}
