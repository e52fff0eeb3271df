/**
 * Ingestion Context
 * Shared state of one pipeline run: the concurrency limiter, the failure
 * breaker, the retry policy and the failure ledger. Every Graph Loader call
 * goes through `call`, which retries around the limiter so a caller backing
 * off does not hold a slot.
 */

import { RateLimitError, describeError } from '@graphfeed/errors';
import { Logger } from '@graphfeed/logger';
import {
  ConcurrencyLimiter,
  ConsecutiveFailureBreaker,
  RetryPolicy,
  SleepFn,
  createErrorClassifier,
} from '@graphfeed/resilience';
import { IngestionConfig, RetrySettings } from '../config';
import { IngestionMetrics } from '../metrics/ingestion-metrics';
import { logger as defaultLogger } from '../utils/logger';
import { FailureRecorder } from './failure-recorder';

export interface IngestionContextOptions {
  concurrencyLimit: number;
  maxConsecutiveFailures: number;
  circuitBreakerCooldownMs: number;
  retry: RetrySettings;
  recorder: FailureRecorder;
  logger?: Logger;
  metrics?: IngestionMetrics;
  signal?: AbortSignal;
  /** Sleep used for backoff and cooldown, injectable for tests */
  sleep?: SleepFn;
  random?: () => number;
}

export type IngestionContextDependencies = Pick<
  IngestionContextOptions,
  'logger' | 'metrics' | 'signal' | 'sleep' | 'random'
> & { recorder?: FailureRecorder };

export class IngestionContext {
  readonly limiter: ConcurrencyLimiter;
  readonly breaker: ConsecutiveFailureBreaker;
  readonly retryPolicy: RetryPolicy;
  readonly recorder: FailureRecorder;
  readonly logger: Logger;
  readonly metrics: IngestionMetrics;
  readonly signal?: AbortSignal;

  constructor(options: IngestionContextOptions) {
    this.logger = options.logger ?? defaultLogger;
    this.metrics = options.metrics ?? new IngestionMetrics();
    this.recorder = options.recorder;
    this.signal = options.signal;

    this.limiter = new ConcurrencyLimiter({
      maxConcurrent: options.concurrencyLimit,
      onCapacity: (queued) => {
        this.logger.debug('Graph Loader call waiting for a slot', { queued });
      },
    });

    this.breaker = new ConsecutiveFailureBreaker({
      maxConsecutiveFailures: options.maxConsecutiveFailures,
      cooldownMs: options.circuitBreakerCooldownMs,
      sleep: options.sleep,
      onTrip: (consecutiveFailures, cooldownMs) => {
        this.metrics.recordCircuitBreakerPause();
        this.logger.warn('Circuit breaker tripped, pausing', { consecutiveFailures, cooldownMs });
      },
      onReset: () => {
        this.logger.info('Circuit breaker cooldown finished, resuming');
      },
    });

    this.retryPolicy = new RetryPolicy({
      maxAttempts: options.retry.maxAttempts,
      initialDelay: options.retry.initialDelay,
      maxDelay: options.retry.maxDelay,
      backoffFactor: options.retry.backoffFactor,
      jitterFraction: options.retry.jitterFraction,
      classifier: createErrorClassifier({
        retryableCodes: options.retry.retryableCodes,
        retryablePatterns: options.retry.retryablePatterns,
      }),
      sleep: options.sleep,
      random: options.random,
      signal: options.signal,
      onRetry: (error, attempt, delay) => {
        this.metrics.recordRetry();
        this.logger.warn('Retryable Graph Loader error, backing off', {
          attempt,
          delayMs: Math.round(delay),
          retryAfterMs: error instanceof RateLimitError ? error.retryAfter : undefined,
          error: describeError(error),
        });
      },
    });
  }

  static fromConfig(
    config: IngestionConfig,
    deps: IngestionContextDependencies = {}
  ): IngestionContext {
    return new IngestionContext({
      ...deps,
      concurrencyLimit: config.concurrencyLimit,
      maxConsecutiveFailures: config.maxConsecutiveFailures,
      circuitBreakerCooldownMs: config.circuitBreakerCooldownMs,
      retry: config.retry,
      recorder: deps.recorder ?? new FailureRecorder({ failedDir: config.failedDir, logger: deps.logger }),
    });
  }

  /**
   * Run one Graph Loader call: retry-wrapped, limiter-gated, abortable
   */
  async call<T>(operation: () => Promise<T>): Promise<T> {
    this.signal?.throwIfAborted();
    const { result } = await this.retryPolicy.execute(() => {
      this.signal?.throwIfAborted();
      return this.limiter.run(operation, this.signal);
    });
    return result;
  }
}
