/**
 * Type definitions for @graphfeed/resilience
 */

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export type ErrorClassification = 'retryable' | 'fatal';

export type ErrorClassifier = (error: unknown) => ErrorClassification;

export interface ErrorClassifierOptions {
  /** HTTP statuses treated as retryable (default: [429]) */
  retryableStatusCodes?: number[];

  /** Structured error codes treated as retryable, compared case-insensitively */
  retryableCodes?: string[];

  /** Substrings searched case-insensitively in the error message */
  retryablePatterns?: string[];
}

export interface RetryOptions {
  /** Total number of calls, first attempt included (default: 6) */
  maxAttempts?: number;

  /** Delay before the first retry in milliseconds (default: 500) */
  initialDelay?: number;

  /** Maximum delay in milliseconds (default: 30000) */
  maxDelay?: number;

  /** Backoff multiplier (default: 2) */
  backoffFactor?: number;

  /** Symmetric jitter as a fraction of the computed delay (default: 0.3) */
  jitterFraction?: number;

  /** Decides whether an error is worth another attempt */
  classifier?: ErrorClassifier;

  /** Injected sleep, mostly for tests */
  sleep?: SleepFn;

  /** Random source in [0, 1) used for jitter */
  random?: () => number;

  /** Callback before each backoff sleep */
  onRetry?: (error: unknown, attempt: number, delay: number) => void;

  /** Stops further attempts and interrupts a pending backoff */
  signal?: AbortSignal;
}

export interface RetryResult<T> {
  result: T;
  attempts: number;
  totalDelay: number;
}

export interface ConcurrencyLimiterOptions {
  /** Maximum concurrent executions (default: 1) */
  maxConcurrent?: number;

  /** Callback when a caller has to wait for a slot */
  onCapacity?: (queued: number) => void;
}

export interface ConcurrencyLimiterStats {
  inFlight: number;
  queued: number;
  maxConcurrent: number;
  peakInFlight: number;
}

export interface FailureBreakerOptions {
  /** Consecutive failures that trigger a pause (default: 3) */
  maxConsecutiveFailures?: number;

  /** Pause duration in milliseconds (default: 60000) */
  cooldownMs?: number;

  /** Injected sleep, mostly for tests */
  sleep?: SleepFn;

  /** Callback when the breaker trips, before the pause starts */
  onTrip?: (consecutiveFailures: number, cooldownMs: number) => void;

  /** Callback when the pause is over and the counter was reset */
  onReset?: () => void;
}

export interface FailureBreakerStats {
  consecutiveFailures: number;
  pauses: number;
  coolingDown: boolean;
}
