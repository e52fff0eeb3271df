/**
 * Error Classifier
 * Separates transient rate-limit/quota failures from fatal ones. Structured
 * shapes (status codes, error codes) are checked before message text.
 */

import { isAppError, describeError } from '@graphfeed/errors';
import { ErrorClassifier, ErrorClassifierOptions } from '../types';

export const DEFAULT_RETRYABLE_STATUS_CODES: readonly number[] = [429];

export const DEFAULT_RETRYABLE_CODES: readonly string[] = [
  'RATE_LIMIT_EXCEEDED',
  'RESOURCE_EXHAUSTED',
  'RATE_LIMITED',
  'INSUFFICIENT_QUOTA',
];

export const DEFAULT_RETRYABLE_PATTERNS: readonly string[] = [
  'rate limit',
  'rate_limited',
  '429',
  'quota',
  'resource_exhausted',
  'resource exhausted',
  'insufficient_quota',
  'too many requests',
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Status code carried by common client error shapes:
 * `statusCode`, `status`, or an axios-style `response.status`
 */
function extractStatus(error: Record<string, unknown>): number | undefined {
  for (const key of ['statusCode', 'status']) {
    const value = error[key];
    if (typeof value === 'number') {
      return value;
    }
  }
  const response = error.response;
  if (isRecord(response) && typeof response.status === 'number') {
    return response.status;
  }
  return undefined;
}

/**
 * Own `code` first, then `context.code`, where wrapping errors keep the cause's code
 */
function extractCodes(error: Record<string, unknown>): string[] {
  const codes: string[] = [];
  if (typeof error.code === 'string') {
    codes.push(error.code);
  }
  const context = error.context;
  if (isRecord(context) && typeof context.code === 'string') {
    codes.push(context.code);
  }
  return codes;
}

export function createErrorClassifier(options: ErrorClassifierOptions = {}): ErrorClassifier {
  const statusCodes = new Set(options.retryableStatusCodes ?? DEFAULT_RETRYABLE_STATUS_CODES);
  const codes = new Set((options.retryableCodes ?? DEFAULT_RETRYABLE_CODES).map((code) => code.toUpperCase()));
  const patterns = (options.retryablePatterns ?? DEFAULT_RETRYABLE_PATTERNS).map((pattern) => pattern.toLowerCase());

  return (error: unknown) => {
    if (error === null || error === undefined) {
      return 'fatal';
    }

    if (isAppError(error) && statusCodes.has(error.statusCode)) {
      return 'retryable';
    }

    if (isRecord(error)) {
      const status = extractStatus(error);
      if (status !== undefined && statusCodes.has(status)) {
        return 'retryable';
      }

      if (extractCodes(error).some((code) => codes.has(code.toUpperCase()))) {
        return 'retryable';
      }
    }

    const message = describeError(error).toLowerCase();
    return patterns.some((pattern) => message.includes(pattern)) ? 'retryable' : 'fatal';
  };
}

export const defaultErrorClassifier: ErrorClassifier = createErrorClassifier();
