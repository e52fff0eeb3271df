import { AppError, ErrorContext } from './base-error';
import {
  AuthenticationError,
  InternalServerError,
  NotFoundError,
  RateLimitError,
  ServiceUnavailableError,
  TimeoutError,
  ValidationError,
} from './errors';

export const DEFAULT_RETRY_AFTER_MS = 60000;

/**
 * AppError for an HTTP status. Statuses without a class of their own become
 * InternalServerError with the status kept in context.
 */
export function errorFromStatus(status: number, message?: string, context?: ErrorContext): AppError {
  switch (status) {
    case 400:
    case 422:
      return new ValidationError(message ?? 'Request rejected', context);
    case 401:
    case 403:
      return new AuthenticationError(message ?? 'Not authorized', { ...context, statusCode: status });
    case 404:
      return new NotFoundError(message ?? 'Not found', context);
    case 429:
      return new RateLimitError(message ?? 'Rate limit exceeded', DEFAULT_RETRY_AFTER_MS, context);
    case 503:
      return new ServiceUnavailableError(message ?? 'Service unavailable', context);
    case 408:
    case 504:
      return new TimeoutError(message ?? 'Request timed out', context);
    default:
      return new InternalServerError(message ?? 'Internal server error', { ...context, statusCode: status });
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Message of any thrown value
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}
