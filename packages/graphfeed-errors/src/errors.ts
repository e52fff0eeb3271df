import { AppError, ErrorContext } from './base-error';

/** Input that cannot be processed as given: a record, a chunking argument, an episode */
export class ValidationError extends AppError {
  readonly code = 'VALIDATION_ERROR';
  readonly statusCode = 400;
  readonly severity = 'low';
}

export class ConfigurationError extends AppError {
  readonly code = 'CONFIGURATION_ERROR';
  readonly statusCode = 400;
  readonly severity = 'high';

  constructor(message: string, context?: ErrorContext) {
    super(message, context, 'Fix the listed environment variables and restart');
  }
}

/** Rejected credentials (401) or permissions (403); the status stays in context */
export class AuthenticationError extends AppError {
  readonly code = 'AUTHENTICATION_ERROR';
  readonly statusCode = 401;
  readonly severity = 'medium';

  constructor(message: string, context?: ErrorContext) {
    super(message, context, 'Check GRAPH_LOADER_API_KEY');
  }
}

export class NotFoundError extends AppError {
  readonly code = 'NOT_FOUND';
  readonly statusCode = 404;
  readonly severity = 'low';
}

export class RateLimitError extends AppError {
  readonly code = 'RATE_LIMIT_EXCEEDED';
  readonly statusCode = 429;
  readonly severity = 'medium';

  constructor(
    message: string,
    /** Milliseconds the server asked to wait */
    readonly retryAfter: number,
    context?: ErrorContext
  ) {
    super(message, context, `Wait ${retryAfter}ms before retrying`);
  }
}

export class InternalServerError extends AppError {
  readonly code = 'INTERNAL_SERVER_ERROR';
  readonly statusCode = 500;
  readonly severity = 'high';
}

export class ServiceUnavailableError extends AppError {
  readonly code = 'SERVICE_UNAVAILABLE';
  readonly statusCode = 503;
  readonly severity = 'high';
}

export class TimeoutError extends AppError {
  readonly code = 'TIMEOUT';
  readonly statusCode = 504;
  readonly severity = 'medium';
}

/**
 * A call to another service failed before any response arrived.
 * A transport code such as ECONNREFUSED is kept in `context.code`.
 */
export class ExternalAPIError extends AppError {
  readonly code = 'EXTERNAL_API_ERROR';
  readonly statusCode = 502;
  readonly severity = 'high';

  constructor(service: string, operation: string, cause?: Error, context?: ErrorContext) {
    super(
      `External API error: ${service} ${operation}${cause ? ` - ${cause.message}` : ''}`,
      { ...context, service, operation, cause: cause?.message },
      `Check that ${service} is reachable`
    );
  }
}

/** A chunking invariant did not hold; a bug, never bad input */
export class ChunkingError extends AppError {
  readonly code = 'CHUNKING_ERROR';
  readonly statusCode = 500;
  readonly severity = 'high';
}
