/**
 * Error hierarchy - Unit Tests
 */

import {
  AppError,
  AuthenticationError,
  ChunkingError,
  ConfigurationError,
  ExternalAPIError,
  InternalServerError,
  NotFoundError,
  RateLimitError,
  ServiceUnavailableError,
  TimeoutError,
  ValidationError,
  describeError,
  errorFromStatus,
  isAppError,
} from '../index';

describe('error classes', () => {
  it('should carry code, status, severity and name per class', () => {
    const error = new ChunkingError('window did not advance', { start: 10 });

    expect(error).toBeInstanceOf(AppError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('ChunkingError');
    expect(error.code).toBe('CHUNKING_ERROR');
    expect(error.statusCode).toBe(500);
    expect(error.severity).toBe('high');
    expect(error.context).toEqual({ start: 10 });
  });

  it('should give ConfigurationError a hint', () => {
    const error = new ConfigurationError('bad settings');

    expect(error.code).toBe('CONFIGURATION_ERROR');
    expect(error.statusCode).toBe(400);
    expect(error.hint).toBe('Fix the listed environment variables and restart');
  });

  it('should fold the cause into ExternalAPIError', () => {
    const error = new ExternalAPIError('graph-loader', 'load', new Error('connect ECONNREFUSED'), {
      code: 'ECONNREFUSED',
    });

    expect(error.message).toBe('External API error: graph-loader load - connect ECONNREFUSED');
    expect(error.code).toBe('EXTERNAL_API_ERROR');
    expect(error.statusCode).toBe(502);
    expect(error.context).toEqual({
      code: 'ECONNREFUSED',
      service: 'graph-loader',
      operation: 'load',
      cause: 'connect ECONNREFUSED',
    });
  });

  it('should leave the cause out of the message when there is none', () => {
    expect(new ExternalAPIError('graph-loader', 'loadBulk').message).toBe('External API error: graph-loader loadBulk');
  });

  it('should keep the wait of a RateLimitError', () => {
    const error = new RateLimitError('slow down', 3000);

    expect(error.retryAfter).toBe(3000);
    expect(error.hint).toBe('Wait 3000ms before retrying');
  });

  it('should give each error its own id', () => {
    expect(new ValidationError('a').errorId).not.toBe(new ValidationError('a').errorId);
  });

  it('should serialize to JSON with context outside production', () => {
    const error = new NotFoundError('no such episode', { name: 'doc_segment_0' });

    expect(error.toJSON()).toEqual({
      error: 'NOT_FOUND',
      message: 'no such episode',
      errorId: error.errorId,
      occurredAt: error.occurredAt.toISOString(),
      statusCode: 404,
      severity: 'low',
      hint: undefined,
      context: { name: 'doc_segment_0' },
    });
  });
});

describe('errorFromStatus', () => {
  it('should map 429 to a RateLimitError with the default wait', () => {
    const error = errorFromStatus(429, 'slow down');

    expect(error).toBeInstanceOf(RateLimitError);
    expect(error).toMatchObject({ message: 'slow down', retryAfter: 60000 });
  });

  it('should map known statuses to their classes', () => {
    expect(errorFromStatus(400)).toBeInstanceOf(ValidationError);
    expect(errorFromStatus(422)).toBeInstanceOf(ValidationError);
    expect(errorFromStatus(404)).toBeInstanceOf(NotFoundError);
    expect(errorFromStatus(503)).toBeInstanceOf(ServiceUnavailableError);
    expect(errorFromStatus(408)).toBeInstanceOf(TimeoutError);
    expect(errorFromStatus(504)).toBeInstanceOf(TimeoutError);
  });

  it('should keep the status of an authorization failure', () => {
    const error = errorFromStatus(403, undefined, { service: 'graph-loader' });

    expect(error).toBeInstanceOf(AuthenticationError);
    expect(error.message).toBe('Not authorized');
    expect(error.context).toEqual({ service: 'graph-loader', statusCode: 403 });
  });

  it('should fall back to InternalServerError and keep the status', () => {
    const error = errorFromStatus(502, undefined, { service: 'graph-loader' });

    expect(error).toBeInstanceOf(InternalServerError);
    expect(error.message).toBe('Internal server error');
    expect(error.context).toEqual({ service: 'graph-loader', statusCode: 502 });
  });
});

describe('describeError', () => {
  it('should describe any thrown value', () => {
    expect(describeError(new Error('boom'))).toBe('boom');
    expect(describeError('plain text')).toBe('plain text');
    expect(describeError({ status: 500 })).toBe('{"status":500}');
    expect(describeError(undefined)).toBe('undefined');
  });
});

describe('isAppError', () => {
  it('should only accept AppError instances', () => {
    expect(isAppError(new ValidationError('bad'))).toBe(true);
    expect(isAppError(new Error('bad'))).toBe(false);
    expect(isAppError({ code: 'VALIDATION_ERROR', statusCode: 400 })).toBe(false);
  });
});
