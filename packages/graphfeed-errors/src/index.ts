/**
 * @graphfeed/errors
 */

export { AppError } from './base-error';
export type { ErrorContext, ErrorSeverity, SerializedAppError } from './base-error';
export {
  ValidationError,
  ConfigurationError,
  AuthenticationError,
  NotFoundError,
  RateLimitError,
  InternalServerError,
  ServiceUnavailableError,
  TimeoutError,
  ExternalAPIError,
  ChunkingError,
} from './errors';
export { DEFAULT_RETRY_AFTER_MS, errorFromStatus, isAppError, describeError } from './factory';
