/**
 * Base class of every error graphfeed raises on purpose
 */

import { v4 as uuidv4 } from 'uuid';

export type ErrorContext = Record<string, unknown>;

export type ErrorSeverity = 'low' | 'medium' | 'high';

export interface SerializedAppError {
  error: string;
  message: string;
  errorId: string;
  occurredAt: string;
  statusCode: number;
  severity: ErrorSeverity;
  hint?: string;
  context?: ErrorContext;
}

export abstract class AppError extends Error {
  abstract readonly code: string;
  /** HTTP-style status, also read by the retry classifier */
  abstract readonly statusCode: number;
  abstract readonly severity: ErrorSeverity;

  readonly errorId = uuidv4();
  readonly occurredAt = new Date();

  constructor(
    message: string,
    readonly context?: ErrorContext,
    readonly hint?: string
  ) {
    super(message);
    this.name = new.target.name;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): SerializedAppError {
    return {
      error: this.code,
      message: this.message,
      errorId: this.errorId,
      occurredAt: this.occurredAt.toISOString(),
      statusCode: this.statusCode,
      severity: this.severity,
      hint: this.hint,
      // context may hold document text or request details
      context: process.env.NODE_ENV === 'production' ? undefined : this.context,
    };
  }
}
