/**
 * Application error taxonomy.
 * Services throw AppError for known, operational failures; anything else
 * reaching a boundary is treated as internal.
 */

import type { DomainError, FieldErrors } from '@domain/tickets';

export type AppErrorCode =
  | 'VALIDATION_FAILED'
  | 'UNAUTHORIZED'
  | 'FORBIDDEN'
  | 'NOT_FOUND'
  | 'INVALID_STATUS_TRANSITION'
  | 'CANNOT_ASSIGN_CLOSED'
  | 'TRANSIENT_INFRA'
  | 'INTERNAL_ERROR';

export class AppError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number = 500,
    public readonly isOperational: boolean = true,
    public readonly code: AppErrorCode = 'INTERNAL_ERROR',
    public readonly details?: unknown,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'AppError';
    Object.setPrototypeOf(this, AppError.prototype);
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Factory methods for common errors
   */
  static validation(fields: FieldErrors, message = 'Validation failed'): AppError {
    return new AppError(message, 422, true, 'VALIDATION_FAILED', { fields });
  }

  static unauthorized(message = 'Unauthorized', details?: unknown): AppError {
    return new AppError(message, 401, true, 'UNAUTHORIZED', details);
  }

  static forbidden(message = 'Forbidden', details?: unknown): AppError {
    return new AppError(message, 403, true, 'FORBIDDEN', details);
  }

  static notFound(resource = 'Resource', details?: unknown): AppError {
    return new AppError(`${resource} not found`, 404, true, 'NOT_FOUND', details);
  }

  /** Commit or connectivity failure. Surfaced to the caller, never retried here. */
  static transient(message: string, cause: unknown): AppError {
    return new AppError(message, 503, true, 'TRANSIENT_INFRA', undefined, { cause });
  }

  static internal(message = 'Internal server error', details?: unknown): AppError {
    return new AppError(message, 500, false, 'INTERNAL_ERROR', details);
  }

  /** Map a domain decision error onto the application taxonomy. */
  static fromDomain(error: DomainError): AppError {
    switch (error.code) {
      case 'VALIDATION_FAILED':
        return AppError.validation(error.fields, error.message);
      case 'INVALID_STATUS_TRANSITION':
        return new AppError(error.message, 409, true, 'INVALID_STATUS_TRANSITION', {
          from: error.from,
          to: error.to,
        });
      case 'CANNOT_ASSIGN_CLOSED':
        return new AppError(error.message, 409, true, 'CANNOT_ASSIGN_CLOSED');
      case 'TICKET_NOT_FOUND':
        return AppError.notFound('Ticket');
    }
  }
}

export const isAppError = (error: unknown): error is AppError => error instanceof AppError;
