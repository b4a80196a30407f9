/**
 * =============================================================================
 * APPLICATION ERROR CLASSES
 * =============================================================================
 *
 * Every failure the dispatch engine reports is one of these.
 *
 * USAGE:
 * ```typescript
 * // In service
 * throw new TaskNotFoundError(taskId);
 *
 * // In route handler
 * throw new ValidationError('Invalid page', [{ field: 'page', message: 'must be >= 0' }]);
 * ```
 *
 * The error middleware maps statusCode/code straight onto the HTTP response.
 * =============================================================================
 */

import { ErrorCode, HTTP_STATUS } from '../constants';

/**
 * Base Application Error
 * All custom errors extend this class
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: ErrorCode | string;
  public readonly isOperational: boolean;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    statusCode: number = HTTP_STATUS.INTERNAL_ERROR,
    code: ErrorCode | string = ErrorCode.INTERNAL_ERROR,
    isOperational: boolean = true,
    details?: Record<string, unknown>
  ) {
    super(message);

    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    this.details = details;

    Error.captureStackTrace(this, this.constructor);

    // Set prototype explicitly (TypeScript issue with extending Error)
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): ErrorResponse {
    return {
      success: false,
      error: {
        code: this.code,
        message: this.message,
        ...(this.details && { details: this.details })
      }
    };
  }
}

/**
 * Error response format
 */
export interface ErrorResponse {
  success: false;
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
}

// =============================================================================
// BOUNDARY ERRORS
// =============================================================================

export interface ValidationErrorDetail {
  field: string;
  message: string;
}

/**
 * 400 Validation Error - input outside its allowed shape or range
 */
export class ValidationError extends AppError {
  public readonly errors: ValidationErrorDetail[];

  constructor(message: string = 'Validation failed', errors: ValidationErrorDetail[] = []) {
    super(
      message,
      HTTP_STATUS.BAD_REQUEST,
      ErrorCode.VALIDATION_ERROR,
      true,
      errors.length > 0 ? { errors } : undefined
    );
    this.errors = errors;
  }

  static fromZodError(zodError: { errors: Array<{ path: (string | number)[]; message: string }> }): ValidationError {
    const errors = zodError.errors.map(err => ({
      field: err.path.join('.'),
      message: err.message
    }));
    return new ValidationError('Validation failed', errors);
  }
}

/**
 * 401 Unauthorized - missing or bad token
 */
export class UnauthorizedError extends AppError {
  constructor(message: string = 'Authentication required', code: ErrorCode = ErrorCode.UNAUTHORIZED) {
    super(message, HTTP_STATUS.UNAUTHORIZED, code, true);
  }
}

/**
 * 403 Forbidden - authenticated but not allowed
 */
export class ForbiddenError extends AppError {
  constructor(message: string = 'Insufficient permissions') {
    super(message, HTTP_STATUS.FORBIDDEN, ErrorCode.FORBIDDEN, true);
  }
}

/**
 * 500 Internal Server Error - unexpected failure
 */
export class InternalError extends AppError {
  constructor(message: string = 'Internal server error', details?: Record<string, unknown>) {
    super(message, HTTP_STATUS.INTERNAL_ERROR, ErrorCode.INTERNAL_ERROR, false, details);
  }
}

// =============================================================================
// DISPATCH ERRORS
// =============================================================================

export class TaskNotFoundError extends AppError {
  public readonly taskId: string;

  constructor(taskId: string) {
    super(`Task not found: ${taskId}`, HTTP_STATUS.NOT_FOUND, ErrorCode.TASK_NOT_FOUND, true, { taskId });
    this.taskId = taskId;
  }
}

/**
 * Directory rejected the technician, or could not be reached while failing closed.
 * The reason is the tail of the message, e.g. "not found" or "is not active".
 */
export class TechnicianNotFoundError extends AppError {
  public readonly technicianId: number;
  public readonly reason: string;

  constructor(technicianId: number, reason: string) {
    super(
      `Technician ${technicianId} ${reason}`,
      HTTP_STATUS.NOT_FOUND,
      ErrorCode.TECHNICIAN_NOT_FOUND,
      true,
      { technicianId, reason }
    );
    this.technicianId = technicianId;
    this.reason = reason;
  }
}

export class InvalidAssignmentError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, HTTP_STATUS.BAD_REQUEST, ErrorCode.INVALID_ASSIGNMENT, true, details);
  }
}

export class InvalidStatusTransitionError extends AppError {
  public readonly currentStatus: string;
  public readonly requestedStatus: string;

  constructor(currentStatus: string, requestedStatus: string, message?: string) {
    super(
      message ?? `Cannot transition task from ${currentStatus} to ${requestedStatus}`,
      HTTP_STATUS.BAD_REQUEST,
      ErrorCode.INVALID_STATUS_TRANSITION,
      true,
      { currentStatus, requestedStatus }
    );
    this.currentStatus = currentStatus;
    this.requestedStatus = requestedStatus;
  }
}
