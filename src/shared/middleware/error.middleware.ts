/**
 * =============================================================================
 * ERROR HANDLING MIDDLEWARE
 * =============================================================================
 *
 * Centralized error handling for all routes.
 *
 * SECURITY:
 * - Stack traces never reach clients
 * - Internal error messages are hidden in production
 * - All errors are logged server-side
 * =============================================================================
 */

import { Request, Response, NextFunction } from 'express';
import { logger } from '../services/logger.service';
import { AppError } from '../../core/errors/AppError';
import { ErrorCode, HTTP_STATUS } from '../../core/constants';
import { config } from '../../config/environment';

/**
 * Body-parser marks malformed JSON with type 'entity.parse.failed'
 */
function isBodyParseError(error: Error): boolean {
  return 'type' in error && error.type === 'entity.parse.failed';
}

/**
 * Global error handler middleware
 * Must be the last middleware in the chain
 */
export function errorHandler(
  error: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (error instanceof AppError) {
    const logData = {
      code: error.code,
      error: error.message,
      path: req.path,
      method: req.method,
      user: req.user?.username ?? 'anonymous'
    };
    if (error.isOperational) {
      logger.warn('Request rejected', logData);
    } else {
      logger.error('Request error', { ...logData, stack: error.stack });
    }

    res.status(error.statusCode).json(error.toJSON());
    return;
  }

  if (isBodyParseError(error)) {
    res.status(HTTP_STATUS.BAD_REQUEST).json({
      success: false,
      error: {
        code: ErrorCode.VALIDATION_ERROR,
        message: 'Malformed JSON body'
      }
    });
    return;
  }

  logger.error('Unhandled request error', {
    error: error.message,
    stack: error.stack,
    path: req.path,
    method: req.method
  });

  // SECURITY: Never expose internal error details to client
  res.status(HTTP_STATUS.INTERNAL_ERROR).json({
    success: false,
    error: {
      code: ErrorCode.INTERNAL_ERROR,
      message: config.isProduction
        ? 'An unexpected error occurred. Please try again later.'
        : error.message
    }
  });
}

/**
 * Async route wrapper to catch async errors
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
) {
  return (req: Request, res: Response, next: NextFunction): void => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

/**
 * Not found error handler
 */
export function notFoundHandler(req: Request, res: Response): void {
  res.status(HTTP_STATUS.NOT_FOUND).json({
    success: false,
    error: {
      code: ErrorCode.NOT_FOUND,
      message: `Cannot ${req.method} ${req.path}`
    }
  });
}
