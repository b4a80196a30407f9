/**
 * =============================================================================
 * VALIDATION UTILITIES
 * =============================================================================
 *
 * Shared validation schemas and helpers.
 * Used across all modules for consistent validation.
 *
 * SECURITY:
 * - Strict schema validation
 * - Reject unknown fields on request bodies
 * =============================================================================
 */

import { z } from 'zod';
import { Request, Response, NextFunction } from 'express';
import { ValidationError } from '../../core/errors/AppError';
import { logger } from '../services/logger.service';

// ============================================================
// COMMON SCHEMAS
// ============================================================

/**
 * Technician id - identity service user ids are positive integers.
 * Path and query params arrive as strings, so coerce.
 */
export const technicianIdSchema = z.coerce.number({
  invalid_type_error: 'Technician ID must be a number'
}).int().positive('Technician ID must be positive');

/**
 * Integer query param that falls back to a default when absent or unparseable
 */
export function lenientIntParam(defaultValue: number) {
  return z.preprocess(value => {
    if (typeof value !== 'string' || value.trim() === '') return defaultValue;
    const parsed = Number(value);
    return Number.isInteger(parsed) ? parsed : defaultValue;
  }, z.number().int());
}

// ============================================================
// VALIDATION HELPERS
// ============================================================

/**
 * Synchronous schema validation - validates data and returns parsed result
 * Throws ValidationError on validation failure
 *
 * @returns Validated and transformed data
 */
export function validateSchema<T extends z.ZodTypeAny>(
  schema: T,
  data: unknown
): z.infer<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw ValidationError.fromZodError(result.error);
  }
  return result.data;
}

/**
 * Request validation middleware
 * Validates request body against a Zod schema and replaces it with the parsed value
 */
export function validateRequest<T extends z.ZodTypeAny>(schema: T) {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const result = schema.safeParse(req.body);

    if (!result.success) {
      const error = ValidationError.fromZodError(result.error);
      logger.debug('Request body validation failed', {
        path: req.path,
        errors: error.errors
      });
      next(error);
      return;
    }

    // Replace body with validated data (includes transforms)
    req.body = result.data;
    next();
  };
}
