/**
 * =============================================================================
 * API RESPONSE BUILDER
 * =============================================================================
 *
 * Standardized success envelope for all API endpoints.
 *
 * RESPONSE FORMAT:
 * ```json
 * {
 *   "success": true,
 *   "data": { ... },
 *   "message": "Optional success message",
 *   "meta": { "timestamp": "..." }
 * }
 * ```
 * =============================================================================
 */

import { Response } from 'express';
import { HTTP_STATUS } from '../constants';

/**
 * Success response format
 */
export interface SuccessResponse<T> {
  success: true;
  data: T;
  message?: string;
  meta?: ResponseMeta;
}

/**
 * Response metadata
 */
export interface ResponseMeta {
  timestamp?: string;
  [key: string]: unknown;
}

export class ApiResponse {
  /**
   * 200 OK
   */
  static success<T>(
    res: Response,
    data: T,
    message?: string,
    meta?: Omit<ResponseMeta, 'timestamp'>
  ): Response {
    const response: SuccessResponse<T> = {
      success: true,
      data,
      ...(message && { message }),
      meta: {
        timestamp: new Date().toISOString(),
        ...meta
      }
    };
    return res.status(HTTP_STATUS.OK).json(response);
  }

  /**
   * 201 Created
   */
  static created<T>(res: Response, data: T, message: string = 'Resource created successfully'): Response {
    const response: SuccessResponse<T> = {
      success: true,
      data,
      message,
      meta: {
        timestamp: new Date().toISOString()
      }
    };
    return res.status(HTTP_STATUS.CREATED).json(response);
  }

  /**
   * Success response for list endpoints (with count)
   */
  static list<T>(res: Response, data: T[], message?: string): Response {
    return this.success(res, data, message, { count: data.length });
  }
}
