/**
 * =============================================================================
 * AUTH MIDDLEWARE
 * =============================================================================
 *
 * Authentication and authorization middleware.
 * Tokens are issued by the identity service; this service only verifies them.
 *
 * CLAIMS:
 * - sub / username : who is acting (recorded as createdBy / assignedBy)
 * - role           : ADMIN | DISPATCHER | TECHNICIAN
 * - technicianId   : identity-service user id, required for technician actions
 *
 * SECURITY:
 * - Token validation on every request
 * - Role-based access control
 * - No trust by default
 * =============================================================================
 */

import { Request, Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { config } from '../../config/environment';
import { ErrorCode, UserRole } from '../../core/constants';
import { ForbiddenError, UnauthorizedError } from '../../core/errors/AppError';
import { logger } from '../services/logger.service';

export interface AuthUser {
  username: string;
  role: UserRole;
  technicianId: number | null;
}

/**
 * Extended Request type with user info
 */
declare global {
  namespace Express {
    interface Request {
      user?: AuthUser;
    }
  }
}

const tokenClaimsSchema = z.object({
  sub: z.string().min(1).optional(),
  username: z.string().min(1).optional(),
  role: z.nativeEnum(UserRole),
  technicianId: z.coerce.number().int().positive().optional()
}).refine(claims => claims.sub || claims.username, { message: 'Token has no subject' });

/**
 * Auth middleware - validates JWT token
 * Must be applied to all protected routes
 */
export function authMiddleware(req: Request, _res: Response, next: NextFunction): void {
  const authHeader = req.headers.authorization;

  if (!authHeader || !authHeader.startsWith('Bearer ')) {
    next(new UnauthorizedError('Authentication required'));
    return;
  }

  const token = authHeader.substring(7); // Remove 'Bearer '

  let decoded: string | jwt.JwtPayload;
  try {
    decoded = jwt.verify(token, config.jwt.secret);
  } catch (error) {
    if (error instanceof jwt.TokenExpiredError) {
      next(new UnauthorizedError('Token has expired', ErrorCode.TOKEN_EXPIRED));
    } else if (error instanceof jwt.JsonWebTokenError) {
      next(new UnauthorizedError('Invalid token', ErrorCode.INVALID_TOKEN));
    } else {
      logger.error('Auth middleware error', {
        error: error instanceof Error ? error.message : String(error)
      });
      next(new UnauthorizedError('Authentication failed'));
    }
    return;
  }

  const claims = tokenClaimsSchema.safeParse(decoded);
  if (!claims.success) {
    next(new UnauthorizedError('Invalid token claims', ErrorCode.INVALID_TOKEN));
    return;
  }

  req.user = {
    username: claims.data.username ?? claims.data.sub ?? '',
    role: claims.data.role,
    technicianId: claims.data.technicianId ?? null
  };

  next();
}

/**
 * Role guard - restricts access to specific roles
 * Must be used after authMiddleware
 */
export function roleGuard(allowedRoles: readonly UserRole[]) {
  return (req: Request, _res: Response, next: NextFunction): void => {
    if (!req.user) {
      next(new UnauthorizedError('Authentication required'));
      return;
    }

    if (!allowedRoles.includes(req.user.role)) {
      logger.warn('Access denied - insufficient role', {
        username: req.user.username,
        role: req.user.role,
        requiredRoles: allowedRoles,
        path: req.path
      });
      next(new ForbiddenError('Insufficient permissions'));
      return;
    }

    next();
  };
}

/**
 * The authenticated user, for handlers behind authMiddleware
 */
export function currentUser(req: Request): AuthUser {
  if (!req.user) {
    throw new UnauthorizedError('Authentication required');
  }
  return req.user;
}

/**
 * The acting technician's id, from the verified token claim
 */
export function currentTechnicianId(req: Request): number {
  const user = currentUser(req);
  if (user.technicianId === null) {
    throw new ForbiddenError('Token carries no technician id');
  }
  return user.technicianId;
}
