import type { NextFunction, Request, RequestHandler, Response } from 'express';
import type { AuthenticateUseCase } from '../../../application/auth/authenticate.js';
import { ForbiddenError, UnauthorizedError } from '../../../application/errors.js';
import { hasAtLeastRole, type Role, type User } from '../../../domain/auth/user.js';
import { asyncHandler } from './asyncHandler.js';

export interface AuthRequest extends Request {
  user?: User;
}

const BEARER_PREFIX = 'Bearer ';

/**
 * Resolve the bearer token to a user and attach it to the request.
 */
export function authMiddleware(authenticate: AuthenticateUseCase) {
  return asyncHandler(async (req: AuthRequest, _res: Response, next: NextFunction) => {
    const authHeader = req.headers.authorization;

    if (!authHeader || !authHeader.startsWith(BEARER_PREFIX)) {
      throw new UnauthorizedError('Missing or invalid authorization header');
    }

    const token = authHeader.substring(BEARER_PREFIX.length).trim();
    req.user = await authenticate.execute(token);
    next();
  });
}

/** The authenticated user. Only valid behind authMiddleware. */
export function currentUser(req: AuthRequest): User {
  if (!req.user) {
    throw new UnauthorizedError('Not authenticated');
  }
  return req.user;
}

/**
 * Gate on a minimum role. Mount after authMiddleware.
 */
export function requireRole(required: Role) {
  return (req: AuthRequest, _res: Response, next: NextFunction): void => {
    try {
      const user = currentUser(req);
      if (!hasAtLeastRole(user.role, required)) {
        throw new ForbiddenError(`Requires ${required} role`);
      }
      next();
    } catch (error) {
      next(error);
    }
  };
}

/** Guards handed to every router that needs them. */
export interface RouteGuards {
  /** Any authenticated user. */
  requireAuth: RequestHandler;
  /** Admin or above. */
  requireAdmin: RequestHandler;
}
