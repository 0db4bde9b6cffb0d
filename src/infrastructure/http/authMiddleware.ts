import type { RequestHandler, Response } from 'express';

import { UnauthorizedError, logger } from '@observatory/shared';

import type { AuthService, AuthenticatedUser } from '../../application/services/authService';
import type { UserRole } from '../../domain/user';

export interface AuthMiddleware {
  authenticate: RequestHandler;
  requireRole(role: UserRole | UserRole[]): RequestHandler[];
  requireSuperAdmin(): RequestHandler[];
}

export function createAuthMiddleware(authService: AuthService): AuthMiddleware {
  const authenticate: RequestHandler = (req, res, next) => {
    const authHeader = req.header('authorization');
    if (!authHeader?.startsWith('Bearer ')) {
      res.status(401).json({ error: 'UnauthorizedError', message: 'Missing bearer token' });
      return;
    }

    const token = authHeader.replace('Bearer ', '').trim();

    try {
      const user = authService.verifyAccessToken(token);
      res.locals.authUser = user;
      updateLoggerContext(res, { userId: user.id, actorRole: user.role });
      next();
    } catch (error) {
      const message = error instanceof UnauthorizedError ? error.message : 'Invalid token';
      res.status(401).json({ error: 'UnauthorizedError', message });
    }
  };

  const requireRole = (role: UserRole | UserRole[]): RequestHandler[] => {
    const allowedRoles = Array.isArray(role) ? role : [role];
    return [
      authenticate,
      (_req, res, next) => {
        const user = res.locals.authUser;
        if (!user || !allowedRoles.includes(user.role)) {
          res.status(403).json({ error: 'ForbiddenError', message: 'Insufficient role' });
          return;
        }
        next();
      }
    ];
  };

  const requireSuperAdmin = (): RequestHandler[] => [
    ...requireRole('admin'),
    (_req, res, next) => {
      if (!res.locals.authUser?.superAdmin) {
        res.status(403).json({ error: 'ForbiddenError', message: 'Only superadmin can delete user accounts.' });
        return;
      }
      next();
    }
  ];

  return { authenticate, requireRole, requireSuperAdmin };
}

/** The user set by `authenticate`; routes behind it can rely on it. */
export function currentUser(res: Response): AuthenticatedUser {
  const user = res.locals.authUser;
  if (!user) {
    throw new UnauthorizedError('Authentication required');
  }
  return user;
}

function updateLoggerContext(res: Response, extra: { userId: number; actorRole: UserRole }): void {
  const merged = {
    ...(res.locals.logContext ?? {}),
    ...extra
  };
  res.locals.logContext = merged;
  res.locals.logger = logger.withContext(merged);
}
