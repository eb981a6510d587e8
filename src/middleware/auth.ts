import { Request, Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { config } from '../config';
import { UnauthorizedError, ForbiddenError } from '../utils/errors';
import logger from '../utils/logger';

// Extend Express Request to include user
declare global {
  namespace Express {
    interface Request {
      user?: AuthUser;
    }
  }
}

export type Role = 'USER' | 'ADMIN';

export interface AuthUser {
  account: string;
  role: Role;
}

const tokenClaimsSchema = z.object({
  sub: z.string().min(1),
  role: z.enum(['USER', 'ADMIN']).default('USER'),
});

/**
 * Authentication middleware - validates JWT token; `sub` is the ledger account
 */
export const authenticate = (
  req: Request,
  _res: Response,
  next: NextFunction
): void => {
  try {
    const authHeader = req.headers.authorization;

    if (!authHeader) {
      throw new UnauthorizedError('No authorization header provided');
    }

    const [type, token] = authHeader.split(' ');

    if (type !== 'Bearer' || !token) {
      throw new UnauthorizedError('Invalid authorization format. Use: Bearer <token>');
    }

    const decoded = jwt.verify(token, config.jwt.secret, { issuer: config.jwt.issuer });
    const claims = tokenClaimsSchema.safeParse(decoded);

    if (!claims.success) {
      throw new UnauthorizedError('Token is missing required claims');
    }

    req.user = {
      account: claims.data.sub,
      role: claims.data.role,
    };

    logger.debug('User authenticated', { account: req.user.account, role: req.user.role });
    next();
  } catch (error) {
    if (error instanceof jwt.TokenExpiredError) {
      next(new UnauthorizedError('Token has expired'));
    } else if (error instanceof jwt.JsonWebTokenError) {
      next(new UnauthorizedError('Invalid token'));
    } else {
      next(error);
    }
  }
};

/**
 * Authorization middleware - checks user role
 */
export const authorize = (...allowedRoles: Role[]) => {
  return (req: Request, _res: Response, next: NextFunction): void => {
    if (!req.user) {
      return next(new UnauthorizedError('Authentication required'));
    }

    if (!allowedRoles.includes(req.user.role)) {
      return next(new ForbiddenError('Insufficient permissions'));
    }

    next();
  };
};

/**
 * Account of the authenticated caller
 */
export const callerOf = (req: Request): string => {
  if (!req.user) {
    throw new UnauthorizedError('Authentication required');
  }
  return req.user.account;
};

export default { authenticate, authorize, callerOf };
