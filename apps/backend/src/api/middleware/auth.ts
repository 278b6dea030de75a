import { Request, Response, NextFunction } from 'express';
import { verifyToken } from '../../utils/jwt';
import { ForbiddenError, UnauthorizedError } from '../../utils/errors';
import { JwtPayload } from '../../types';

declare global {
  namespace Express {
    interface Request {
      user?: JwtPayload;
    }
  }
}

export const authenticate = (req: Request, res: Response, next: NextFunction) => {
  try {
    const authHeader = req.headers.authorization;

    if (!authHeader || !authHeader.startsWith('Bearer ')) {
      throw new UnauthorizedError('No token provided');
    }

    const token = authHeader.slice('Bearer '.length).trim();
    req.user = verifyToken(token);

    next();
  } catch (error) {
    next(error);
  }
};

export const requireAdmin = (req: Request, res: Response, next: NextFunction) => {
  if (!req.user) {
    next(new UnauthorizedError('No token provided'));
    return;
  }

  if (req.user.role !== 'admin') {
    next(new ForbiddenError('Admin privileges required'));
    return;
  }

  next();
};

export default authenticate;
