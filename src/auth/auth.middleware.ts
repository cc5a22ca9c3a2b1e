import { Response, NextFunction } from 'express';
import { authService } from './auth.service';
import { AuthRequest } from './auth.types';
import { ApiError } from '../middlewares/errorHandler';
import { addLogContext } from '../observability';

export const authMiddleware = (req: AuthRequest, _res: Response, next: NextFunction): void => {
  try {
    const authHeader = req.headers.authorization;

    if (!authHeader) {
      throw new ApiError(401, 'No authorization header provided');
    }

    if (!authHeader.startsWith('Bearer ')) {
      throw new ApiError(401, 'Invalid authorization format. Use: Bearer <token>');
    }

    const token = authHeader.substring(7);

    if (!token) {
      throw new ApiError(401, 'No token provided');
    }

    const payload = authService.verifyToken(token);

    req.caller = payload.sub;
    addLogContext({ callerId: payload.sub });
    next();
  } catch (error) {
    next(error);
  }
};
