import { Router, Request, Response, NextFunction } from 'express';

import { queryLimiter } from '../middlewares/rateLimiter';

import { authController } from './auth.controller';
import { authMiddleware } from './auth.middleware';

export const createAuthRoutes = (): Router => {
  const router = Router();

  // GET /auth/me - The identity this service sees for the bearer token
  router.get(
    '/me',
    authMiddleware,
    queryLimiter,
    (req: Request, res: Response, next: NextFunction) => authController.me(req, res, next)
  );

  return router;
};
