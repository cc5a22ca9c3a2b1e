import { Router, Request, Response, NextFunction } from 'express';

import { authMiddleware } from '../../auth/auth.middleware';
import { idempotencyForMutations, validateIdempotencyKey } from '../../middlewares/idempotency';
import { queryLimiter, transferLimiter } from '../../middlewares/rateLimiter';
import { validateRequest } from '../../middlewares/validateRequest';

import { ProviderController } from './provider.controller';
import { providerEarningsValidation, withdrawProviderValidation } from './provider.validation';

export const createProviderRoutes = (providerController: ProviderController): Router => {
  const router = Router();

  // All provider routes require authentication
  router.use(authMiddleware);

  // POST /providers/:id/withdraw - Move earnings to the caller's wallet
  router.post(
    '/:id/withdraw',
    transferLimiter,
    validateIdempotencyKey,
    withdrawProviderValidation,
    validateRequest,
    idempotencyForMutations,
    (req: Request, res: Response, next: NextFunction) => providerController.withdraw(req, res, next)
  );

  // GET /providers/:id/earnings - Total earnings
  router.get(
    '/:id/earnings',
    queryLimiter,
    providerEarningsValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => providerController.getEarnings(req, res, next)
  );

  // GET /providers/:id/earnings/breakdown - Earnings per campaign
  router.get(
    '/:id/earnings/breakdown',
    queryLimiter,
    providerEarningsValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) =>
      providerController.getEarningsBreakdown(req, res, next)
  );

  return router;
};
