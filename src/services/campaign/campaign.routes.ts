import { Router, Request, Response, NextFunction } from 'express';

import { authMiddleware } from '../../auth/auth.middleware';
import { idempotencyForMutations, validateIdempotencyKey } from '../../middlewares/idempotency';
import { queryLimiter, transferLimiter } from '../../middlewares/rateLimiter';
import { validateRequest } from '../../middlewares/validateRequest';

import { CampaignController } from './campaign.controller';
import {
  campaignBalanceValidation,
  fundCampaignValidation,
  payProviderValidation,
  withdrawCampaignValidation,
} from './campaign.validation';

export const createCampaignRoutes = (campaignController: CampaignController): Router => {
  const router = Router();

  // All campaign routes require authentication
  router.use(authMiddleware);

  // POST /campaigns/:id/fund - Move value from the caller's wallet into the budget
  router.post(
    '/:id/fund',
    transferLimiter,
    validateIdempotencyKey,
    fundCampaignValidation,
    validateRequest,
    idempotencyForMutations,
    (req: Request, res: Response, next: NextFunction) => campaignController.fund(req, res, next)
  );

  // POST /campaigns/:id/withdraw - Move budget back to the caller's wallet
  router.post(
    '/:id/withdraw',
    transferLimiter,
    validateIdempotencyKey,
    withdrawCampaignValidation,
    validateRequest,
    idempotencyForMutations,
    (req: Request, res: Response, next: NextFunction) => campaignController.withdraw(req, res, next)
  );

  // POST /campaigns/:id/payments - Pay a provider out of the budget
  router.post(
    '/:id/payments',
    transferLimiter,
    validateIdempotencyKey,
    payProviderValidation,
    validateRequest,
    idempotencyForMutations,
    (req: Request, res: Response, next: NextFunction) => campaignController.payProvider(req, res, next)
  );

  // GET /campaigns/:id/balance - Current budget
  router.get(
    '/:id/balance',
    queryLimiter,
    campaignBalanceValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => campaignController.getBalance(req, res, next)
  );

  return router;
};
