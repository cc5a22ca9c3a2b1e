import { Router, Request, Response, NextFunction } from 'express';

import { authMiddleware } from '../../auth/auth.middleware';
import { queryLimiter } from '../../middlewares/rateLimiter';

import { TransferController } from './transfer.controller';

export const createTransferRoutes = (transferController: TransferController): Router => {
  const router = Router();

  router.use(authMiddleware);

  // GET /transfers/unreconciled - Transfers left STUCK, oldest first
  router.get(
    '/unreconciled',
    queryLimiter,
    (req: Request, res: Response, next: NextFunction) => transferController.listUnreconciled(req, res, next)
  );

  return router;
};
