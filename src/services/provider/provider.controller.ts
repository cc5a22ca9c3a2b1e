import { Response, NextFunction } from 'express';

import { authService } from '../../auth/auth.service';
import { AuthRequest } from '../../auth/auth.types';
import { unwrap } from '../../middlewares/errorHandler';
import { requireAmount, serializeEarnings } from '../../utils/amount';
import { QueryService } from '../query/query.service';
import { TransferCoordinator } from '../transfer/transfer.service';

export class ProviderController {
  constructor(
    private readonly coordinator: TransferCoordinator,
    private readonly queries: QueryService
  ) {}

  /**
   * Withdraw provider earnings to the caller's wallet
   * POST /providers/:id/withdraw
   */
  async withdraw(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const caller = authService.requireCaller(req);
      const amount = requireAmount(req.body.amount);

      const result = unwrap(await this.coordinator.withdrawProviderEarnings(req.params.id, amount, caller));

      res.status(200).json({
        success: true,
        data: {
          transferId: result.transferId,
          blockIndex: result.blockIndex.toString(),
        },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /providers/:id/earnings
   */
  async getEarnings(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const caller = authService.requireCaller(req);

      const totalEarnings = unwrap(this.queries.getProviderEarnings(req.params.id, caller));

      res.status(200).json({
        success: true,
        data: {
          providerId: req.params.id,
          totalEarnings: totalEarnings.toString(),
        },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /providers/:id/earnings/breakdown
   */
  async getEarningsBreakdown(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const caller = authService.requireCaller(req);

      const earnings = unwrap(this.queries.getProviderEarningsBreakdown(req.params.id, caller));

      res.status(200).json({
        success: true,
        data: {
          providerId: req.params.id,
          earnings: earnings.map(serializeEarnings),
        },
      });
    } catch (error) {
      next(error);
    }
  }
}
