/**
 * Campaign Controller
 *
 * Funding, withdrawals and provider payments for campaigns. Amounts leave
 * the service as decimal strings.
 */

import { Response, NextFunction } from 'express';

import { authService } from '../../auth/auth.service';
import { AuthRequest } from '../../auth/auth.types';
import { unwrap } from '../../middlewares/errorHandler';
import { requireAmount, serializeEarnings } from '../../utils/amount';
import { QueryService } from '../query/query.service';
import { TransferCoordinator } from '../transfer/transfer.service';

export class CampaignController {
  constructor(
    private readonly coordinator: TransferCoordinator,
    private readonly queries: QueryService
  ) {}

  /**
   * Fund a campaign from the caller's wallet
   * POST /campaigns/:id/fund
   */
  async fund(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const caller = authService.requireCaller(req);
      const amount = requireAmount(req.body.amount);

      const result = unwrap(await this.coordinator.fundCampaign(req.params.id, amount, caller));

      res.status(200).json({
        success: true,
        data: {
          transferId: result.transferId,
          blockIndex: result.blockIndex.toString(),
          credited: result.credited.toString(),
        },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Withdraw campaign budget to the caller's wallet
   * POST /campaigns/:id/withdraw
   */
  async withdraw(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const caller = authService.requireCaller(req);
      const amount = requireAmount(req.body.amount);

      const result = unwrap(await this.coordinator.withdrawCampaignFunds(req.params.id, amount, caller));

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
   * Pay a provider from the campaign's budget
   * POST /campaigns/:id/payments
   */
  async payProvider(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const caller = authService.requireCaller(req);
      const amount = requireAmount(req.body.amount);
      const providerId = String(req.body.providerId);

      const result = unwrap(this.coordinator.payProvider(req.params.id, providerId, amount, caller));

      res.status(200).json({
        success: true,
        data: {
          campaignBudget: result.campaign.budget.toString(),
          providerEarnings: result.provider.totalEarnings.toString(),
          earnings: serializeEarnings(result.earnings),
        },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /campaigns/:id/balance
   */
  async getBalance(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const caller = authService.requireCaller(req);

      const balance = unwrap(this.queries.getCampaignBalance(req.params.id, caller));

      res.status(200).json({
        success: true,
        data: {
          campaignId: req.params.id,
          balance: balance.toString(),
        },
      });
    } catch (error) {
      next(error);
    }
  }
}
