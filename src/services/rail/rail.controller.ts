/**
 * Rail Controller
 *
 * Drives the simulated rail over HTTP: failure injection and funding of
 * external test accounts. Test/development only.
 */

import { Request, Response, NextFunction } from 'express';

import { ApiError } from '../../middlewares/errorHandler';
import { requireAmount } from '../../utils/amount';
import { SimulatedRail, FailureType, RejectionCode } from './rail.simulation';

interface SimulationConfigRequest {
  enabled: boolean;
  failureRate?: number;
  failMemos?: string[];
  failureType?: FailureType;
  rejectionCode?: RejectionCode;
  applyBeforeFailure?: boolean;
}

interface MintRequest {
  owner: string;
  subaccount?: string;
  amount: unknown;
}

export class RailController {
  constructor(private readonly rail: SimulatedRail | null) {}

  /**
   * GET /rail/simulation
   */
  async getSimulationConfig(_req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const rail = this.requireSimulation();

      res.status(200).json({
        success: true,
        data: {
          simulation: rail.getConfig(),
        },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /rail/simulation
   *
   * enabled=true updates the config, keeping omitted fields.
   * enabled=false disables simulation and clears failMemos.
   */
  async updateSimulationConfig(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const rail = this.requireSimulation();
      const { enabled, failureRate, failMemos, failureType, rejectionCode, applyBeforeFailure }: SimulationConfigRequest =
        req.body;

      if (enabled) {
        rail.enable({
          failureRate,
          failMemos: failMemos ? new Set(failMemos) : undefined,
          failureType,
          rejectionCode,
          applyBeforeFailure,
        });
      } else {
        rail.disable();
      }

      res.status(200).json({
        success: true,
        data: {
          simulation: rail.getConfig(),
        },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /rail/simulation/fail-memos
   */
  async addFailingMemos(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const rail = this.requireSimulation();
      const { memos }: { memos: string[] } = req.body;

      rail.addFailingMemos(memos);

      res.status(200).json({
        success: true,
        data: {
          simulation: rail.getConfig(),
        },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /rail/simulation/reset
   */
  async resetSimulation(_req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const rail = this.requireSimulation();

      rail.reset();

      res.status(200).json({
        success: true,
        data: {
          simulation: rail.getConfig(),
        },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /rail/simulation/mint
   * Give an external account funds to spend on the simulated rail
   */
  async mint(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const rail = this.requireSimulation();
      const { owner, subaccount, amount }: MintRequest = req.body;

      const parsed = requireAmount(amount);
      const account = { owner, subaccount };
      rail.mint(account, parsed);

      res.status(200).json({
        success: true,
        data: {
          owner,
          subaccount: subaccount ?? null,
          balance: rail.balanceOf(account).toString(),
        },
      });
    } catch (error) {
      next(error);
    }
  }

  private requireSimulation(): SimulatedRail {
    if (!SimulatedRail.isAllowed()) {
      throw ApiError.forbiddenInEnvironment('Simulation API only available in test/development environments');
    }
    if (!this.rail) {
      throw ApiError.forbiddenInEnvironment('The rail is not simulated in this deployment');
    }
    return this.rail;
  }
}
