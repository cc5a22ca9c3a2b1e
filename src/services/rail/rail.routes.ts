/**
 * Rail API Routes
 *
 * Failure simulation and test funding for the simulated rail
 * (test/development only)
 */

import { Router, Request, Response, NextFunction } from 'express';
import { RailController } from './rail.controller';
import { failMemosValidation, mintValidation, simulationConfigValidation } from './rail.validation';
import { validateRequest } from '../../middlewares/validateRequest';

export const createRailRoutes = (railController: RailController): Router => {
  const router = Router();

  /**
   * GET /rail/simulation
   * Get current simulation configuration
   */
  router.get(
    '/simulation',
    (req: Request, res: Response, next: NextFunction) =>
      railController.getSimulationConfig(req, res, next)
  );

  /**
   * POST /rail/simulation
   * Update simulation configuration
   */
  router.post(
    '/simulation',
    simulationConfigValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) =>
      railController.updateSimulationConfig(req, res, next)
  );

  /**
   * POST /rail/simulation/fail-memos
   * Fail every transfer carrying one of these memos
   */
  router.post(
    '/simulation/fail-memos',
    failMemosValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) =>
      railController.addFailingMemos(req, res, next)
  );

  /**
   * POST /rail/simulation/reset
   * Reset simulation state
   */
  router.post(
    '/simulation/reset',
    (req: Request, res: Response, next: NextFunction) =>
      railController.resetSimulation(req, res, next)
  );

  /**
   * POST /rail/simulation/mint
   * Fund an external account
   */
  router.post(
    '/simulation/mint',
    mintValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => railController.mint(req, res, next)
  );

  return router;
};
