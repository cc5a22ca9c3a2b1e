import { Response, NextFunction } from 'express';
import { authService } from './auth.service';
import { AuthRequest } from './auth.types';

export class AuthController {
  /**
   * GET /auth/me
   * Echo the identity the token was verified for
   */
  async me(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const caller = authService.requireCaller(req);

      res.status(200).json({
        success: true,
        data: { caller },
      });
    } catch (error) {
      next(error);
    }
  }
}

export const authController = new AuthController();
