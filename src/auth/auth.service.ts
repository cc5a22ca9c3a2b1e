import jwt, { VerifyOptions } from 'jsonwebtoken';

import { config } from '../config';
import { ApiError } from '../middlewares/errorHandler';
import { Principal } from '../types/custody';

import { AuthRequest, JWTPayload } from './auth.types';

export class AuthService {
  verifyToken(token: string): JWTPayload {
    const options: VerifyOptions = {
      issuer: config.jwt.issuer,
      audience: config.jwt.audience,
    };

    let decoded: string | jwt.JwtPayload;
    try {
      decoded = jwt.verify(token, config.jwt.secret, options);
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        throw ApiError.tokenExpired();
      }
      if (error instanceof jwt.JsonWebTokenError) {
        throw ApiError.invalidToken();
      }
      throw ApiError.invalidToken('Token verification failed');
    }

    if (typeof decoded === 'string' || typeof decoded.sub !== 'string' || decoded.sub.length === 0) {
      throw ApiError.invalidToken('Token does not name a caller');
    }

    return { sub: decoded.sub, iat: decoded.iat, exp: decoded.exp };
  }

  /**
   * The verified caller of an authenticated request
   */
  requireCaller(req: AuthRequest): Principal {
    if (!req.caller) {
      throw ApiError.unauthorized('Authentication required');
    }
    return req.caller;
  }
}

export const authService = new AuthService();
