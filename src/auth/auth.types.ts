import { Request } from 'express';

import { Principal } from '../types/custody';

/**
 * Claims this service reads from a bearer token. Tokens are issued
 * elsewhere; `sub` names the caller.
 */
export interface JWTPayload {
  sub: Principal;
  iat?: number;
  exp?: number;
}

export interface AuthRequest extends Request {
  caller?: Principal;
}
