/**
 * Rate Limiting Middleware
 *
 * Provides rate limiting for API endpoints using Redis store
 * to ensure distributed rate limiting across multiple instances.
 *
 * Environment-based configuration:
 * - Production: Strict limits to prevent abuse
 * - Development: Relaxed limits for easier testing
 * - Test: Very lenient limits for automated tests
 *
 * Set RATE_LIMIT_DISABLED=true to disable all rate limiting
 */

import { NextFunction, Request, RequestHandler, Response } from 'express';
import rateLimit, { RateLimitRequestHandler } from 'express-rate-limit';
import RedisStore from 'rate-limit-redis';

import { AuthRequest } from '../auth/auth.types';
import { config } from '../config';
import { RATE_LIMIT_CONFIG } from '../config/environments';
import { getRedisClient } from '../config/redis';
import { logger } from '../observability';
import { ErrorCode } from '../types/errors';

/**
 * Create a Redis store for rate limiting
 * Falls back to memory store in test environment
 */
const createStore = (prefix: string) => {
  if (config.isTest) {
    return undefined; // Use default memory store in tests
  }

  const client = getRedisClient();
  return new RedisStore({
    // @ts-expect-error - RedisStore expects a specific sendCommand signature
    sendCommand: (...args: string[]) => client.call(...args),
    prefix: `rl:${prefix}:`,
  });
};

/**
 * No-op middleware that passes through (used when rate limiting is disabled)
 */
const noopLimiter: RequestHandler = (_req: Request, _res: Response, next: NextFunction) => next();

const createLimiter = (limiter: () => RateLimitRequestHandler): RequestHandler => {
  if (RATE_LIMIT_CONFIG.disabled) {
    logger.warn('Rate limiting is DISABLED via RATE_LIMIT_DISABLED=true');
    return noopLimiter;
  }
  return limiter();
};

const limitExceeded = (code: ErrorCode, message: string) => ({
  success: false,
  error: {
    code,
    message,
    timestamp: new Date().toISOString(),
  },
});

/**
 * Authenticated routes count per caller, anonymous ones per IP
 */
const callerKey = (req: AuthRequest): string => req.caller || req.ip || 'unknown';

/**
 * Global rate limiter
 * Applied to all routes
 * Configurable via RATE_LIMIT_WINDOW_MS and RATE_LIMIT_MAX_REQUESTS
 */
export const globalLimiter: RequestHandler = createLimiter(() =>
  rateLimit({
    store: createStore('global'),
    windowMs: RATE_LIMIT_CONFIG.global.windowMs,
    max: RATE_LIMIT_CONFIG.global.maxRequests,
    standardHeaders: true,
    legacyHeaders: false,
    // Redis trouble lifts the limit instead of failing the request
    passOnStoreError: true,
    message: limitExceeded(ErrorCode.RATE_LIMIT_EXCEEDED, 'Too many requests, please try again later'),
    skip: (req) => {
      // Skip rate limiting for health checks and metrics
      return req.path === '/health' || req.path === '/health/live' || req.path === '/metrics';
    },
  })
);

/**
 * Transfer rate limiter
 * Applied to funding, withdrawals and payments
 * Configurable via TRANSFER_RATE_LIMIT_WINDOW_MS and TRANSFER_RATE_LIMIT_MAX
 */
export const transferLimiter: RequestHandler = createLimiter(() =>
  rateLimit({
    store: createStore('transfer'),
    windowMs: RATE_LIMIT_CONFIG.transfer.windowMs,
    max: RATE_LIMIT_CONFIG.transfer.maxRequests,
    standardHeaders: true,
    legacyHeaders: false,
    passOnStoreError: true,
    message: limitExceeded(ErrorCode.TOO_MANY_TRANSFERS, 'Too many transfers, please try again later'),
    keyGenerator: callerKey,
    validate: false,
  })
);

/**
 * Query rate limiter for balance and earnings reads
 * Configurable via QUERY_RATE_LIMIT_WINDOW_MS and QUERY_RATE_LIMIT_MAX
 */
export const queryLimiter: RequestHandler = createLimiter(() =>
  rateLimit({
    store: createStore('query'),
    windowMs: RATE_LIMIT_CONFIG.query.windowMs,
    max: RATE_LIMIT_CONFIG.query.maxRequests,
    standardHeaders: true,
    legacyHeaders: false,
    passOnStoreError: true,
    message: limitExceeded(ErrorCode.RATE_LIMIT_EXCEEDED, 'Query rate limit exceeded, please slow down'),
    keyGenerator: callerKey,
    validate: false,
  })
);
