/**
 * Idempotency Middleware
 *
 * Replays the stored response when a request repeats its
 * X-Idempotency-Key. A funding or withdrawal sent twice by a client that
 * lost the first reply is answered from the cache instead of reaching the
 * rail again. A key is bound to the request it first came with; reusing it
 * for another amount or entity is refused.
 */

import { createHash } from 'crypto';
import { Request, Response, NextFunction } from 'express';

import { AuthRequest } from '../auth/auth.types';
import { config } from '../config';
import { getRedisClient, isRedisConnected } from '../config/redis';
import { logger } from '../observability';
import { ErrorCode } from '../types/errors';

import { ApiError } from './errorHandler';

/**
 * Cached response structure
 */
interface CachedResponse {
  fingerprint: string;
  statusCode: number;
  body: unknown;
  headers: Record<string, string>;
  cachedAt: string;
}

/**
 * Idempotency key TTL (24 hours)
 */
const IDEMPOTENCY_TTL = 24 * 60 * 60; // 24 hours in seconds

const KEY_PATTERN = /^[a-zA-Z0-9_-]{1,64}$/;

/**
 * Outcomes a client is expected to retry: entity busy, rate limited,
 * storage unavailable. Caching them would replay the refusal forever.
 */
const RETRYABLE_STATUSES = new Set([409, 429, 503]);

/**
 * Digest of what the request asks for, so a reused key cannot carry a
 * different transfer
 */
export const requestFingerprint = (method: string, url: string, body: unknown): string =>
  createHash('sha256')
    .update(`${method} ${url} ${JSON.stringify(body ?? null)}`)
    .digest('hex');

/**
 * Idempotency middleware
 *
 * Usage:
 * - Client sends X-Idempotency-Key header with a unique key
 * - First request: processed normally, response cached
 * - Subsequent requests with same key: cached response returned
 *
 * Keys are scoped per caller to prevent cross-caller conflicts.
 */
export const idempotencyMiddleware = async (
  req: AuthRequest,
  res: Response,
  next: NextFunction
): Promise<void> => {
  const idempotencyKey = req.get('X-Idempotency-Key');

  // Idempotency is optional - if no key, proceed normally
  if (!idempotencyKey) {
    next();
    return;
  }

  // Skip in test environment or if Redis is not connected
  if (config.isTest || !isRedisConnected()) {
    next();
    return;
  }

  const callerId = req.caller || req.ip || 'anonymous';
  const cacheKey = `idempotency:${callerId}:${idempotencyKey}`;
  const fingerprint = requestFingerprint(req.method, req.originalUrl, req.body);

  try {
    const redis = getRedisClient();

    const cached = await redis.get(cacheKey);

    if (cached) {
      const cachedResponse: CachedResponse = JSON.parse(cached);

      if (cachedResponse.fingerprint !== fingerprint) {
        logger.warn({ idempotencyKey, callerId }, 'Idempotency key reused for a different request');
        next(
          new ApiError(
            ErrorCode.INVALID_INPUT,
            'X-Idempotency-Key was already used for a different request'
          )
        );
        return;
      }

      logger.info(
        {
          idempotencyKey,
          callerId,
          cachedAt: cachedResponse.cachedAt,
        },
        'Returning cached idempotent response'
      );

      Object.entries(cachedResponse.headers).forEach(([key, value]) => {
        res.setHeader(key, value);
      });

      res.setHeader('X-Idempotent-Replayed', 'true');

      res.status(cachedResponse.statusCode).json(cachedResponse.body);
      return;
    }

    // No cached response - intercept the response to cache it
    const originalJson = res.json.bind(res);

    res.json = function (body: unknown) {
      if (RETRYABLE_STATUSES.has(res.statusCode)) {
        return originalJson(body);
      }

      const responseToCache: CachedResponse = {
        fingerprint,
        statusCode: res.statusCode,
        body,
        headers: {
          'content-type': String(res.getHeader('content-type') || 'application/json'),
        },
        cachedAt: new Date().toISOString(),
      };

      redis
        .setex(cacheKey, IDEMPOTENCY_TTL, JSON.stringify(responseToCache))
        .then(() => {
          logger.debug(
            {
              idempotencyKey,
              callerId,
              statusCode: res.statusCode,
            },
            'Cached idempotent response'
          );
        })
        .catch((err: unknown) => {
          logger.error({ err, idempotencyKey }, 'Failed to cache idempotent response');
        });

      return originalJson(body);
    };

    next();
  } catch (error) {
    // Redis trouble must not block the transfer itself
    logger.error({ err: error, idempotencyKey }, 'Idempotency middleware error');
    next();
  }
};

/**
 * Idempotency middleware for specific methods only (POST, PUT, PATCH)
 * GET and DELETE are naturally idempotent
 */
export const idempotencyForMutations = async (
  req: AuthRequest,
  res: Response,
  next: NextFunction
): Promise<void> => {
  const mutationMethods = ['POST', 'PUT', 'PATCH'];

  if (!mutationMethods.includes(req.method)) {
    next();
    return;
  }

  return idempotencyMiddleware(req, res, next);
};

/**
 * Validate idempotency key format
 * Keys should be alphanumeric with dashes/underscores, max 64 chars
 */
export const validateIdempotencyKey = (req: Request, _res: Response, next: NextFunction): void => {
  const idempotencyKey = req.get('X-Idempotency-Key');

  if (idempotencyKey === undefined) {
    next();
    return;
  }

  if (!KEY_PATTERN.test(idempotencyKey)) {
    next(
      new ApiError(
        ErrorCode.INVALID_INPUT,
        'Invalid X-Idempotency-Key format. Must be alphanumeric with dashes/underscores, max 64 characters.'
      )
    );
    return;
  }

  next();
};
