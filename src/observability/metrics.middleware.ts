import { Request, Response, NextFunction } from 'express';
import { httpRequestsTotal, httpRequestDuration } from './metrics';

/**
 * Normalize path to prevent high cardinality in metrics
 * Campaign and provider ids are opaque, so every segment after a
 * resource collection is treated as an id.
 */
export const normalizePath = (path: string): string => {
  return path
    .replace(/^\/(campaigns|providers)\/[^/]+/, '/$1/:id')
    .replace(/\/\d+/g, '/:id');
};

/**
 * Get the route pattern from Express request
 * Falls back to normalized path if no route is available
 */
const getRoutePath = (req: Request): string => {
  const routePath: unknown = req.route?.path;
  if (typeof routePath === 'string') {
    return (req.baseUrl || '') + routePath;
  }

  return normalizePath(req.path);
};

/**
 * HTTP metrics middleware
 * Records request count and duration for Prometheus
 */
export const metricsMiddleware = (req: Request, res: Response, next: NextFunction): void => {
  // Skip metrics for the metrics endpoint itself
  if (req.path === '/metrics') {
    next();
    return;
  }

  const start = process.hrtime.bigint();

  res.on('finish', () => {
    const durationSeconds = Number(process.hrtime.bigint() - start) / 1e9;

    const labels = {
      method: req.method,
      path: getRoutePath(req),
      status: res.statusCode.toString(),
    };

    httpRequestsTotal.inc(labels);
    httpRequestDuration.observe(labels, durationSeconds);
  });

  next();
};
