import { Request, Response, NextFunction } from 'express';
import { v4 as uuid } from 'uuid';

import { asyncLocalStorage, LogContext } from './log-context';
import { logger } from './logger';

// Inbound ids end up in every log line and in journal lookups; anything else is replaced
const INBOUND_ID_PATTERN = /^[A-Za-z0-9._:-]{1,128}$/;

/**
 * The caller's correlation id when it is usable, a fresh one otherwise
 */
export const resolveCorrelationId = (inbound: string | undefined): string =>
  inbound !== undefined && INBOUND_ID_PATTERN.test(inbound) ? inbound : uuid();

/**
 * Opens the request's log context and echoes its correlation id in
 * `x-correlation-id`
 */
export const correlationMiddleware = (req: Request, res: Response, next: NextFunction): void => {
  const correlationId = resolveCorrelationId(req.get('x-correlation-id') ?? req.get('x-request-id'));
  const startedAt = process.hrtime.bigint();

  res.setHeader('x-correlation-id', correlationId);

  const context: LogContext = { correlationId };

  asyncLocalStorage.run(context, () => {
    logger.debug({ method: req.method, path: req.path }, 'Request started');

    res.on('finish', () => {
      // The context object outlives the request, so callerId set by auth is visible here
      logger.info(
        {
          correlationId,
          callerId: context.callerId,
          method: req.method,
          path: req.path,
          statusCode: res.statusCode,
          durationMs: Number(process.hrtime.bigint() - startedAt) / 1e6,
        },
        'Request completed'
      );
    });

    next();
  });
};
