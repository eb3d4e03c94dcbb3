import { Request, Response, NextFunction } from 'express';
import { v4 as uuid } from 'uuid';

import { asyncLocalStorage, LogContext } from './log-context';
import { logger } from './logger';

const MAX_CORRELATION_ID_LENGTH = 128;

const readHeader = (req: Request, name: string): string | undefined => {
  const value = req.headers[name];
  const first = Array.isArray(value) ? value[0] : value;
  if (!first || first.length > MAX_CORRELATION_ID_LENGTH) return undefined;
  return first;
};

/**
 * Correlation ID middleware
 * - Reuses x-correlation-id / x-request-id when present, otherwise generates one
 * - Stores it in AsyncLocalStorage for the request lifecycle
 * - Echoes it in the response headers
 */
export const correlationMiddleware = (req: Request, res: Response, next: NextFunction): void => {
  const correlationId =
    readHeader(req, 'x-correlation-id') || readHeader(req, 'x-request-id') || uuid();

  res.setHeader('x-correlation-id', correlationId);

  const context: LogContext = { correlationId };
  const startedAt = process.hrtime.bigint();

  asyncLocalStorage.run(context, () => {
    logger.debug({ correlationId, method: req.method, path: req.path }, 'Request started');

    res.on('finish', () => {
      const durationMs = Number(process.hrtime.bigint() - startedAt) / 1e6;
      logger.info(
        {
          correlationId,
          clientId: context.clientId,
          method: req.method,
          path: req.path,
          statusCode: res.statusCode,
          durationMs,
        },
        'Request completed'
      );
    });

    next();
  });
};
