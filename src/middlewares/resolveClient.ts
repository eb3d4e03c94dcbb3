import { Request, Response, NextFunction } from 'express';

import { clientRegistry } from '../services/ledger';
import { addLogContext } from '../observability';
import { ApiError } from './errorHandler';

const CLIENT_ID_PATTERN = /^[1-9]\d{0,15}$/;

/**
 * Path ids that are not positive integers can never name a provisioned client
 */
export const parseClientId = (raw: unknown): number | null => {
  if (typeof raw !== 'string' || !CLIENT_ID_PATTERN.test(raw)) return null;
  const id = Number(raw);
  return Number.isSafeInteger(id) ? id : null;
};

/**
 * Resolves :id to a provisioned client before any body validation runs,
 * so an unknown client is always a 404 whatever the payload looks like
 */
export const resolveClient = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
  const clientId = parseClientId(req.params.id);

  try {
    if (clientId === null || !(await clientRegistry.has(clientId))) {
      throw ApiError.clientNotFound(req.params.id);
    }
  } catch (error) {
    next(error instanceof ApiError ? error : ApiError.storageUnavailable('Client registry unavailable', error));
    return;
  }

  res.locals.clientId = clientId;
  addLogContext({ clientId });
  next();
};

/**
 * Client id stored by resolveClient
 */
export const getClientId = (res: Response): number => {
  const clientId: unknown = res.locals.clientId;
  if (typeof clientId !== 'number') {
    throw ApiError.internal('Client was not resolved for this route');
  }
  return clientId;
};
