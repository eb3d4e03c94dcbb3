/**
 * Error Handling Middleware
 *
 * Provides centralized error handling with consistent error response format,
 * error logging, and error sanitization for production.
 */

import { Request, Response, NextFunction } from 'express';
import { config } from '../config';
import { logger, getCorrelationId } from '../observability';
import { ErrorCode, ErrorResponse, errorCodeToStatus } from '../types/errors';

/**
 * Extended Error interface with additional properties
 */
export interface AppError extends Error {
  statusCode?: number;
  errorCode?: ErrorCode;
  isOperational?: boolean;
  validationErrors?: Record<string, string[]>;
}

/**
 * API Error class for throwing operational errors
 */
export class ApiError extends Error implements AppError {
  statusCode: number;
  errorCode: ErrorCode;
  isOperational: boolean;
  validationErrors?: Record<string, string[]>;

  constructor(
    errorCode: ErrorCode,
    message: string,
    options?: {
      statusCode?: number;
      isOperational?: boolean;
      validationErrors?: Record<string, string[]>;
      cause?: unknown;
    }
  ) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ApiError';
    this.errorCode = errorCode;
    this.statusCode = options?.statusCode || errorCodeToStatus[errorCode] || 500;
    this.isOperational = options?.isOperational ?? true;
    this.validationErrors = options?.validationErrors;
    Error.captureStackTrace(this, this.constructor);
  }

  static clientNotFound(clientId: number | string): ApiError {
    return new ApiError(ErrorCode.CLIENT_NOT_FOUND, `Client ${clientId} not found`);
  }

  static invalidInput(
    message: string,
    validationErrors?: Record<string, string[]>
  ): ApiError {
    return new ApiError(ErrorCode.INVALID_INPUT, message, { validationErrors });
  }

  static limitExceeded(message = 'Transaction would exceed the overdraft limit'): ApiError {
    return new ApiError(ErrorCode.LIMIT_EXCEEDED, message);
  }

  static storageUnavailable(message = 'Ledger storage unavailable', cause?: unknown): ApiError {
    return new ApiError(ErrorCode.STORAGE_UNAVAILABLE, message, { cause });
  }

  static internal(message = 'Internal server error'): ApiError {
    return new ApiError(ErrorCode.INTERNAL_ERROR, message, {
      isOperational: false,
    });
  }
}

/**
 * body-parser rejects unparsable JSON with type 'entity.parse.failed'
 */
const isBodyParseError = (err: unknown): boolean => {
  return err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';
};

/**
 * Main error handler middleware
 *
 * Catches all errors and returns a consistent JSON response format.
 * Logs errors with correlation ID for traceability.
 */
export const errorHandler = (
  err: AppError,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const correlationId = getCorrelationId() || 'unknown';

  const errorCode = isBodyParseError(err)
    ? ErrorCode.MALFORMED_BODY
    : err.errorCode || ErrorCode.INTERNAL_ERROR;
  const statusCode =
    errorCode === ErrorCode.MALFORMED_BODY
      ? errorCodeToStatus[errorCode]
      : err.statusCode || errorCodeToStatus[errorCode] || 500;

  const logFields = {
    correlationId,
    errorCode,
    statusCode,
    error: err.message,
    path: req.path,
    method: req.method,
    isOperational: err.isOperational,
  };

  if (statusCode >= 500) {
    logger.error({ ...logFields, stack: config.isDevelopment ? err.stack : undefined }, `Error: ${err.message}`);
  } else {
    logger.debug(logFields, `Rejected: ${err.message}`);
  }

  // Sanitize error message for production 5xx errors
  const message =
    config.isProduction && statusCode >= 500
      ? 'Internal server error'
      : errorCode === ErrorCode.MALFORMED_BODY
      ? 'Request body is not valid JSON'
      : err.message || 'An error occurred';

  const response: ErrorResponse = {
    success: false,
    error: {
      code: errorCode,
      message,
      timestamp: new Date().toISOString(),
      correlationId,
    },
  };

  if (err.validationErrors) {
    response.error.details = err.validationErrors;
  }

  res.status(statusCode).json(response);
};

/**
 * Not found handler for unmatched routes
 */
export const notFoundHandler = (req: Request, res: Response, _next: NextFunction): void => {
  const correlationId = getCorrelationId() || 'unknown';

  const response: ErrorResponse = {
    success: false,
    error: {
      code: ErrorCode.ROUTE_NOT_FOUND,
      message: `Route ${req.method} ${req.path} not found`,
      timestamp: new Date().toISOString(),
      correlationId,
    },
  };

  res.status(404).json(response);
};

/**
 * Async handler wrapper to catch errors in async route handlers
 */
export const asyncHandler = (
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
) => {
  return (req: Request, res: Response, next: NextFunction): void => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
};
