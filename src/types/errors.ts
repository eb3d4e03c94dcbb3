/**
 * Error Codes for the ledger API
 *
 * Categorized by error type:
 * - 2xxx: Validation errors
 * - 3xxx: Business logic errors
 * - 5xxx: System errors
 */

export enum ErrorCode {
  // Validation errors (2xxx)
  INVALID_INPUT = 2001,
  MALFORMED_BODY = 2002,

  // Business errors (3xxx)
  CLIENT_NOT_FOUND = 3001,
  LIMIT_EXCEEDED = 3002,
  ROUTE_NOT_FOUND = 3003,

  // System errors (5xxx)
  INTERNAL_ERROR = 5001,
  STORAGE_UNAVAILABLE = 5002,
}

/**
 * Error code to HTTP status code mapping
 */
export const errorCodeToStatus: Record<ErrorCode, number> = {
  [ErrorCode.INVALID_INPUT]: 422,
  [ErrorCode.MALFORMED_BODY]: 422,

  [ErrorCode.CLIENT_NOT_FOUND]: 404,
  [ErrorCode.LIMIT_EXCEEDED]: 422,
  [ErrorCode.ROUTE_NOT_FOUND]: 404,

  [ErrorCode.INTERNAL_ERROR]: 500,
  [ErrorCode.STORAGE_UNAVAILABLE]: 503,
};

/**
 * Standard error response format
 */
export interface ErrorResponse {
  success: false;
  error: {
    code: ErrorCode;
    message: string;
    details?: Record<string, string[]>;
    timestamp: string;
    correlationId?: string;
  };
}
