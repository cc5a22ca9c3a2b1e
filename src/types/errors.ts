/**
 * Error Codes for the custody API
 *
 * Categorized by error type:
 * - 1xxx: Authentication and authorization errors
 * - 2xxx: Validation errors
 * - 3xxx: Business logic errors
 * - 4xxx: Rate limiting errors
 * - 5xxx: System errors
 */

export enum ErrorCode {
  // Authentication errors (1xxx)
  UNAUTHORIZED = 1001,
  INVALID_TOKEN = 1002,
  TOKEN_EXPIRED = 1003,
  NOT_RECORD_OWNER = 1005,

  // Validation errors (2xxx)
  VALIDATION_ERROR = 2001,
  INVALID_AMOUNT = 2002,
  INVALID_INPUT = 2003,

  // Business errors (3xxx)
  INSUFFICIENT_BALANCE = 3001,
  RESOURCE_NOT_FOUND = 3010,
  CAMPAIGN_NOT_FOUND = 3011,
  PROVIDER_NOT_FOUND = 3012,
  ENTITY_BUSY = 3013,
  TRANSFER_REJECTED = 3014,

  // Rate limiting errors (4xxx)
  RATE_LIMIT_EXCEEDED = 4001,
  TOO_MANY_TRANSFERS = 4003,

  // System errors (5xxx)
  INTERNAL_ERROR = 5001,
  DATABASE_ERROR = 5002,
  REDIS_ERROR = 5003,
  FORBIDDEN_IN_ENVIRONMENT = 5004,
  TRANSFER_INDETERMINATE = 5006,
  STORAGE_ERROR = 5007,
}

/**
 * Error code to HTTP status code mapping
 */
export const errorCodeToStatus: Record<ErrorCode, number> = {
  // Auth errors -> 401/403
  [ErrorCode.UNAUTHORIZED]: 401,
  [ErrorCode.INVALID_TOKEN]: 401,
  [ErrorCode.TOKEN_EXPIRED]: 401,
  [ErrorCode.NOT_RECORD_OWNER]: 403,

  // Validation errors -> 400
  [ErrorCode.VALIDATION_ERROR]: 400,
  [ErrorCode.INVALID_AMOUNT]: 400,
  [ErrorCode.INVALID_INPUT]: 400,

  // Business errors -> 400/404/409/422
  [ErrorCode.INSUFFICIENT_BALANCE]: 400,
  [ErrorCode.RESOURCE_NOT_FOUND]: 404,
  [ErrorCode.CAMPAIGN_NOT_FOUND]: 404,
  [ErrorCode.PROVIDER_NOT_FOUND]: 404,
  [ErrorCode.ENTITY_BUSY]: 409,
  [ErrorCode.TRANSFER_REJECTED]: 422,

  // Rate limiting errors -> 429
  [ErrorCode.RATE_LIMIT_EXCEEDED]: 429,
  [ErrorCode.TOO_MANY_TRANSFERS]: 429,

  // System errors -> 5xx
  [ErrorCode.INTERNAL_ERROR]: 500,
  [ErrorCode.DATABASE_ERROR]: 503,
  [ErrorCode.REDIS_ERROR]: 503,
  [ErrorCode.FORBIDDEN_IN_ENVIRONMENT]: 403,
  [ErrorCode.TRANSFER_INDETERMINATE]: 502,
  [ErrorCode.STORAGE_ERROR]: 503,
};

/**
 * Standard error response format
 */
export interface ErrorResponse {
  success: false;
  error: {
    code: ErrorCode;
    message: string;
    details?: Record<string, unknown>;
    timestamp: string;
    correlationId?: string;
  };
}

/**
 * Standard success response format
 */
export interface SuccessResponse<T = unknown> {
  success: true;
  data: T;
}

/**
 * API Response type
 */
export type ApiResponse<T = unknown> = SuccessResponse<T> | ErrorResponse;
