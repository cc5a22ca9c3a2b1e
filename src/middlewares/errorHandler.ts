/**
 * Error Handling Middleware
 *
 * Provides centralized error handling with consistent error response format,
 * error logging, and appropriate error sanitization for production.
 */

import { Request, Response, NextFunction } from 'express';
import { config } from '../config';
import { logger, getCorrelationId } from '../observability';
import { ErrorCode, ErrorResponse, errorCodeToStatus } from '../types/errors';
import { CustodyError, Result } from '../types/result';
import { describeRejection, serializeRejection } from '../types/custody';

/**
 * Extended Error interface with additional properties
 */
export interface AppError extends Error {
  statusCode?: number;
  errorCode?: ErrorCode;
  isOperational?: boolean;
  details?: Record<string, unknown>;
}

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

  const errorCode = err.errorCode || ErrorCode.INTERNAL_ERROR;
  const statusCode = err.statusCode || errorCodeToStatus[errorCode] || 500;

  const logPayload = {
    correlationId,
    errorCode,
    statusCode,
    error: err.message,
    stack: config.isDevelopment ? err.stack : undefined,
    path: req.path,
    method: req.method,
    isOperational: err.isOperational,
  };

  if (statusCode >= 500) {
    logger.error(logPayload, `Error: ${err.message}`);
  } else {
    logger.warn(logPayload, `Error: ${err.message}`);
  }

  // Sanitize unexpected 5xx errors in production; operational ones carry
  // information the caller needs (e.g. reconciliation hints)
  const message =
    config.isProduction && statusCode >= 500 && !err.isOperational
      ? 'Internal server error'
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

  if (err.details) {
    response.error.details = err.details;
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
      code: ErrorCode.RESOURCE_NOT_FOUND,
      message: `Route ${req.method} ${req.path} not found`,
      timestamp: new Date().toISOString(),
      correlationId,
    },
  };

  res.status(404).json(response);
};

/**
 * Map HTTP status codes to error codes for callers that only know the status
 */
const statusToErrorCode: Record<number, ErrorCode> = {
  400: ErrorCode.VALIDATION_ERROR,
  401: ErrorCode.UNAUTHORIZED,
  403: ErrorCode.NOT_RECORD_OWNER,
  404: ErrorCode.RESOURCE_NOT_FOUND,
  409: ErrorCode.ENTITY_BUSY,
  429: ErrorCode.RATE_LIMIT_EXCEEDED,
  500: ErrorCode.INTERNAL_ERROR,
  503: ErrorCode.DATABASE_ERROR,
};

const isErrorCode = (value: number): value is ErrorCode => value in errorCodeToStatus;

/**
 * API Error class for throwing operational errors
 *
 * Accepts either an ErrorCode or a plain HTTP status code.
 */
export class ApiError extends Error implements AppError {
  statusCode: number;
  errorCode: ErrorCode;
  isOperational: boolean;
  details?: Record<string, unknown>;

  constructor(
    codeOrStatus: ErrorCode | number,
    message: string,
    options?: {
      statusCode?: number;
      isOperational?: boolean;
      details?: Record<string, unknown>;
    }
  ) {
    super(message);
    this.name = 'ApiError';

    // ErrorCodes are 1000+ while HTTP status codes are < 600
    if (codeOrStatus >= 1000 && isErrorCode(codeOrStatus)) {
      this.errorCode = codeOrStatus;
      this.statusCode = options?.statusCode || errorCodeToStatus[codeOrStatus];
    } else {
      this.statusCode = codeOrStatus;
      this.errorCode = statusToErrorCode[codeOrStatus] || ErrorCode.INTERNAL_ERROR;
    }

    this.isOperational = options?.isOperational ?? true;
    this.details = options?.details;
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Factory methods for common errors
   */
  static unauthorized(message = 'Unauthorized'): ApiError {
    return new ApiError(ErrorCode.UNAUTHORIZED, message);
  }

  static invalidToken(message = 'Invalid token'): ApiError {
    return new ApiError(ErrorCode.INVALID_TOKEN, message);
  }

  static tokenExpired(message = 'Token expired'): ApiError {
    return new ApiError(ErrorCode.TOKEN_EXPIRED, message);
  }

  static validationError(message: string, validationErrors?: Record<string, string[]>): ApiError {
    return new ApiError(ErrorCode.VALIDATION_ERROR, message, {
      details: validationErrors,
    });
  }

  static forbiddenInEnvironment(message: string): ApiError {
    return new ApiError(ErrorCode.FORBIDDEN_IN_ENVIRONMENT, message);
  }

  static internal(message = 'Internal server error'): ApiError {
    return new ApiError(ErrorCode.INTERNAL_ERROR, message, {
      isOperational: false,
    });
  }

  /**
   * Translate a custody failure into its HTTP form. Each failure kind keeps
   * its own code so callers can tell retryable from non-retryable outcomes.
   */
  static fromCustodyError(error: CustodyError): ApiError {
    switch (error.kind) {
      case 'Authorization':
        return new ApiError(ErrorCode.NOT_RECORD_OWNER, error.message);
      case 'NotFound':
        return new ApiError(
          error.entity === 'campaign' ? ErrorCode.CAMPAIGN_NOT_FOUND : ErrorCode.PROVIDER_NOT_FOUND,
          `${error.entity === 'campaign' ? 'Campaign' : 'Provider'} not found: ${error.id}`
        );
      case 'InvalidAmount':
        return new ApiError(ErrorCode.INVALID_AMOUNT, error.message);
      case 'InsufficientFunds':
        return new ApiError(ErrorCode.INSUFFICIENT_BALANCE, 'Insufficient funds', {
          details: {
            available: error.available.toString(),
            requested: error.requested.toString(),
          },
        });
      case 'EntityBusy':
        return new ApiError(
          ErrorCode.ENTITY_BUSY,
          `${error.entity} ${error.id} has a transfer in flight, retry later`
        );
      case 'TransferRejected':
        return new ApiError(
          ErrorCode.TRANSFER_REJECTED,
          `Transfer rejected by the rail: ${describeRejection(error.reason)}`,
          {
            details: {
              transferId: error.transferId,
              reason: serializeRejection(error.reason),
            },
          }
        );
      case 'TransferIndeterminate':
        return new ApiError(
          ErrorCode.TRANSFER_INDETERMINATE,
          `Transfer outcome unknown (${error.reason}); verify it against the rail's history before retrying`,
          {
            details: {
              transferId: error.transferId,
              memo: error.memo,
            },
          }
        );
      case 'Storage':
        return new ApiError(ErrorCode.STORAGE_ERROR, `Storage failure: ${error.message}`);
    }
  }
}

/**
 * The value of a successful custody result, or the matching ApiError thrown
 */
export const unwrap = <T>(result: Result<T>): T => {
  if (!result.ok) {
    throw ApiError.fromCustodyError(result.error);
  }
  return result.value;
};
