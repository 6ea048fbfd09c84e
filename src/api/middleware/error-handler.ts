import type { Request, Response, NextFunction } from 'express';
import { ErrorCode } from '../../domain/errors.js';
import type { AppError } from '../../domain/errors.js';
import { logger } from '../../infrastructure/logger.js';

export interface ApiResponse<T> {
  success: boolean;
  data: T | null;
  error: { code: string; message: string; details?: string; retryable?: boolean } | null;
}

export function successResponse<T>(data: T): ApiResponse<T> {
  return { success: true, data, error: null };
}

export function errorResponse(code: string, message: string, details?: string, retryable?: boolean): ApiResponse<null> {
  return { success: false, data: null, error: { code, message, details, retryable } };
}

function isAppError(value: unknown): value is AppError {
  return (
    typeof value === 'object' &&
    value !== null &&
    'code' in value &&
    'message' in value &&
    'retryable' in value
  );
}

function mapErrorCodeToStatus(code: string): number {
  switch (code) {
    case ErrorCode.RECOGNITION_FAILED:
    case ErrorCode.RECOGNITION_EMPTY:
    case ErrorCode.FILE_TOO_LARGE:
    case ErrorCode.LLM_AUTH_ERROR:
      return 400;

    case ErrorCode.FILE_NOT_FOUND:
    case ErrorCode.RECORD_NOT_FOUND:
      return 404;

    case ErrorCode.VALIDATION_ERROR:
      return 422;

    case ErrorCode.LLM_API_ERROR:
    case ErrorCode.LLM_RATE_LIMITED:
    case ErrorCode.LLM_UNREACHABLE:
    case ErrorCode.LLM_TIMEOUT:
      return 503;

    default:
      return 500;
  }
}

export function sendAppError(res: Response, appError: AppError): void {
  const status = mapErrorCodeToStatus(appError.code);
  res.status(status).json(errorResponse(appError.code, appError.message, appError.details, appError.retryable));
}

/** Errors raised by express.json for bodies it cannot read carry a 4xx `status`. */
function isBodyError(value: Error): value is Error & { status: number } {
  return 'status' in value && typeof value.status === 'number' && value.status >= 400 && value.status < 500;
}

export function errorHandler(err: Error, _req: Request, res: Response, _next: NextFunction): void {
  if (isBodyError(err)) {
    res.status(err.status).json(errorResponse(ErrorCode.VALIDATION_ERROR, 'Request body could not be read', err.message, false));
    return;
  }

  if (isAppError(err)) {
    const status = mapErrorCodeToStatus(err.code);
    res.status(status).json(errorResponse(err.code, err.message, err.details, err.retryable));
    return;
  }

  logger.error({ err: err.message }, 'Unhandled error');
  res.status(500).json(errorResponse(ErrorCode.INTERNAL_ERROR, 'An unexpected error occurred', undefined, false));
}
