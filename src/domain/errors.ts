export const ErrorCode = {
  // Text recognition
  RECOGNITION_FAILED: 'RECOGNITION_FAILED',
  RECOGNITION_EMPTY: 'RECOGNITION_EMPTY',
  FILE_NOT_FOUND: 'FILE_NOT_FOUND',
  FILE_TOO_LARGE: 'FILE_TOO_LARGE',

  // Model service
  LLM_API_ERROR: 'LLM_API_ERROR',
  LLM_UNREACHABLE: 'LLM_UNREACHABLE',
  LLM_TIMEOUT: 'LLM_TIMEOUT',
  LLM_RATE_LIMITED: 'LLM_RATE_LIMITED',
  LLM_AUTH_ERROR: 'LLM_AUTH_ERROR',
  LLM_MALFORMED_RESPONSE: 'LLM_MALFORMED_RESPONSE',

  // Records
  RECORD_NOT_FOUND: 'RECORD_NOT_FOUND',
  RECORD_INVALID: 'RECORD_INVALID',
  FILE_STORAGE_ERROR: 'FILE_STORAGE_ERROR',

  // Requests
  VALIDATION_ERROR: 'VALIDATION_ERROR',

  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export interface AppError {
  code: ErrorCode;
  message: string;
  details?: string;
  retryable: boolean;
}

export function createAppError(
  code: ErrorCode,
  message: string,
  retryable: boolean,
  details?: string,
): AppError {
  return { code, message, retryable, details };
}

