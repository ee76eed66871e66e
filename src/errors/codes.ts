/**
 * Error codes for the feedback analyzer.
 * Each code is the tag of one failure kind; the HTTP boundary maps it to a
 * status code and a user-facing message.
 */

export const ERROR_CODES = {
  // Resource Errors
  FORM_NOT_FOUND: 'FORM_NOT_FOUND',
  ANALYSIS_NOT_FOUND: 'ANALYSIS_NOT_FOUND',

  // Workflow Errors
  NO_RESPONSES: 'NO_RESPONSES',

  // External AI Errors
  AI_SERVICE_UNAVAILABLE: 'AI_SERVICE_UNAVAILABLE',

  // Storage Errors
  STORAGE_ERROR: 'STORAGE_ERROR',

  // General Errors
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  NOT_FOUND: 'NOT_FOUND',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

/**
 * User-friendly error messages for each error code.
 * These messages are safe to send to clients.
 */
export const ERROR_MESSAGES: Record<ErrorCode, string> = {
  [ERROR_CODES.FORM_NOT_FOUND]: 'Feedback form not found.',
  [ERROR_CODES.ANALYSIS_NOT_FOUND]:
    'No analysis found for this form. Please run analysis first.',
  [ERROR_CODES.NO_RESPONSES]:
    'Cannot analyze this form: no feedback responses have been submitted yet.',
  [ERROR_CODES.AI_SERVICE_UNAVAILABLE]:
    'The AI analysis service is currently unavailable. Please try again later.',
  [ERROR_CODES.STORAGE_ERROR]: 'A database error occurred. Please try again later.',
  [ERROR_CODES.VALIDATION_ERROR]: 'Validation error. Please check your input and try again.',
  [ERROR_CODES.NOT_FOUND]: 'The requested resource does not exist.',
  [ERROR_CODES.INTERNAL_ERROR]: 'An unexpected error occurred. Please try again later.',
};

/**
 * HTTP status for each error code.
 */
export const ERROR_HTTP_STATUS: Record<ErrorCode, number> = {
  [ERROR_CODES.FORM_NOT_FOUND]: 404,
  [ERROR_CODES.ANALYSIS_NOT_FOUND]: 404,
  [ERROR_CODES.NO_RESPONSES]: 422,
  [ERROR_CODES.AI_SERVICE_UNAVAILABLE]: 503,
  [ERROR_CODES.STORAGE_ERROR]: 500,
  [ERROR_CODES.VALIDATION_ERROR]: 400,
  [ERROR_CODES.NOT_FOUND]: 404,
  [ERROR_CODES.INTERNAL_ERROR]: 500,
};

/**
 * Errors the caller can retry without changing the request.
 */
export const RECOVERABLE_ERRORS: Set<ErrorCode> = new Set<ErrorCode>([
  ERROR_CODES.AI_SERVICE_UNAVAILABLE,
  ERROR_CODES.STORAGE_ERROR,
]);

export function isErrorCode(value: unknown): value is ErrorCode {
  return (
    typeof value === 'string' && Object.values(ERROR_CODES).some((code) => code === value)
  );
}

/**
 * Get the error code from an error object.
 * Returns INTERNAL_ERROR for unknown errors.
 */
export function getErrorCode(error: Error): ErrorCode {
  if ('code' in error && isErrorCode(error.code)) {
    return error.code;
  }
  return ERROR_CODES.INTERNAL_ERROR;
}

export function getHttpStatus(errorCode: ErrorCode): number {
  return ERROR_HTTP_STATUS[errorCode] ?? 500;
}
