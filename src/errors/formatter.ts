/**
 * Error response formatting utilities.
 * Formats errors for HTTP clients without leaking internal details.
 */

import { ErrorCode, ERROR_CODES, ERROR_MESSAGES, getHttpStatus } from './codes';
import { FeedbackError, ValidationError, ValidationIssue } from './types';
import type { LogData } from '../monitoring/logger';

/**
 * Error body sent to HTTP clients.
 */
export interface ErrorResponseBody {
  error: {
    code: ErrorCode;
    message: string;
    recoverable: boolean;
    details?: ValidationIssue[];
  };
}

export interface FormattedError {
  status: number;
  body: ErrorResponseBody;
}

/**
 * Codes whose own message is written for clients (ids and field names only).
 * Every other code is answered with the generic message for that code.
 */
const CLIENT_SAFE_MESSAGE_CODES = new Set<ErrorCode>([
  ERROR_CODES.FORM_NOT_FOUND,
  ERROR_CODES.ANALYSIS_NOT_FOUND,
  ERROR_CODES.NO_RESPONSES,
  ERROR_CODES.VALIDATION_ERROR,
  ERROR_CODES.NOT_FOUND,
]);

/**
 * Formats an error into an HTTP status and body.
 */
export function formatErrorResponse(error: Error): FormattedError {
  if (!(error instanceof FeedbackError)) {
    return {
      status: getHttpStatus(ERROR_CODES.INTERNAL_ERROR),
      body: {
        error: {
          code: ERROR_CODES.INTERNAL_ERROR,
          message: ERROR_MESSAGES[ERROR_CODES.INTERNAL_ERROR],
          recoverable: false,
        },
      },
    };
  }

  const message = CLIENT_SAFE_MESSAGE_CODES.has(error.code)
    ? error.message
    : ERROR_MESSAGES[error.code];

  const body: ErrorResponseBody = {
    error: {
      code: error.code,
      message,
      recoverable: error.recoverable,
    },
  };

  if (error instanceof ValidationError && error.issues.length > 0) {
    body.error.details = error.issues;
  }

  return {
    status: getHttpStatus(error.code),
    body,
  };
}

/**
 * Creates a log entry for an error with full context.
 */
export function createErrorLogEntry(
  error: Error,
  additionalContext?: Record<string, unknown>
): LogData {
  const errorCode = error instanceof FeedbackError ? error.code : ERROR_CODES.INTERNAL_ERROR;

  const logEntry: LogData = {
    event: 'error_occurred',
    errorCode,
    errorName: error.name,
    errorMessage: error.message,
  };

  if (error instanceof FeedbackError) {
    logEntry.recoverable = error.recoverable;
    if (error.context) {
      logEntry.errorContext = error.context;
    }
  }

  if (additionalContext) {
    Object.assign(logEntry, additionalContext);
  }

  return logEntry;
}
