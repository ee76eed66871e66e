/**
 * Custom error types for the feedback analyzer.
 */

import { ErrorCode, ERROR_CODES, RECOVERABLE_ERRORS } from './codes';

/**
 * A single field-level validation problem.
 */
export interface ValidationIssue {
  field: string;
  message: string;
}

/**
 * Base error class for all feedback analyzer errors.
 * `code` is the discriminating tag the HTTP boundary maps to a status.
 */
export class FeedbackError extends Error {
  public readonly code: ErrorCode;
  public readonly recoverable: boolean;
  public readonly context?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    recoverable?: boolean,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'FeedbackError';
    this.code = code;
    this.recoverable = recoverable ?? RECOVERABLE_ERRORS.has(code);
    this.context = context;

    Error.captureStackTrace(this, this.constructor);
  }
}

export class FormNotFoundError extends FeedbackError {
  public readonly formId: string;

  constructor(formId: string) {
    super(ERROR_CODES.FORM_NOT_FOUND, `Feedback form with id ${formId} not found`, false, {
      formId,
    });
    this.name = 'FormNotFoundError';
    this.formId = formId;
  }
}

export class AnalysisNotFoundError extends FeedbackError {
  public readonly formId: string;

  constructor(formId: string) {
    super(
      ERROR_CODES.ANALYSIS_NOT_FOUND,
      `No analysis found for form ${formId}. Please run analysis first.`,
      false,
      { formId }
    );
    this.name = 'AnalysisNotFoundError';
    this.formId = formId;
  }
}

export class NoResponsesError extends FeedbackError {
  public readonly formId: string;

  constructor(formId: string) {
    super(
      ERROR_CODES.NO_RESPONSES,
      `Cannot analyze form ${formId}: No feedback responses submitted yet`,
      false,
      { formId }
    );
    this.name = 'NoResponsesError';
    this.formId = formId;
  }
}

/**
 * The external text analysis capability failed or is not configured.
 */
export class AIServiceError extends FeedbackError {
  constructor(
    message: string = 'External AI service unavailable',
    context?: Record<string, unknown>
  ) {
    super(ERROR_CODES.AI_SERVICE_UNAVAILABLE, message, true, context);
    this.name = 'AIServiceError';
  }

  /**
   * Wrap an unknown failure from the AI call.
   */
  static fromError(error: unknown, prefix: string = 'AI service error'): AIServiceError {
    if (error instanceof AIServiceError) {
      return error;
    }

    const message = error instanceof Error ? error.message : String(error);
    const errorName = error instanceof Error ? error.name : 'UnknownError';

    return new AIServiceError(`${prefix}: ${message}`, {
      originalError: message,
      errorName,
    });
  }
}

export class ValidationError extends FeedbackError {
  public readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[] = []) {
    super(ERROR_CODES.VALIDATION_ERROR, message, false, { issues });
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/**
 * Entity store failures.
 */
export class DatabaseError extends FeedbackError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(ERROR_CODES.STORAGE_ERROR, message, true, context);
    this.name = 'DatabaseError';
  }
}
