/**
 * Tests for error response formatting
 */

import { createErrorLogEntry, formatErrorResponse } from '../../../src/errors/formatter';
import { getErrorCode, getHttpStatus, isErrorCode } from '../../../src/errors/codes';
import {
  AnalysisNotFoundError,
  DatabaseError,
  FeedbackError,
  NoResponsesError,
} from '../../../src/errors/types';

describe('formatErrorResponse', () => {
  it('should keep client-safe messages', () => {
    expect(formatErrorResponse(new AnalysisNotFoundError('form-1'))).toEqual({
      status: 404,
      body: {
        error: {
          code: 'ANALYSIS_NOT_FOUND',
          message: 'No analysis found for form form-1. Please run analysis first.',
          recoverable: false,
        },
      },
    });
  });

  it('should replace internal messages with the generic one for the code', () => {
    const { status, body } = formatErrorResponse(
      new DatabaseError('Database operation failed: deleteForm', { operation: 'deleteForm' })
    );

    expect(status).toBe(500);
    expect(body.error.message).toBe('A database error occurred. Please try again later.');
  });
});

describe('createErrorLogEntry', () => {
  it('should carry the code, context and extra fields', () => {
    expect(
      createErrorLogEntry(new NoResponsesError('form-1'), { method: 'POST', path: '/x' })
    ).toEqual({
      event: 'error_occurred',
      errorCode: 'NO_RESPONSES',
      errorName: 'NoResponsesError',
      errorMessage: 'Cannot analyze form form-1: No feedback responses submitted yet',
      recoverable: false,
      errorContext: { formId: 'form-1' },
      method: 'POST',
      path: '/x',
    });
  });

  it('should report plain errors as internal', () => {
    expect(createErrorLogEntry(new TypeError('bad'))).toEqual({
      event: 'error_occurred',
      errorCode: 'INTERNAL_ERROR',
      errorName: 'TypeError',
      errorMessage: 'bad',
    });
  });
});

describe('error codes', () => {
  it('should map each code to its status', () => {
    expect(getHttpStatus('FORM_NOT_FOUND')).toBe(404);
    expect(getHttpStatus('NO_RESPONSES')).toBe(422);
    expect(getHttpStatus('AI_SERVICE_UNAVAILABLE')).toBe(503);
    expect(getHttpStatus('VALIDATION_ERROR')).toBe(400);
  });

  it('should recognise only known codes', () => {
    expect(isErrorCode('STORAGE_ERROR')).toBe(true);
    expect(isErrorCode('ENOENT')).toBe(false);
    expect(isErrorCode(404)).toBe(false);
  });

  it('should read the code of a taxonomy error', () => {
    expect(getErrorCode(new FeedbackError('NOT_FOUND', 'gone'))).toBe('NOT_FOUND');
    expect(getErrorCode(new Error('plain'))).toBe('INTERNAL_ERROR');
  });

  it('should derive recoverability from the code by default', () => {
    expect(new FeedbackError('STORAGE_ERROR', 'down').recoverable).toBe(true);
    expect(new FeedbackError('FORM_NOT_FOUND', 'gone').recoverable).toBe(false);
  });
});
