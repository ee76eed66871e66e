/**
 * Tests for request validation
 */

import {
  assertValid,
  validateCreateForm,
  validateCreateResponse,
  validateFormId,
  validateRating,
  validateUpdateForm,
} from '../../../src/feedback/validation';
import { ValidationError } from '../../../src/errors/types';

describe('validateCreateForm', () => {
  it('should accept a form with only an event name, kept as submitted', () => {
    expect(validateCreateForm({ eventName: '  Launch  ' })).toEqual({
      valid: true,
      value: { eventName: '  Launch  ' },
    });
  });

  it('should accept every optional field', () => {
    expect(
      validateCreateForm({ eventName: 'Launch', eventDate: '2024-06-01', description: 'Spring' })
    ).toEqual({
      valid: true,
      value: { eventName: 'Launch', eventDate: '2024-06-01', description: 'Spring' },
    });
  });

  it('should treat null optional fields as absent', () => {
    expect(validateCreateForm({ eventName: 'Launch', eventDate: null, description: null })).toEqual({
      valid: true,
      value: { eventName: 'Launch' },
    });
  });

  it('should reject a missing or blank event name', () => {
    expect(validateCreateForm({})).toEqual({
      valid: false,
      issues: [{ field: 'eventName', message: 'eventName must be a non-empty string' }],
    });
    expect(validateCreateForm({ eventName: '   ' }).valid).toBe(false);
  });

  it('should reject an event name longer than 255 characters', () => {
    expect(validateCreateForm({ eventName: 'x'.repeat(256) })).toEqual({
      valid: false,
      issues: [{ field: 'eventName', message: 'eventName must be at most 255 characters' }],
    });
  });

  it('should count an emoji event name by characters', () => {
    const eventName = '🎉'.repeat(255);

    expect(validateCreateForm({ eventName })).toEqual({ valid: true, value: { eventName } });
    expect(validateCreateForm({ eventName: eventName + '🎉' }).valid).toBe(false);
  });

  it('should reject dates that are malformed or do not exist', () => {
    const expected = {
      valid: false,
      issues: [{ field: 'eventDate', message: 'eventDate must be a date in YYYY-MM-DD format' }],
    };

    expect(validateCreateForm({ eventName: 'Launch', eventDate: '01/06/2024' })).toEqual(expected);
    expect(validateCreateForm({ eventName: 'Launch', eventDate: '2024-02-30' })).toEqual(expected);
    expect(validateCreateForm({ eventName: 'Launch', eventDate: 20240601 })).toEqual(expected);
  });

  it('should collect every problem at once', () => {
    const validation = validateCreateForm({ eventDate: 'soon', description: 42 });

    expect(validation.valid).toBe(false);
    if (!validation.valid) {
      expect(validation.issues.map((issue) => issue.field)).toEqual([
        'eventName',
        'eventDate',
        'description',
      ]);
    }
  });

  it.each([null, 'Launch', 42, ['Launch']])('should reject the body %p', (body) => {
    expect(validateCreateForm(body)).toEqual({
      valid: false,
      issues: [{ field: 'body', message: 'Request body must be a JSON object' }],
    });
  });
});

describe('validateUpdateForm', () => {
  it('should accept an empty update', () => {
    expect(validateUpdateForm({})).toEqual({ valid: true, value: {} });
  });

  it('should keep null to clear optional fields', () => {
    expect(validateUpdateForm({ eventDate: null, description: null })).toEqual({
      valid: true,
      value: { eventDate: null, description: null },
    });
  });

  it('should not allow the event name to be cleared', () => {
    expect(validateUpdateForm({ eventName: null })).toEqual({
      valid: false,
      issues: [{ field: 'eventName', message: 'eventName must be a non-empty string' }],
    });
  });

  it('should validate supplied fields', () => {
    expect(validateUpdateForm({ eventName: ' Relaunch ', eventDate: '2024-07-15' })).toEqual({
      valid: true,
      value: { eventName: ' Relaunch ', eventDate: '2024-07-15' },
    });
    expect(validateUpdateForm({ description: 'x'.repeat(2001) }).valid).toBe(false);
  });
});

describe('validateCreateResponse', () => {
  it('should accept a rating with optional fields', () => {
    expect(validateCreateResponse({ rating: 4, attendeeName: 'Sam', comment: 'Nice' })).toEqual({
      valid: true,
      value: { rating: 4, attendeeName: 'Sam', comment: 'Nice' },
    });
  });

  it('should drop a whitespace-only comment', () => {
    expect(validateCreateResponse({ rating: 3, comment: '   ' })).toEqual({
      valid: true,
      value: { rating: 3 },
    });
  });

  it.each([0, 6, -1])('should reject the out-of-range rating %p', (rating) => {
    expect(validateCreateResponse({ rating })).toEqual({
      valid: false,
      issues: [{ field: 'rating', message: 'rating must be between 1 and 5' }],
    });
  });

  it.each([3.5, '4', null, undefined])('should reject the non-integer rating %p', (rating) => {
    expect(validateCreateResponse({ rating })).toEqual({
      valid: false,
      issues: [{ field: 'rating', message: 'rating must be an integer' }],
    });
  });

  it('should reject a comment longer than 2000 characters', () => {
    expect(validateCreateResponse({ rating: 5, comment: 'x'.repeat(2001) })).toEqual({
      valid: false,
      issues: [{ field: 'comment', message: 'comment must be at most 2000 characters' }],
    });
  });

  it('should measure comments in characters rather than UTF-16 units', () => {
    const comment = '😀'.repeat(1500);

    expect(validateCreateResponse({ rating: 4, comment })).toEqual({
      valid: true,
      value: { rating: 4, comment },
    });
    expect(validateCreateResponse({ rating: 4, comment: '😀'.repeat(2001) })).toEqual({
      valid: false,
      issues: [{ field: 'comment', message: 'comment must be at most 2000 characters' }],
    });
  });
});

describe('validateRating', () => {
  it('should accept every rating from 1 to 5', () => {
    expect([1, 2, 3, 4, 5].map(validateRating)).toEqual([null, null, null, null, null]);
  });
});

describe('validateFormId', () => {
  it('should return a UUID unchanged', () => {
    const formId = '3f2b8c1e-4d5a-4b6c-8d7e-9f0a1b2c3d4e';

    expect(validateFormId(formId)).toBe(formId);
  });

  it('should reject anything that is not a UUID', () => {
    expect(() => validateFormId('not-a-uuid')).toThrow(ValidationError);
    expect(() => validateFormId('not-a-uuid')).toThrow('Invalid form id');
  });
});

describe('assertValid', () => {
  it('should return the value of a valid result', () => {
    expect(assertValid({ valid: true, value: { rating: 5 } })).toEqual({ rating: 5 });
  });

  it('should throw a ValidationError carrying every issue', () => {
    const issues = [{ field: 'rating', message: 'rating must be an integer' }];

    try {
      assertValid({ valid: false, issues });
      throw new Error('Expected assertValid to throw');
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({
        code: 'VALIDATION_ERROR',
        message: 'Request validation failed',
        issues,
      });
    }
  });
});
