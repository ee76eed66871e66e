/**
 * Request validation for forms and responses.
 *
 * Validators take the raw parsed JSON body and either produce a typed input
 * or the list of field problems. Routes turn problems into a ValidationError
 * with `assertValid`, so nothing malformed reaches the services.
 */

import { ValidationError, ValidationIssue } from '../errors/types';
import { CreateFormInput, CreateResponseInput, UpdateFormInput } from '../data/types';
import {
  characterLength,
  isInRange,
  isInteger,
  isNonEmptyString,
  isPlainObject,
  isValidCalendarDate,
} from '../utils/validation';
import { isValidUUID } from '../utils/uuid';

export const LIMITS = {
  eventNameMaxLength: 255,
  descriptionMaxLength: 2000,
  attendeeNameMaxLength: 255,
  commentMaxLength: 2000,
  minRating: 1,
  maxRating: 5,
} as const;

export type ValidationResult<T> =
  | { valid: true; value: T }
  | { valid: false; issues: ValidationIssue[] };

function result<T>(value: T, issues: ValidationIssue[]): ValidationResult<T> {
  return issues.length === 0 ? { valid: true, value } : { valid: false, issues };
}

/**
 * Return the validated value or throw a ValidationError listing every issue.
 */
export function assertValid<T>(validation: ValidationResult<T>): T {
  if (!validation.valid) {
    throw new ValidationError('Request validation failed', validation.issues);
  }
  return validation.value;
}

export function validateRating(value: unknown): ValidationIssue | null {
  if (!isInteger(value)) {
    return { field: 'rating', message: 'rating must be an integer' };
  }
  if (!isInRange(value, LIMITS.minRating, LIMITS.maxRating)) {
    return {
      field: 'rating',
      message: `rating must be between ${LIMITS.minRating} and ${LIMITS.maxRating}`,
    };
  }
  return null;
}

export function validateFormId(formId: string): string {
  if (!isValidUUID(formId)) {
    throw new ValidationError('Invalid form id', [
      { field: 'formId', message: 'formId must be a UUID' },
    ]);
  }
  return formId;
}

function checkEventName(value: unknown, issues: ValidationIssue[]): string | undefined {
  if (!isNonEmptyString(value)) {
    issues.push({ field: 'eventName', message: 'eventName must be a non-empty string' });
    return undefined;
  }
  if (characterLength(value) > LIMITS.eventNameMaxLength) {
    issues.push({
      field: 'eventName',
      message: `eventName must be at most ${LIMITS.eventNameMaxLength} characters`,
    });
    return undefined;
  }
  return value;
}

function checkEventDate(value: unknown, issues: ValidationIssue[]): string | undefined {
  if (typeof value !== 'string' || !isValidCalendarDate(value)) {
    issues.push({ field: 'eventDate', message: 'eventDate must be a date in YYYY-MM-DD format' });
    return undefined;
  }
  return value;
}

function checkOptionalText(
  field: string,
  value: unknown,
  maxLength: number,
  issues: ValidationIssue[]
): string | undefined {
  if (typeof value !== 'string') {
    issues.push({ field, message: `${field} must be a string` });
    return undefined;
  }
  if (characterLength(value) > maxLength) {
    issues.push({ field, message: `${field} must be at most ${maxLength} characters` });
    return undefined;
  }
  return value;
}

function bodyIssue(): ValidationIssue[] {
  return [{ field: 'body', message: 'Request body must be a JSON object' }];
}

export function validateCreateForm(body: unknown): ValidationResult<CreateFormInput> {
  if (!isPlainObject(body)) {
    return { valid: false, issues: bodyIssue() };
  }

  const issues: ValidationIssue[] = [];
  const eventName = checkEventName(body.eventName, issues);
  const eventDate =
    body.eventDate === undefined || body.eventDate === null
      ? undefined
      : checkEventDate(body.eventDate, issues);
  const description =
    body.description === undefined || body.description === null
      ? undefined
      : checkOptionalText('description', body.description, LIMITS.descriptionMaxLength, issues);

  return result(
    {
      eventName: eventName ?? '',
      ...(eventDate !== undefined ? { eventDate } : {}),
      ...(description !== undefined ? { description } : {}),
    },
    issues
  );
}

/**
 * Omitted fields stay untouched. `null` clears `eventDate` or `description`;
 * `eventName` cannot be cleared.
 */
export function validateUpdateForm(body: unknown): ValidationResult<UpdateFormInput> {
  if (!isPlainObject(body)) {
    return { valid: false, issues: bodyIssue() };
  }

  const issues: ValidationIssue[] = [];
  const update: UpdateFormInput = {};

  if (body.eventName !== undefined) {
    const eventName = checkEventName(body.eventName, issues);
    if (eventName !== undefined) {
      update.eventName = eventName;
    }
  }

  if (body.eventDate === null) {
    update.eventDate = null;
  } else if (body.eventDate !== undefined) {
    const eventDate = checkEventDate(body.eventDate, issues);
    if (eventDate !== undefined) {
      update.eventDate = eventDate;
    }
  }

  if (body.description === null) {
    update.description = null;
  } else if (body.description !== undefined) {
    const description = checkOptionalText(
      'description',
      body.description,
      LIMITS.descriptionMaxLength,
      issues
    );
    if (description !== undefined) {
      update.description = description;
    }
  }

  return result(update, issues);
}

/**
 * A whitespace-only comment is stored as no comment.
 */
export function validateCreateResponse(body: unknown): ValidationResult<CreateResponseInput> {
  if (!isPlainObject(body)) {
    return { valid: false, issues: bodyIssue() };
  }

  const issues: ValidationIssue[] = [];

  const ratingIssue = validateRating(body.rating);
  if (ratingIssue) {
    issues.push(ratingIssue);
  }
  const rating = isInteger(body.rating) ? body.rating : 0;

  const attendeeName =
    body.attendeeName === undefined || body.attendeeName === null
      ? undefined
      : checkOptionalText('attendeeName', body.attendeeName, LIMITS.attendeeNameMaxLength, issues);

  const rawComment =
    body.comment === undefined || body.comment === null
      ? undefined
      : checkOptionalText('comment', body.comment, LIMITS.commentMaxLength, issues);
  const comment = rawComment !== undefined && rawComment.trim().length > 0 ? rawComment : undefined;

  return result(
    {
      rating,
      ...(attendeeName !== undefined ? { attendeeName } : {}),
      ...(comment !== undefined ? { comment } : {}),
    },
    issues
  );
}
