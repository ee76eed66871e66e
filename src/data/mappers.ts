/**
 * Conversions between stored items and typed records.
 *
 * Items come back from DynamoDB as plain attribute maps; these functions read
 * each attribute with its expected type and fail loudly when a stored item
 * does not have the shape the table promises.
 */

import { DynamoItem } from './dynamodb';
import {
  AnalysisRecord,
  FormRecord,
  ResponseRecord,
  SENTIMENT_LABELS,
  SentimentLabel,
} from './types';

function readString(item: DynamoItem, field: string): string {
  const value = item[field];
  if (typeof value !== 'string') {
    throw new Error(`Stored item is missing string attribute "${field}"`);
  }
  return value;
}

function readOptionalString(item: DynamoItem, field: string): string | undefined {
  const value = item[field];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new Error(`Stored attribute "${field}" is not a string`);
  }
  return value;
}

function readNumber(item: DynamoItem, field: string): number {
  const value = item[field];
  if (typeof value !== 'number') {
    throw new Error(`Stored item is missing numeric attribute "${field}"`);
  }
  return value;
}

function isSentimentLabel(value: string): value is SentimentLabel {
  return SENTIMENT_LABELS.some((label) => label === value);
}

export function toFormRecord(item: DynamoItem): FormRecord {
  const eventDate = readOptionalString(item, 'eventDate');
  const description = readOptionalString(item, 'description');

  return {
    formId: readString(item, 'formId'),
    eventName: readString(item, 'eventName'),
    ...(eventDate !== undefined ? { eventDate } : {}),
    ...(description !== undefined ? { description } : {}),
    createdAt: readString(item, 'createdAt'),
    updatedAt: readString(item, 'updatedAt'),
  };
}

export function toResponseRecord(item: DynamoItem): ResponseRecord {
  const attendeeName = readOptionalString(item, 'attendeeName');
  const comment = readOptionalString(item, 'comment');

  return {
    responseId: readString(item, 'responseId'),
    formId: readString(item, 'formId'),
    ...(attendeeName !== undefined ? { attendeeName } : {}),
    rating: readNumber(item, 'rating'),
    ...(comment !== undefined ? { comment } : {}),
    submittedAt: readString(item, 'submittedAt'),
  };
}

export function toAnalysisRecord(item: DynamoItem): AnalysisRecord {
  const overallSentiment = readString(item, 'overallSentiment');
  if (!isSentimentLabel(overallSentiment)) {
    throw new Error(`Stored sentiment "${overallSentiment}" is not a known label`);
  }

  return {
    analysisId: readString(item, 'analysisId'),
    formId: readString(item, 'formId'),
    overallSentiment,
    positiveHighlights: readString(item, 'positiveHighlights'),
    commonComplaints: readString(item, 'commonComplaints'),
    executiveSummary: readString(item, 'executiveSummary'),
    analyzedAt: readString(item, 'analyzedAt'),
  };
}

/**
 * Sort key for the responses table. ISO timestamps sort lexically, and the
 * response id breaks ties between responses submitted in the same instant.
 */
export function submissionKey(submittedAt: string, responseId: string): string {
  return `${submittedAt}#${responseId}`;
}
