/**
 * Type definitions for database records and the data access layer
 */

/**
 * Table names, before the configured prefix is applied.
 */
export const TABLES = {
  forms: 'forms',
  responses: 'responses',
  analyses: 'analyses',
} as const;

export type TableName = (typeof TABLES)[keyof typeof TABLES];

export const SENTIMENT_LABELS = ['Positive', 'Neutral', 'Negative'] as const;

export type SentimentLabel = (typeof SENTIMENT_LABELS)[number];

/**
 * Feedback form record (forms table, partition key formId)
 */
export interface FormRecord {
  formId: string;
  eventName: string;
  eventDate?: string; // YYYY-MM-DD
  description?: string;
  createdAt: string; // ISO 8601
  updatedAt: string; // ISO 8601
}

/**
 * Attendee response record (responses table, formId + submissionKey)
 */
export interface ResponseRecord {
  responseId: string;
  formId: string;
  attendeeName?: string;
  rating: number; // integer 1-5
  comment?: string;
  submittedAt: string; // ISO 8601
}

/**
 * Cached sentiment analysis (analyses table, partition key formId)
 */
export interface AnalysisRecord {
  analysisId: string;
  formId: string;
  overallSentiment: SentimentLabel;
  positiveHighlights: string;
  commonComplaints: string;
  executiveSummary: string;
  analyzedAt: string; // ISO 8601
}

export interface CreateFormInput {
  eventName: string;
  eventDate?: string;
  description?: string;
}

/**
 * Partial form update. Omitted fields are left untouched; `null` clears an
 * optional field.
 */
export interface UpdateFormInput {
  eventName?: string;
  eventDate?: string | null;
  description?: string | null;
}

export interface CreateResponseInput {
  attendeeName?: string;
  rating: number;
  comment?: string;
}

export interface CreateAnalysisInput {
  overallSentiment: SentimentLabel;
  positiveHighlights: string;
  commonComplaints: string;
  executiveSummary: string;
}

/**
 * Outcome of inserting an analysis.
 * - created: this call stored the analysis
 * - exists: an analysis for the form was already stored
 * - form_missing: the form no longer exists
 */
export type CreateAnalysisResult =
  | { status: 'created'; analysis: AnalysisRecord }
  | { status: 'exists' }
  | { status: 'form_missing' };

/**
 * Supplies timestamps to repositories.
 */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
