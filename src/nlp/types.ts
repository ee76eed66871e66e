/**
 * Text analysis types
 */

import { SentimentLabel } from '../data/types';

/**
 * One attendee response as the analyzer sees it.
 */
export interface FeedbackRecord {
  rating: number;
  comment?: string;
}

/**
 * Four-field sentiment summary parsed from the model reply.
 */
export interface SentimentResult {
  overallSentiment: SentimentLabel;
  positiveHighlights: string;
  commonComplaints: string;
  executiveSummary: string;
}

/**
 * Turns a batch of responses into a sentiment summary.
 *
 * Implementations reject an empty batch with a ValidationError and report
 * any failure of the underlying service as an AIServiceError.
 */
export interface FeedbackAnalyzer {
  analyzeFeedback(records: FeedbackRecord[]): Promise<SentimentResult>;
}
