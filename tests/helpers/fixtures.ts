/**
 * Shared test fixtures
 */

import { Clock } from '../../src/data/types';
import { FeedbackAnalyzer, FeedbackRecord, SentimentResult } from '../../src/nlp/types';

/**
 * Clock that advances by `stepMs` on every reading, starting at `start`.
 */
export function steppingClock(start: string = '2024-05-01T10:00:00.000Z', stepMs: number = 1000): Clock {
  let current = new Date(start).getTime();
  return () => {
    const now = new Date(current);
    current += stepMs;
    return now;
  };
}

export const SAMPLE_SENTIMENT: SentimentResult = {
  overallSentiment: 'Positive',
  positiveHighlights: 'Engaging speakers',
  commonComplaints: 'Long queues at registration',
  executiveSummary: 'Attendees enjoyed the launch overall.',
};

/**
 * Analyzer stand-in that records every call and returns a fixed result.
 */
export class StubAnalyzer implements FeedbackAnalyzer {
  public readonly calls: FeedbackRecord[][] = [];
  private failure: Error | null = null;

  constructor(private readonly result: SentimentResult = SAMPLE_SENTIMENT) {}

  failWith(error: Error): void {
    this.failure = error;
  }

  async analyzeFeedback(records: FeedbackRecord[]): Promise<SentimentResult> {
    this.calls.push(records);
    if (this.failure) {
      throw this.failure;
    }
    return { ...this.result };
  }
}
