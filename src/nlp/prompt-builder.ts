/**
 * Prompt construction for feedback analysis.
 *
 * The section headers requested here are the ones `parseAnalysisResponse`
 * scans for; the two must change together.
 */

import { FeedbackRecord } from './types';

export const SECTION_HEADERS = {
  overallSentiment: 'OVERALL_SENTIMENT:',
  positiveHighlights: 'POSITIVE_HIGHLIGHTS:',
  commonComplaints: 'COMMON_COMPLAINTS:',
  executiveSummary: 'EXECUTIVE_SUMMARY:',
} as const;

export const MAX_PROMPT_COMMENTS = 50;

export const NO_COMMENTS_PLACEHOLDER = '(No written comments provided)';

/**
 * Enumerate comments 1-indexed, keeping at most the first 50.
 */
export function formatComments(comments: string[]): string {
  if (comments.length === 0) {
    return NO_COMMENTS_PLACEHOLDER;
  }

  return comments
    .slice(0, MAX_PROMPT_COMMENTS)
    .map((comment, index) => `${index + 1}. ${comment}`)
    .join('\n');
}

export function averageRating(records: FeedbackRecord[]): number {
  if (records.length === 0) {
    return 0;
  }
  const total = records.reduce((sum, record) => sum + record.rating, 0);
  return total / records.length;
}

/**
 * Two-decimal rating with ties rounded to even, so 2.125 reads 2.12.
 * A mean of integer ratings lands exactly on a tie only when it is an odd
 * number of eighths; every other value goes through `toFixed` unchanged.
 */
export function formatRating(value: number): string {
  const eighths = value * 8;
  if (Number.isInteger(eighths) && eighths % 2 !== 0) {
    const lower = Math.floor(value * 100);
    const even = lower % 2 === 0 ? lower : lower + 1;
    return (even / 100).toFixed(2);
  }
  return value.toFixed(2);
}

export function buildAnalysisPrompt(records: FeedbackRecord[]): string {
  const comments = records
    .map((record) => record.comment)
    .filter((comment): comment is string => comment !== undefined && comment.trim().length > 0);

  return `You are an expert event feedback analyzer. Analyze the following attendee feedback and provide insights.

FEEDBACK DATA:
- Total Responses: ${records.length}
- Average Rating: ${formatRating(averageRating(records))}/5.0

ATTENDEE COMMENTS:
${formatComments(comments)}

Please provide your analysis in the following exact format:

${SECTION_HEADERS.overallSentiment} [Choose ONLY one: Positive, Neutral, or Negative]

${SECTION_HEADERS.positiveHighlights}
[List the main positive aspects mentioned by attendees. If none, write "None mentioned"]

${SECTION_HEADERS.commonComplaints}
[List recurring issues or complaints. If none, write "None mentioned"]

${SECTION_HEADERS.executiveSummary}
[Provide a concise 2-3 sentence summary of the overall feedback]

Important:
- Be specific and data-driven
- Extract actual themes from the comments
- Keep each section concise
- Use the exact format headers shown above
`;
}
