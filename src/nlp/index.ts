/**
 * NLP Module
 *
 * Feedback sentiment analysis using Amazon Bedrock.
 */

export { BedrockFeedbackAnalyzer } from './bedrock-feedback-analyzer';
export type { BedrockAnalyzerConfig, BedrockCredentials } from './bedrock-feedback-analyzer';
export {
  buildAnalysisPrompt,
  formatComments,
  formatRating,
  averageRating,
  SECTION_HEADERS,
} from './prompt-builder';
export {
  parseAnalysisResponse,
  parseSentiment,
  extractSections,
  DEFAULT_COMPLAINTS,
  DEFAULT_HIGHLIGHTS,
  DEFAULT_SENTIMENT,
  DEFAULT_SUMMARY,
  MAX_SECTION_LENGTH,
} from './response-parser';
export type { FeedbackAnalyzer, FeedbackRecord, SentimentResult } from './types';
