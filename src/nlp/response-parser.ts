/**
 * Parses the free-text model reply into a sentiment summary.
 *
 * Headers are located case-insensitively. A section runs from just after its
 * header to the next known header (or the end of the text). Missing or empty
 * sections fall back to fixed placeholders, so parsing always yields a
 * complete record.
 */

import { SENTIMENT_LABELS, SentimentLabel } from '../data/types';
import { SECTION_HEADERS } from './prompt-builder';
import { SentimentResult } from './types';
import { truncateCharacters } from '../utils/validation';

export const MAX_SECTION_LENGTH = 1000;

export const DEFAULT_SENTIMENT: SentimentLabel = 'Neutral';
export const DEFAULT_HIGHLIGHTS = 'No specific highlights mentioned';
export const DEFAULT_COMPLAINTS = 'No specific complaints mentioned';
export const DEFAULT_SUMMARY = 'Analysis completed successfully';

type SectionName = keyof typeof SECTION_HEADERS;

const SECTION_NAMES: SectionName[] = [
  'overallSentiment',
  'positiveHighlights',
  'commonComplaints',
  'executiveSummary',
];

interface HeaderMatch {
  name: SectionName;
  start: number;
  contentStart: number;
}

// Markdown emphasis, brackets and punctuation around the sentiment word
const TOKEN_DECORATION = /^[*_`"'[\](){}.,:;!?-]+|[*_`"'[\](){}.,:;!?-]+$/g;

function findHeaders(text: string): HeaderMatch[] {
  const matches: HeaderMatch[] = [];

  for (const name of SECTION_NAMES) {
    const header = SECTION_HEADERS[name];
    const found = new RegExp(header, 'i').exec(text);
    if (found) {
      matches.push({ name, start: found.index, contentStart: found.index + header.length });
    }
  }

  return matches.sort((a, b) => a.start - b.start);
}

/**
 * Extract every section present in the text, keyed by name.
 */
export function extractSections(text: string): Partial<Record<SectionName, string>> {
  const headers = findHeaders(text);
  const sections: Partial<Record<SectionName, string>> = {};

  headers.forEach((header, index) => {
    const next = headers.slice(index + 1).find((candidate) => candidate.start >= header.contentStart);
    const end = next ? next.start : text.length;
    const raw = text.slice(header.contentStart, Math.max(header.contentStart, end));

    // Bold markers hugging the header, as in **POSITIVE_HIGHLIGHTS:**
    sections[header.name] = raw.replace(/^\*+/, '').replace(/\*+$/, '').trim();
  });

  return sections;
}

function isSentimentLabel(value: string): value is SentimentLabel {
  return SENTIMENT_LABELS.some((label) => label === value);
}

/**
 * First word of the sentiment section, if it is one of the three labels.
 */
export function parseSentiment(section: string | undefined): SentimentLabel {
  if (!section) {
    return DEFAULT_SENTIMENT;
  }

  const token = section.split(/\s+/).find((part) => part.length > 0);
  if (!token) {
    return DEFAULT_SENTIMENT;
  }

  const word = token.replace(TOKEN_DECORATION, '');
  return isSentimentLabel(word) ? word : DEFAULT_SENTIMENT;
}

function sectionOrDefault(section: string | undefined, fallback: string): string {
  const value = section && section.length > 0 ? section : fallback;
  return truncateCharacters(value, MAX_SECTION_LENGTH);
}

export function parseAnalysisResponse(text: string): SentimentResult {
  const sections = extractSections(text);

  return {
    overallSentiment: parseSentiment(sections.overallSentiment),
    positiveHighlights: sectionOrDefault(sections.positiveHighlights, DEFAULT_HIGHLIGHTS),
    commonComplaints: sectionOrDefault(sections.commonComplaints, DEFAULT_COMPLAINTS),
    executiveSummary: sectionOrDefault(sections.executiveSummary, DEFAULT_SUMMARY),
  };
}
