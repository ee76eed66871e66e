/**
 * Tests for model reply parsing
 */

import {
  DEFAULT_COMPLAINTS,
  DEFAULT_HIGHLIGHTS,
  DEFAULT_SUMMARY,
  MAX_SECTION_LENGTH,
  extractSections,
  parseAnalysisResponse,
  parseSentiment,
} from '../../../src/nlp/response-parser';

const WELL_FORMED = `OVERALL_SENTIMENT: Positive

POSITIVE_HIGHLIGHTS:
- Great speakers
- Good food

COMMON_COMPLAINTS:
- Long queues

EXECUTIVE_SUMMARY:
The event was well received.`;

describe('parseAnalysisResponse', () => {
  it('extracts every section of a well-formed reply', () => {
    expect(parseAnalysisResponse(WELL_FORMED)).toEqual({
      overallSentiment: 'Positive',
      positiveHighlights: '- Great speakers\n- Good food',
      commonComplaints: '- Long queues',
      executiveSummary: 'The event was well received.',
    });
  });

  it('finds headers regardless of case', () => {
    const result = parseAnalysisResponse(
      'overall_sentiment: Negative\npositive_highlights: Venue\ncommon_complaints: Audio\nexecutive_summary: Mixed night.'
    );

    expect(result).toEqual({
      overallSentiment: 'Negative',
      positiveHighlights: 'Venue',
      commonComplaints: 'Audio',
      executiveSummary: 'Mixed night.',
    });
  });

  it('falls back to defaults for an empty reply', () => {
    expect(parseAnalysisResponse('')).toEqual({
      overallSentiment: 'Neutral',
      positiveHighlights: DEFAULT_HIGHLIGHTS,
      commonComplaints: DEFAULT_COMPLAINTS,
      executiveSummary: DEFAULT_SUMMARY,
    });
  });

  it('uses the placeholder for a section that is present but empty', () => {
    const result = parseAnalysisResponse(
      'OVERALL_SENTIMENT: Neutral\nPOSITIVE_HIGHLIGHTS:\n\nCOMMON_COMPLAINTS: Slow wifi'
    );

    expect(result.positiveHighlights).toBe('No specific highlights mentioned');
    expect(result.commonComplaints).toBe('Slow wifi');
    expect(result.executiveSummary).toBe('Analysis completed successfully');
  });

  it('ends each section at the next header even when sections are out of order', () => {
    const result = parseAnalysisResponse('EXECUTIVE_SUMMARY: Short.\nPOSITIVE_HIGHLIGHTS: Venue');

    expect(result.executiveSummary).toBe('Short.');
    expect(result.positiveHighlights).toBe('Venue');
  });

  it('strips bold markers around headers', () => {
    const result = parseAnalysisResponse(
      '**OVERALL_SENTIMENT:** Positive\n\n**POSITIVE_HIGHLIGHTS:**\nFriendly staff\n\n**COMMON_COMPLAINTS:**\nNone mentioned\n\n**EXECUTIVE_SUMMARY:**\nGood event.'
    );

    expect(result).toEqual({
      overallSentiment: 'Positive',
      positiveHighlights: 'Friendly staff',
      commonComplaints: 'None mentioned',
      executiveSummary: 'Good event.',
    });
  });

  it('truncates every text section to 1000 characters', () => {
    const long = 'a'.repeat(1500);
    const result = parseAnalysisResponse(
      `OVERALL_SENTIMENT: Positive\nPOSITIVE_HIGHLIGHTS: ${long}\nCOMMON_COMPLAINTS: ${long}\nEXECUTIVE_SUMMARY: ${long}`
    );

    expect(result.positiveHighlights).toBe('a'.repeat(MAX_SECTION_LENGTH));
    expect(result.commonComplaints).toHaveLength(1000);
    expect(result.executiveSummary).toHaveLength(1000);
  });

  it('truncates by characters without splitting emoji', () => {
    const result = parseAnalysisResponse(
      `OVERALL_SENTIMENT: Positive\nPOSITIVE_HIGHLIGHTS: a${'😀'.repeat(1200)}`
    );

    expect(result.positiveHighlights).toBe(`a${'😀'.repeat(999)}`);
    expect([...result.positiveHighlights]).toHaveLength(MAX_SECTION_LENGTH);
  });
});

describe('parseSentiment', () => {
  it.each([
    ['Positive', 'Positive'],
    ['Negative', 'Negative'],
    ['Neutral', 'Neutral'],
    ['**Positive**', 'Positive'],
    ['[Negative]', 'Negative'],
    ['Positive.', 'Positive'],
    ['Positive overall, with caveats', 'Positive'],
  ])('reads %p as %p', (section, expected) => {
    expect(parseSentiment(section)).toBe(expected);
  });

  it.each(['positive', 'POSITIVE', 'Mixed', 'Very Positive'])(
    'maps %p to Neutral',
    (section) => {
      expect(parseSentiment(section)).toBe('Neutral');
    }
  );

  it('defaults to Neutral when the section is missing', () => {
    expect(parseSentiment(undefined)).toBe('Neutral');
    expect(parseSentiment('')).toBe('Neutral');
  });
});

describe('extractSections', () => {
  it('returns only the sections that are present', () => {
    expect(extractSections('COMMON_COMPLAINTS: Parking')).toEqual({
      commonComplaints: 'Parking',
    });
  });
});
