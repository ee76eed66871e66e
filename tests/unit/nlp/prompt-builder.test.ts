/**
 * Tests for analysis prompt construction
 */

import {
  averageRating,
  buildAnalysisPrompt,
  formatComments,
  formatRating,
  NO_COMMENTS_PLACEHOLDER,
  SECTION_HEADERS,
} from '../../../src/nlp/prompt-builder';

describe('formatComments', () => {
  it('numbers comments from 1', () => {
    expect(formatComments(['Great venue', 'Too loud'])).toBe('1. Great venue\n2. Too loud');
  });

  it('uses the placeholder when there are no comments', () => {
    expect(formatComments([])).toBe('(No written comments provided)');
  });

  it('keeps only the first 50 comments', () => {
    const comments = Array.from({ length: 60 }, (_, i) => `comment ${i + 1}`);
    const lines = formatComments(comments).split('\n');

    expect(lines).toHaveLength(50);
    expect(lines[0]).toBe('1. comment 1');
    expect(lines[49]).toBe('50. comment 50');
  });
});

describe('averageRating', () => {
  it('computes the arithmetic mean', () => {
    expect(averageRating([{ rating: 5 }, { rating: 4 }, { rating: 4 }])).toBeCloseTo(4.3333, 4);
  });
});

describe('formatRating', () => {
  it.each([
    [2.125, '2.12'],
    [2.375, '2.38'],
    [1.625, '1.62'],
    [3.5, '3.50'],
    [4, '4.00'],
    [13 / 3, '4.33'],
  ])('formats %p as %p', (value, expected) => {
    expect(formatRating(value)).toBe(expected);
  });
});

describe('buildAnalysisPrompt', () => {
  it('includes the response count and the mean rating to two decimals', () => {
    const prompt = buildAnalysisPrompt([
      { rating: 5, comment: 'Great' },
      { rating: 4 },
      { rating: 4 },
    ]);

    expect(prompt).toContain('- Total Responses: 3\n');
    expect(prompt).toContain('- Average Rating: 4.33/5.0\n');
  });

  it('rounds a mean that falls exactly halfway to the even digit', () => {
    const prompt = buildAnalysisPrompt([5, 2, 2, 2, 2, 2, 1, 1].map((rating) => ({ rating })));

    expect(prompt).toContain('- Average Rating: 2.12/5.0\n');
  });

  it('lists non-empty comments in input order', () => {
    const prompt = buildAnalysisPrompt([
      { rating: 5, comment: 'Great' },
      { rating: 3 },
      { rating: 2, comment: '   ' },
      { rating: 4, comment: 'Good snacks' },
    ]);

    expect(prompt).toContain('ATTENDEE COMMENTS:\n1. Great\n2. Good snacks\n\n');
  });

  it('uses the placeholder when no record has a comment', () => {
    const prompt = buildAnalysisPrompt([{ rating: 3 }]);

    expect(prompt).toContain(`ATTENDEE COMMENTS:\n${NO_COMMENTS_PLACEHOLDER}\n`);
  });

  it('requests the four sections in order', () => {
    const prompt = buildAnalysisPrompt([{ rating: 3 }]);

    const positions = [
      SECTION_HEADERS.overallSentiment,
      SECTION_HEADERS.positiveHighlights,
      SECTION_HEADERS.commonComplaints,
      SECTION_HEADERS.executiveSummary,
    ].map((header) => prompt.indexOf(header));

    expect(positions.every((position) => position >= 0)).toBe(true);
    expect([...positions].sort((a, b) => a - b)).toEqual(positions);
    expect(prompt).toContain(
      'OVERALL_SENTIMENT: [Choose ONLY one: Positive, Neutral, or Negative]'
    );
  });

  it('is deterministic', () => {
    const records = [
      { rating: 1, comment: 'Bad sound' },
      { rating: 2, comment: 'Cold room' },
    ];

    expect(buildAnalysisPrompt(records)).toBe(buildAnalysisPrompt(records));
  });
});
