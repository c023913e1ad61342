import { describe, it, expect } from 'vitest';
import {
  cleanChunkText,
  deduplicateSpans,
  extractKeySpans,
  NO_CONTEXT_REPLY,
  queryTerms,
  splitSentences,
  synthesize,
  truncateBullet
} from '../src/retrieval/synthesize.js';

const PASSAGES = [
  'The program costs $2,000 per month. It includes weekly coaching calls.',
  'Weekly coaching calls happen on Tuesdays.'
];

describe('text helpers', () => {
  it('drops page markers, rules and bare numbers', () => {
    expect(cleanChunkText('[Page 3]\nReal content line here.\n-----\n42')).toBe('Real content line here.');
  });

  it('does not split sentences after common abbreviations', () => {
    expect(splitSentences('Dr. Smith arrived early. He met Mrs. Jones at noon.')).toEqual([
      'Dr. Smith arrived early.',
      'He met Mrs. Jones at noon.'
    ]);
  });

  it('removes repeated and contained spans', () => {
    expect(
      deduplicateSpans(['Our main offer is the program.', 'our main offer is the program', 'Something else entirely.'])
    ).toEqual(['Our main offer is the program.', 'Something else entirely.']);
  });

  it('keeps only meaningful query terms', () => {
    expect(queryTerms('How much does the program cost?')).toEqual(['much', 'program', 'cost']);
  });

  it('truncates long bullets on a word boundary', () => {
    expect(truncateBullet('word '.repeat(60).trim(), 20)).toBe('word word word word...');
    expect(truncateBullet('short', 20)).toBe('short');
  });
});

describe('extractKeySpans', () => {
  it('ranks the sentence covering the question first', () => {
    const spans = extractKeySpans(PASSAGES, 'How much does the program cost?');
    expect(spans.map((s) => [s.text, s.passageIndex])).toEqual([
      ['The program costs $2,000 per month.', 0],
      ['It includes weekly coaching calls.', 0],
      ['Weekly coaching calls happen on Tuesdays.', 1]
    ]);
    expect(spans[0].relevance).toBeCloseTo(2 / 3);
  });

  it('honours the span limit', () => {
    expect(extractKeySpans(PASSAGES, 'program', 1)).toHaveLength(1);
  });
});

describe('synthesize', () => {
  it('produces cited bullets', () => {
    expect(synthesize('How much does the program cost?', PASSAGES)).toEqual({
      answerLines: [
        '- The program costs $2,000 per month. [1]',
        '- It includes weekly coaching calls. [1]',
        '- Weekly coaching calls happen on Tuesdays. [2]'
      ],
      lowConfidence: false
    });
  });

  it('flags low confidence when no sentence mentions the question terms', () => {
    expect(synthesize('Which color is the sky?', PASSAGES).lowConfidence).toBe(true);
  });

  it('replies with the no-context message for empty passages', () => {
    expect(synthesize('anything', ['', '  '])).toEqual({ answerLines: [NO_CONTEXT_REPLY], lowConfidence: true });
  });

  it('reports fragments that contain no usable sentence', () => {
    expect(synthesize('anything', ['ok']).answerLines).toEqual([
      '- Retrieved text is too fragmented for a confident answer. Try a more specific question.'
    ]);
  });
});
